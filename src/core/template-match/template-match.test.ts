import { toGray, downscale, pyramidFactor, findTemplate, hitCenter } from './template-match';
import type { GrayImage } from '$types';

function gray(width: number, height: number, values: number[]): GrayImage {
  return { width: width, height: height, data: Uint8Array.from(values) };
}

// 6x4 haystack with a distinctive 2x2 block at left=3, top=1
const haystack = gray(6, 4, [
  10, 10, 10, 10, 10, 10,
  10, 10, 10, 200, 50, 10,
  10, 10, 10, 90, 250, 10,
  10, 10, 10, 10, 10, 10
]);

const needle = gray(2, 2, [200, 50, 90, 250]);

describe('template-match', () => {
  describe('toGray', () => {
    it('should compute luma when grayscale is on', () => {
      const bitmap = { width: 2, height: 1, data: Uint8Array.from([255, 0, 0, 255, 0, 0, 255, 255]) };
      const result = toGray(bitmap, true);
      // 0.299 * 255 = 76.245 -> 76; 0.114 * 255 = 29.07 -> 29
      expect(Array.from(result.data)).toEqual([76, 29]);
      expect(result.width).toBe(2);
      expect(result.height).toBe(1);
    });

    it('should keep the green channel when grayscale is off', () => {
      const bitmap = { width: 1, height: 1, data: Uint8Array.from([1, 2, 3, 255]) };
      expect(Array.from(toGray(bitmap, false).data)).toEqual([2]);
    });

    it('should map white to 255', () => {
      const bitmap = { width: 1, height: 1, data: Uint8Array.from([255, 255, 255, 255]) };
      expect(Array.from(toGray(bitmap, true).data)).toEqual([255]);
    });
  });

  describe('downscale', () => {
    it('should average each block', () => {
      const image = gray(4, 2, [0, 4, 8, 12, 4, 8, 12, 16]);
      const small = downscale(image, 2);
      expect(small.width).toBe(2);
      expect(small.height).toBe(1);
      expect(Array.from(small.data)).toEqual([4, 12]);
    });

    it('should drop partial blocks at the edges', () => {
      const small = downscale(gray(5, 3, new Array<number>(15).fill(7)), 2);
      expect(small.width).toBe(2);
      expect(small.height).toBe(1);
      expect(Array.from(small.data)).toEqual([7, 7]);
    });
  });

  describe('pyramidFactor', () => {
    it('should keep at least six template pixels per side', () => {
      expect(pyramidFactor(gray(120, 40, []))).toBe(4);
      expect(pyramidFactor(gray(64, 48, []))).toBe(8);
      expect(pyramidFactor(gray(12, 30, []))).toBe(2);
      expect(pyramidFactor(gray(10, 10, []))).toBe(1);
    });
  });

  describe('findTemplate', () => {
    it('should find an exact match with similarity 1', () => {
      const hit = findTemplate(haystack, needle, 0.9);
      expect(hit?.left).toBe(3);
      expect(hit?.top).toBe(1);
      expect(hit?.similarity).toBeCloseTo(1, 9);
    });

    it('should match the same pattern at another brightness and contrast', () => {
      const dimmer = gray(2, 2, [100, 25, 45, 125]);
      const hit = findTemplate(haystack, dimmer, 0.9);
      expect(hit?.left).toBe(3);
      expect(hit?.top).toBe(1);
      expect(hit?.similarity).toBeCloseTo(1, 9);
    });

    it('should return null when nothing reaches the threshold', () => {
      const absent = gray(2, 2, [0, 255, 255, 0]);
      expect(findTemplate(haystack, absent, 0.9)).toBeNull();
    });

    it('should never match a flat template', () => {
      // 40/45 stripes, close in shade to the template
      const values: number[] = [];
      for (let i = 0; i < 64; i++) {
        values.push(i % 2 === 0 ? 40 : 45);
      }
      const dark = gray(8, 8, values);

      expect(findTemplate(dark, gray(2, 2, [60, 60, 60, 60]), 0.5)).toBeNull();
      expect(findTemplate(dark, gray(2, 2, [40, 40, 40, 40]), 0.5)).toBeNull();
    });

    it('should not match a low-contrast template against a different pattern', () => {
      const values: number[] = [];
      for (let i = 0; i < 64; i++) {
        values.push(i % 2 === 0 ? 40 : 45);
      }
      const stripes = gray(8, 8, values);
      const checker = gray(2, 2, [60, 62, 62, 60]);

      expect(findTemplate(stripes, checker, 0.9)).toBeNull();
    });

    it('should find a low-contrast pattern in darker shades', () => {
      const values: number[] = [];
      for (let y = 0; y < 8; y++) {
        for (let x = 0; x < 8; x++) {
          values.push((x + y) % 2 === 0 ? 40 : 45);
        }
      }
      const hit = findTemplate(gray(8, 8, values), gray(2, 2, [60, 62, 62, 60]), 0.9);
      expect(hit?.left).toBe(0);
      expect(hit?.top).toBe(0);
    });

    it('should keep the first placement on ties', () => {
      const twice = gray(6, 1, [0, 9, 0, 0, 9, 0]);
      expect(findTemplate(twice, gray(2, 1, [0, 9]), 0.9)?.left).toBe(0);
    });

    it('should return null when the needle is larger than the haystack', () => {
      const big = gray(7, 1, [0, 1, 0, 1, 0, 1, 0]);
      expect(findTemplate(haystack, big, 0.5)).toBeNull();
    });

    it('should return null for an empty needle', () => {
      expect(findTemplate(haystack, gray(0, 0, []), 0.5)).toBeNull();
    });

    describe('on a full-HD frame', () => {
      const WIDTH = 1920;
      const HEIGHT = 1080;

      function noise(width: number, height: number, seed: number): GrayImage {
        const data = new Uint8Array(width * height);
        let s = seed;
        for (let i = 0; i < data.length; i++) {
          s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
          data[i] = s >>> 24;
        }
        return { width: width, height: height, data: data };
      }

      function crop(image: GrayImage, left: number, top: number, width: number, height: number): GrayImage {
        const data = new Uint8Array(width * height);
        for (let y = 0; y < height; y++) {
          data.set(image.data.subarray((top + y) * image.width + left, (top + y) * image.width + left + width), y * width);
        }
        return { width: width, height: height, data: data };
      }

      const frame = noise(WIDTH, HEIGHT, 7);

      it('should locate a 120x40 template within two seconds', () => {
        const template = crop(frame, 1003, 517, 120, 40);

        const started = performance.now();
        const hit = findTemplate(frame, template, 0.9);
        const elapsed = performance.now() - started;

        expect(hit?.left).toBe(1003);
        expect(hit?.top).toBe(517);
        expect(hit?.similarity).toBeCloseTo(1, 6);
        expect(elapsed).toBeLessThan(2000);
      });

      it('should give up on an absent template within two seconds', () => {
        const template = noise(120, 40, 99);

        const started = performance.now();
        const hit = findTemplate(frame, template, 0.9);
        const elapsed = performance.now() - started;

        expect(hit).toBeNull();
        expect(elapsed).toBeLessThan(2000);
      });
    });
  });

  describe('hitCenter', () => {
    it('should return the center shifted by the origin', () => {
      const hit = { left: 3, top: 1, similarity: 1 };
      expect(hitCenter(hit, needle, 0, 0)).toEqual({ x: 4, y: 2 });
      expect(hitCenter(hit, needle, -1920, 0)).toEqual({ x: -1916, y: 2 });
    });

    it('should round odd sizes down', () => {
      const hit = { left: 0, top: 0, similarity: 1 };
      expect(hitCenter(hit, gray(5, 3, new Array<number>(15).fill(0)), 10, 20)).toEqual({ x: 12, y: 21 });
    });
  });
});
