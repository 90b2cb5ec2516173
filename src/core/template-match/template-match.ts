/**
 * Template matching by zero-mean normalized cross-correlation
 *
 * A placement scores 1 when the screen region is the template up to
 * brightness and contrast, 0 when the two are unrelated. A template or
 * region with no contrast at all has no pattern to correlate and scores 0.
 *
 * Large searches run coarse-to-fine: the frame and the template are box
 * downscaled, every coarse placement is scored, and only the best coarse
 * candidates are searched again at full resolution.
 */

import type { GrayImage, ScreenPoint } from '$types';
import type { RgbaBitmap, TemplateHit } from './types';

/** Pyramid factors tried, largest first */
const PYRAMID_FACTORS = [8, 4, 2];
/** Smallest template side allowed after downscaling */
const MIN_COARSE_SIDE = 6;
/** Coarse scores run lower than full-resolution ones; candidates need only this much */
const COARSE_MARGIN = 0.5;
const MIN_COARSE_SCORE = 0.25;
const MAX_CANDIDATES = 16;
/** Variance below this counts as a flat image */
const FLAT_VARIANCE = 1e-6;

// ═══════════════════════════════════════════════════════════════
// PIXEL CONVERSION
// ═══════════════════════════════════════════════════════════════

/**
 * Reduce an RGBA bitmap to one byte per pixel
 * @param bitmap - Decoded bitmap
 * @param grayscale - true: luma (0.299R + 0.587G + 0.114B); false: green channel only
 */
export function toGray(bitmap: RgbaBitmap, grayscale: boolean): GrayImage {
  const count = bitmap.width * bitmap.height;
  const out = new Uint8Array(count);
  const src = bitmap.data;

  for (let i = 0; i < count; i++) {
    const o = i * 4;
    if (grayscale) {
      out[i] = Math.round(0.299 * src[o] + 0.587 * src[o + 1] + 0.114 * src[o + 2]);
    } else {
      out[i] = src[o + 1];
    }
  }

  return {
    width: bitmap.width,
    height: bitmap.height,
    data: out
  };
}

/**
 * Box-average downscale; a partial block at the right or bottom edge is dropped
 */
export function downscale(image: GrayImage, factor: number): GrayImage {
  const width = Math.floor(image.width / factor);
  const height = Math.floor(image.height / factor);
  const out = new Uint8Array(width * height);
  const area = factor * factor;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (let dy = 0; dy < factor; dy++) {
        let i = (y * factor + dy) * image.width + x * factor;
        const end = i + factor;
        while (i < end) {
          sum += image.data[i];
          i++;
        }
      }
      out[y * width + x] = Math.round(sum / area);
    }
  }

  return { width: width, height: height, data: out };
}

// ═══════════════════════════════════════════════════════════════
// SCORING
// ═══════════════════════════════════════════════════════════════

interface NeedleStats {
  pixels: number;
  /** Template pixels minus the template mean */
  centered: Float64Array;
  /** sqrt of the sum of squared centered values; 0 for a flat template */
  norm: number;
}

/**
 * Summed-area tables of the haystack and its squares, (width+1) x (height+1)
 */
interface IntegralImage {
  stride: number;
  sum: Float64Array;
  sumSq: Float64Array;
}

function needleStats(needle: GrayImage): NeedleStats {
  const pixels = needle.width * needle.height;
  let total = 0;
  for (let i = 0; i < pixels; i++) {
    total += needle.data[i];
  }
  const mean = total / pixels;

  const centered = new Float64Array(pixels);
  let squares = 0;
  for (let i = 0; i < pixels; i++) {
    const c = needle.data[i] - mean;
    centered[i] = c;
    squares += c * c;
  }

  return {
    pixels: pixels,
    centered: centered,
    norm: squares / pixels < FLAT_VARIANCE ? 0 : Math.sqrt(squares)
  };
}

function integralImage(image: GrayImage): IntegralImage {
  const stride = image.width + 1;
  const sum = new Float64Array(stride * (image.height + 1));
  const sumSq = new Float64Array(stride * (image.height + 1));

  for (let y = 0; y < image.height; y++) {
    let rowSum = 0;
    let rowSq = 0;
    for (let x = 0; x < image.width; x++) {
      const v = image.data[y * image.width + x];
      rowSum += v;
      rowSq += v * v;
      const at = (y + 1) * stride + x + 1;
      sum[at] = sum[at - stride] + rowSum;
      sumSq[at] = sumSq[at - stride] + rowSq;
    }
  }

  return { stride: stride, sum: sum, sumSq: sumSq };
}

function boxTotal(table: Float64Array, stride: number, left: number, top: number, width: number, height: number): number {
  const a = top * stride + left;
  const b = a + width;
  const c = (top + height) * stride + left;
  const d = c + width;
  return table[d] - table[b] - table[c] + table[a];
}

/**
 * Correlation coefficient of the needle and one haystack placement
 */
function scorePlacement(haystack: GrayImage, table: IntegralImage, needle: GrayImage, stats: NeedleStats, left: number, top: number): number {
  const n = stats.pixels;
  const windowSum = boxTotal(table.sum, table.stride, left, top, needle.width, needle.height);
  const windowSq = boxTotal(table.sumSq, table.stride, left, top, needle.width, needle.height);
  const variance = windowSq - windowSum * windowSum / n;
  if (variance / n < FLAT_VARIANCE) {
    return 0;
  }

  // sum(centered) is 0, so correlating with raw pixels equals correlating with centered ones
  const hw = haystack.width;
  const nw = needle.width;
  const hd = haystack.data;
  const centered = stats.centered;
  let cross = 0;
  for (let row = 0; row < needle.height; row++) {
    let h = (top + row) * hw + left;
    let k = row * nw;
    const end = k + nw;
    while (k < end) {
      cross += centered[k] * hd[h];
      h++;
      k++;
    }
  }

  const score = cross / (stats.norm * Math.sqrt(variance));
  return score > 1 ? 1 : score;
}

// ═══════════════════════════════════════════════════════════════
// SEARCH
// ═══════════════════════════════════════════════════════════════

/**
 * Best placement with its top-left inside [x0, x1] x [y0, y1]
 * Ties keep the first placement in row-major order.
 */
function bestInRegion(
  haystack: GrayImage,
  table: IntegralImage,
  needle: GrayImage,
  stats: NeedleStats,
  x0: number, y0: number, x1: number, y1: number
): TemplateHit | null {
  let best: TemplateHit | null = null;
  for (let top = y0; top <= y1; top++) {
    for (let left = x0; left <= x1; left++) {
      const score = scorePlacement(haystack, table, needle, stats, left, top);
      if (best === null || score > best.similarity) {
        best = { left: left, top: top, similarity: score };
      }
    }
  }
  return best;
}

/**
 * Coarse placements worth refining, best first, at most one per 3x3 neighbourhood
 */
function coarseCandidates(haystack: GrayImage, needle: GrayImage, stats: NeedleStats, threshold: number): TemplateHit[] {
  const table = integralImage(haystack);
  const found: TemplateHit[] = [];
  const lastTop = haystack.height - needle.height;
  const lastLeft = haystack.width - needle.width;

  for (let top = 0; top <= lastTop; top++) {
    for (let left = 0; left <= lastLeft; left++) {
      const score = scorePlacement(haystack, table, needle, stats, left, top);
      if (score >= threshold) {
        found.push({ left: left, top: top, similarity: score });
      }
    }
  }

  found.sort(function(a, b) { return b.similarity - a.similarity; });

  const picked: TemplateHit[] = [];
  for (let i = 0; i < found.length && picked.length < MAX_CANDIDATES; i++) {
    const c = found[i];
    const near = picked.some(function(p) {
      return Math.abs(p.left - c.left) <= 1 && Math.abs(p.top - c.top) <= 1;
    });
    if (!near) {
      picked.push(c);
    }
  }
  return picked;
}

/**
 * Largest pyramid factor that keeps the template recognizable, 1 for none
 */
export function pyramidFactor(needle: GrayImage): number {
  const side = Math.min(needle.width, needle.height);
  for (let i = 0; i < PYRAMID_FACTORS.length; i++) {
    if (side / PYRAMID_FACTORS[i] >= MIN_COARSE_SIDE) {
      return PYRAMID_FACTORS[i];
    }
  }
  return 1;
}

function isEarlier(a: TemplateHit, b: TemplateHit): boolean {
  return a.top < b.top || (a.top === b.top && a.left < b.left);
}

/**
 * Find the best placement of `needle` in `haystack` at or above `confidence`
 *
 * Ties keep the first placement in row-major order.
 *
 * @param confidence - Minimum correlation, at most 1
 * @returns Best hit, or null when no placement reaches the threshold
 */
export function findTemplate(haystack: GrayImage, needle: GrayImage, confidence: number): TemplateHit | null {
  if (needle.width === 0 || needle.height === 0) {
    return null;
  }
  if (needle.width > haystack.width || needle.height > haystack.height) {
    return null;
  }

  const stats = needleStats(needle);
  if (stats.norm === 0) {
    return null;
  }

  const table = integralImage(haystack);
  const lastTop = haystack.height - needle.height;
  const lastLeft = haystack.width - needle.width;
  const factor = pyramidFactor(needle);

  let best: TemplateHit | null = null;

  const coarseNeedle = factor > 1 ? downscale(needle, factor) : null;
  const coarseStats = coarseNeedle !== null ? needleStats(coarseNeedle) : null;

  if (coarseNeedle === null || coarseStats === null || coarseStats.norm === 0) {
    best = bestInRegion(haystack, table, needle, stats, 0, 0, lastLeft, lastTop);
  } else {
    const threshold = Math.max(confidence - COARSE_MARGIN, MIN_COARSE_SCORE);
    const candidates = coarseCandidates(downscale(haystack, factor), coarseNeedle, coarseStats, threshold);

    for (let i = 0; i < candidates.length; i++) {
      const c = candidates[i];
      const x0 = Math.max(0, c.left * factor - factor);
      const y0 = Math.max(0, c.top * factor - factor);
      const x1 = Math.min(lastLeft, c.left * factor + factor);
      const y1 = Math.min(lastTop, c.top * factor + factor);
      const hit = bestInRegion(haystack, table, needle, stats, x0, y0, x1, y1);
      if (hit !== null && (best === null || hit.similarity > best.similarity ||
          (hit.similarity === best.similarity && isEarlier(hit, best)))) {
        best = hit;
      }
    }
  }

  if (best === null || best.similarity < confidence) {
    return null;
  }
  return best;
}

/**
 * Center of a hit, shifted by the image origin (desktop coordinates)
 */
export function hitCenter(hit: TemplateHit, needle: GrayImage, originX: number, originY: number): ScreenPoint {
  return {
    x: originX + hit.left + Math.floor(needle.width / 2),
    y: originY + hit.top + Math.floor(needle.height / 2)
  };
}
