/**
 * Tests for time utilities
 */

import { formatDuration, createWaiter, nowMs } from './time';

describe('time', () => {
  describe('nowMs', () => {
    it('should return the current epoch milliseconds', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date(2026, 3, 1, 12, 0, 0));
      expect(nowMs()).toBe(new Date(2026, 3, 1, 12, 0, 0).getTime());
      vi.useRealTimers();
    });
  });

  describe('formatDuration', () => {
    it('should use seconds under a minute', () => {
      expect(formatDuration(45000)).toBe('45s');
    });

    it('should use minutes under an hour', () => {
      expect(formatDuration(12 * 60000)).toBe('12m');
    });

    it('should use hours above that', () => {
      expect(formatDuration(3 * 3600000)).toBe('3h');
    });
  });

  describe('createWaiter', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should resolve after the interval', async () => {
      const waiter = createWaiter();
      const done = vi.fn();

      const pending = waiter.wait(5000).then(done);
      await vi.advanceTimersByTimeAsync(4999);
      expect(done).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      await pending;
      expect(done).toHaveBeenCalledTimes(1);
    });

    it('should resolve early when woken', async () => {
      const waiter = createWaiter();
      const done = vi.fn();

      const pending = waiter.wait(5000).then(done);
      waiter.wake();
      await pending;

      expect(done).toHaveBeenCalledTimes(1);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('should skip the next wait when woken while not waiting', async () => {
      const waiter = createWaiter();

      waiter.wake();
      await waiter.wait(60000);

      expect(vi.getTimerCount()).toBe(0);
    });

    it('should only skip one wait per wake', async () => {
      const waiter = createWaiter();

      waiter.wake();
      await waiter.wait(100);
      const second = waiter.wait(100);

      expect(vi.getTimerCount()).toBe(1);
      await vi.advanceTimersByTimeAsync(100);
      await second;
    });
  });
});
