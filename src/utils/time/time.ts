/**
 * Time utility functions
 */

const TIME_CONSTANTS = {
  MS_PER_SECOND: 1000,
  SECONDS_PER_MINUTE: 60,
  SECONDS_PER_HOUR: 3600
} as const;

/**
 * Get current timestamp in milliseconds
 * @returns Current time in milliseconds since epoch
 */
export function nowMs(): number {
  return Date.now();
}

/**
 * Format a duration as a short human-readable string (45s, 12m, 3h)
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const seconds = ms / TIME_CONSTANTS.MS_PER_SECOND;
  if (seconds < TIME_CONSTANTS.SECONDS_PER_MINUTE) {
    return Math.round(seconds) + "s";
  } else if (seconds < TIME_CONSTANTS.SECONDS_PER_HOUR) {
    return Math.round(seconds / TIME_CONSTANTS.SECONDS_PER_MINUTE) + "m";
  } else {
    return Math.round(seconds / TIME_CONSTANTS.SECONDS_PER_HOUR) + "h";
  }
}

/**
 * Timed wait that another party can cut short
 */
export interface Waiter {
  /** Resolve after `ms`, or earlier when woken */
  wait(ms: number): Promise<void>;
  /**
   * End the current wait now. With no wait in progress, the next wait
   * resolves immediately instead.
   */
  wake(): void;
}

/**
 * Create a waiter backed by setTimeout
 */
export function createWaiter(): Waiter {
  let timer: NodeJS.Timeout | null = null;
  let release: (() => void) | null = null;
  let pendingWake = false;

  function finish(): void {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
    const done = release;
    release = null;
    if (done) {
      done();
    }
  }

  function wait(ms: number): Promise<void> {
    if (pendingWake) {
      pendingWake = false;
      return Promise.resolve();
    }
    return new Promise(function(resolve) {
      release = resolve;
      timer = setTimeout(finish, ms);
    });
  }

  function wake(): void {
    if (release === null) {
      pendingWake = true;
      return;
    }
    finish();
  }

  return {
    wait: wait,
    wake: wake
  };
}
