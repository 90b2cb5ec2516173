export { nowMs, formatDuration, createWaiter } from './time';
export type { Waiter } from './time';
