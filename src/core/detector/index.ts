export { createDetector } from './detector';
export type { Detector, MuteIcons, ScreenMatcher } from './types';
