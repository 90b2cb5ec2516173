export { captureScreen, createScreenMatcher } from './screen';
export type { DesktopMatcher } from './screen';
export { decodePng, parseCapturePayload } from './helpers';
export type { CapturePayload, ScreenFrame, ScreenMatcherConfig } from './types';
