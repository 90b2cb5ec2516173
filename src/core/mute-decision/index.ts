export { reconcileBelief, decideMuteAction } from './mute-decision';
export type { MuteAction } from './types';
