export { runLoop, createMuteController } from './control';
export type { MuteControllerDeps } from './control';
export { runCycle } from './control-core';
export { requestMute, releaseMute, formatStats } from './helpers';
export type { Controller, MuteController } from './types';
