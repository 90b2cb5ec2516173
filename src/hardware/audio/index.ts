export { createNativeActuator } from './native-actuator';
export { createClickActuator } from './click-actuator';
export { listAudioSessions, parseSessionList, parseSetResult, isTargetProcess } from './helpers';
export type { MuteActuator, AudioSession, AudioConfig } from './types';
