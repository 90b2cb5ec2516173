export { createInitialState, createStats } from './state';
export type { ControllerState, CycleStats } from './types';
