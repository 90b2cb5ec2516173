export { phaseAfterCycle, pollInterval } from './cadence';
export type { ControllerPhase, CadenceConfig } from './types';
