/**
 * Control module type definitions
 */

import type { CadenceConfig } from '@core/cadence';
import type { Detector } from '@core/detector';
import type { MuteActuator } from '@hardware/audio';
import type { Logger } from '@logging';
import type { ControllerState } from '@system/state';
import type { Template } from '$types';
import type { Waiter } from '@utils/time';

/**
 * Everything one loop iteration works with
 */
export interface Controller {
  state: ControllerState;
  config: CadenceConfig;
  logger: Logger;
  detector: Detector;
  actuator: MuteActuator;
  waiter: Waiter;
  /** Ad templates in priority order */
  templates: readonly Template[];
  timeSource: () => number;
}

/**
 * Handle the shell uses to drive the background loop
 */
export interface MuteController {
  /** Launch the loop (paused until enabled); later calls do nothing */
  start(): void;
  /** Resume or pause detection; pausing releases a mute the loop applied */
  setEnabled(enabled: boolean): void;
  isEnabled(): boolean;
  /**
   * Ask the loop to exit and wait for it; unmutes first if muted.
   * Safe to call more than once.
   */
  stop(): Promise<void>;
  getState(): Readonly<ControllerState>;
}
