/**
 * Mute controller loop
 *
 * One async loop owns the believed mute state. The shell only flips the
 * enabled/alive flags and wakes the loop; the loop does every actuator
 * call itself, so no two calls are ever in flight.
 */

import { pollInterval } from '@core/cadence';
import type { CadenceConfig } from '@core/cadence';
import type { Detector } from '@core/detector';
import type { MuteActuator } from '@hardware/audio';
import type { Logger } from '@logging';
import { createInitialState } from '@system/state';
import type { ControllerState } from '@system/state';
import type { Template } from '$types';
import type { Waiter } from '@utils/time';

import { runCycle } from './control-core';
import { releaseMute } from './helpers';
import type { Controller, MuteController } from './types';

/**
 * Run until `state.alive` goes false, then release any mute
 */
export async function runLoop(controller: Controller): Promise<void> {
  const state = controller.state;

  while (state.alive) {
    if (state.enabled) {
      if (state.phase === 'paused') {
        state.phase = 'idle';
      }
      await runCycle(controller);
    } else if (state.phase !== 'paused') {
      await releaseMute(controller, "paused");
      state.phase = 'paused';
    }

    if (!state.alive) {
      break;
    }
    await controller.waiter.wait(pollInterval(state.phase, controller.config));
  }

  await releaseMute(controller, "stopping");
  state.phase = 'paused';
}

export interface MuteControllerDeps {
  config: CadenceConfig;
  logger: Logger;
  detector: Detector;
  actuator: MuteActuator;
  waiter: Waiter;
  templates: readonly Template[];
  timeSource: () => number;
}

/**
 * Create the controller handle for the shell
 */
export function createMuteController(deps: MuteControllerDeps): MuteController {
  const state: ControllerState = createInitialState(deps.timeSource());
  const controller: Controller = {
    state: state,
    config: deps.config,
    logger: deps.logger,
    detector: deps.detector,
    actuator: deps.actuator,
    waiter: deps.waiter,
    templates: deps.templates,
    timeSource: deps.timeSource
  };

  let loop: Promise<void> | null = null;
  let stopping: Promise<void> | null = null;

  function start(): void {
    if (loop !== null || !state.alive) {
      return;
    }
    loop = runLoop(controller);
  }

  function setEnabled(enabled: boolean): void {
    if (state.enabled === enabled) {
      return;
    }
    state.enabled = enabled;
    deps.logger.info(enabled ? "Muter running" : "Muter paused");
    deps.waiter.wake();
  }

  function stop(): Promise<void> {
    if (stopping === null) {
      state.alive = false;
      state.enabled = false;
      deps.waiter.wake();
      stopping = loop !== null ? loop : releaseMute(controller, "stopping");
    }
    return stopping;
  }

  return {
    start: start,
    setEnabled: setEnabled,
    isEnabled: function() { return state.enabled; },
    stop: stop,
    getState: function() { return state; }
  };
}
