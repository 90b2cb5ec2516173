/**
 * Boot type definitions
 */

import type { MuteIcons } from '@core/detector';
import type { TemplateSearch } from '@core/template-match';
import type { MuteActuator } from '@hardware/audio';
import type { PowerShellRunner } from '@hardware/powershell';
import type { TemplateSet } from '@hardware/templates';
import type { ConsoleAPI, Logger } from '@logging';
import type { MuteController } from '@system/control';
import type { AdMuteConfig } from '$types';
import type { Waiter } from '@utils/time';

/**
 * Everything main needs after a successful startup
 */
export interface App {
  config: AdMuteConfig;
  logger: Logger;
  runner: PowerShellRunner;
  templateSet: TemplateSet;
  icons: MuteIcons;
  /** Shared by every screen matcher; closed on shutdown */
  search: TemplateSearch;
  actuator: MuteActuator;
  controller: MuteController;
}

/**
 * Replaceable collaborators (tests pass in-process stand-ins)
 */
export interface InitDeps {
  runner?: PowerShellRunner;
  search?: TemplateSearch;
  consoleApi?: ConsoleAPI;
  waiter?: Waiter;
  timeSource?: () => number;
}

export interface InitOptions {
  /** Check the actuator backend before returning (off for diagnose) */
  probeActuator: boolean;
}
