/**
 * Command-line options and how they map onto configuration
 */

import { Command } from 'commander';

import type { AdMuteUserConfig } from '$types';

export interface RunOptions {
  /** false when --no-menu is given */
  menu: boolean;
  debug?: boolean;
  click?: boolean;
  env: string;
}

export interface CliHandlers {
  run(options: RunOptions): Promise<void>;
  diagnose(options: RunOptions): Promise<void>;
}

/**
 * Configuration overrides implied by the flags
 *
 * --menu is the default, so only --no-menu overrides USE_MENU.
 */
export function cliOverrides(options: RunOptions): Partial<AdMuteUserConfig> {
  return {
    ...(options.menu ? {} : { USE_MENU: false }),
    ...(options.debug ? { CONSOLE_LOG_LEVEL: 0, GLOBAL_LOG_LEVEL: 0 } : {}),
    ...(options.click ? { USE_NATIVE_AUDIO: false } : {})
  };
}

export function buildProgram(version: string, handlers: CliHandlers): Command {
  const program = new Command();

  program
    .name('ad-mute')
    .description('Mute the media player while an ad is on screen')
    .version(version);

  program
    .command('run', { isDefault: true })
    .description('Start the muter (menu unless --no-menu)')
    .option('--no-menu', 'Start muting immediately and run until Ctrl+C')
    .option('--debug', 'Verbose DEBUG logging')
    .option('--click', 'Mute by clicking the on-screen volume icon')
    .option('--env <path>', 'Environment file to load', '.env')
    .action(function(options: RunOptions) {
      return handlers.run(options);
    });

  program
    .command('diagnose')
    .description('One-shot report: audio sessions, on-screen mute state, ad template matches')
    .option('--debug', 'Verbose DEBUG logging')
    .option('--click', 'Report as if muting by icon click')
    .option('--env <path>', 'Environment file to load', '.env')
    .action(function(options: Omit<RunOptions, 'menu'>) {
      return handlers.diagnose({ ...options, menu: false });
    });

  return program;
}
