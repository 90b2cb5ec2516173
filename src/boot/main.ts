#!/usr/bin/env node
/**
 * ad-mute entry point
 *
 * Every way out (menu quit, Ctrl+C, SIGTERM) goes through shutdown(),
 * which unmutes the player before the process exits.
 */

import chalk from 'chalk';

import { ConfigValidationError, StartupError } from '$types/errors';

import { buildProgram, cliOverrides } from './cli';
import type { RunOptions } from './cli';
import { APP_VERSION, loadConfig, loadDotenv } from './config';
import { diagnose, initialize, shutdown } from './init';
import { runMenu } from './menu';
import type { App } from './types';

function untilSignal(): Promise<string> {
  return new Promise(function(resolve) {
    process.once('SIGINT', function() { resolve('SIGINT'); });
    process.once('SIGTERM', function() { resolve('SIGTERM'); });
  });
}

async function startApp(options: RunOptions, probeActuator: boolean): Promise<App> {
  loadDotenv(options.env);
  const loaded = loadConfig(process.env, cliOverrides(options));
  return initialize(loaded.config, loaded.problems, { probeActuator: probeActuator });
}

async function runCommand(options: RunOptions): Promise<void> {
  const app = await startApp(options, true);
  const controller = app.controller;
  const signal = untilSignal();

  controller.start();

  if (app.config.USE_MENU) {
    const menu = runMenu(process.stdin, console.log, {
      run: function() { controller.setEnabled(true); },
      pause: function() { controller.setEnabled(false); },
      diagnose: function() { return diagnose(app); },
      isRunning: function() { return controller.isEnabled(); }
    });
    await Promise.race([menu, signal]);
  } else {
    app.logger.info("Menu disabled (USE_MENU=false). Muter running; press Ctrl+C to stop.");
    controller.setEnabled(true);
    const received = await signal;
    app.logger.info("Interrupted by " + received);
  }

  await shutdown(app);
  process.exit(0);
}

async function diagnoseCommand(options: RunOptions): Promise<void> {
  const app = await startApp(options, false);
  try {
    await diagnose(app);
  } finally {
    await app.search.close();
    await app.logger.close();
  }
}

const program = buildProgram(APP_VERSION, { run: runCommand, diagnose: diagnoseCommand });

program.parseAsync(process.argv).catch(function(err: unknown) {
  if (err instanceof ConfigValidationError || err instanceof StartupError) {
    console.error(chalk.red(err.message));
  } else {
    console.error(chalk.red('Unexpected error:'), err);
  }
  process.exit(1);
});
