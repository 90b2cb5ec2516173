/**
 * Interactive key menu
 *
 *   r  run / resume     p  pause
 *   d  diagnose         q  quit (also Ctrl+C)
 */

import * as readline from 'readline';

import chalk from 'chalk';

export interface MenuActions {
  run(): void;
  pause(): void;
  diagnose(): Promise<void>;
  isRunning(): boolean;
}

export type MenuOutcome = 'continue' | 'quit';

/**
 * Stream the menu reads keys from (process.stdin in production)
 */
export type MenuInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

/**
 * Title line showing whether the muter is running
 */
export function menuTitle(running: boolean): string {
  return "ad-mute: ((" + (running ? "running" : "paused") + "))";
}

export function menuLines(running: boolean): string[] {
  return [
    chalk.bold(menuTitle(running)),
    chalk.gray("  r run   p pause   d diagnose   q quit")
  ];
}

/**
 * Apply one key press
 */
export async function handleMenuKey(key: string, actions: MenuActions): Promise<MenuOutcome> {
  switch (key) {
    case 'r':
      actions.run();
      return 'continue';
    case 'p':
      actions.pause();
      return 'continue';
    case 'd':
      await actions.diagnose();
      return 'continue';
    case 'q':
      return 'quit';
    default:
      return 'continue';
  }
}

/**
 * Show the menu and handle keys until the user quits
 *
 * Keys pressed while a diagnose is running are ignored.
 *
 * @param write - Line printer (console.log in production)
 */
export function runMenu(input: MenuInput, write: (line: string) => void, actions: MenuActions): Promise<void> {
  return new Promise(function(resolve, reject) {
    let busy = false;

    function render(): void {
      menuLines(actions.isRunning()).forEach(write);
    }

    function release(): void {
      input.removeListener('keypress', onKey);
      if (input.isTTY && input.setRawMode) {
        input.setRawMode(false);
      }
      input.pause();
    }

    function onKey(str: string | undefined, key: readline.Key | undefined): void {
      if (busy) {
        return;
      }
      const pressed = key !== undefined && key.ctrl === true && key.name === 'c' ? 'q' : (str ?? '').toLowerCase();

      busy = true;
      handleMenuKey(pressed, actions).then(function(outcome) {
        busy = false;
        if (outcome === 'quit') {
          release();
          resolve();
        } else {
          render();
        }
      }, function(err: unknown) {
        release();
        reject(err);
      });
    }

    readline.emitKeypressEvents(input);
    if (input.isTTY && input.setRawMode) {
      input.setRawMode(true);
    }
    input.on('keypress', onKey);
    input.resume();
    render();
  });
}
