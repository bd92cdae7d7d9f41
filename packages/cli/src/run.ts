/**
 * CLI runner: parses argv, maps errors to exit codes.
 * Never calls process.exit(); the caller sets process.exitCode.
 */

import { readFile } from 'node:fs/promises';
import { CommanderError } from 'commander';
import pino from 'pino';
import { createLogger, errorMessage } from '@embedbatch/core';
import { CliError, exitCodeFor } from './errors.js';
import { createProgram } from './program.js';
import type { ProgramDeps } from './program.js';
import { defaultServices } from './services.js';

const SUCCESSFUL_COMMANDER_EXITS = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

export const defaultDeps: ProgramDeps = {
  env: process.env,
  services: defaultServices,
  createLogger: (level) => createLogger({ name: 'embedbatch-cli', level, destination: pino.destination(2) }),
  readFile: (path) => readFile(path, 'utf8'),
  stdout: process.stdout,
  stderr: process.stderr,
  onInterrupt: (handler) => {
    process.once('SIGINT', handler);
    process.once('SIGTERM', handler);
    return () => {
      process.off('SIGINT', handler);
      process.off('SIGTERM', handler);
    };
  },
};

export async function runCli(argv: string[], deps: ProgramDeps = defaultDeps): Promise<number> {
  const program = createProgram(deps);

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CliError) {
      deps.stderr.write(`Error: ${error.message}\n`);
      return exitCodeFor(error);
    }
    // Commander has already printed its own message.
    if (error instanceof CommanderError) {
      return SUCCESSFUL_COMMANDER_EXITS.has(error.code) ? 0 : 1;
    }
    deps.stderr.write(`Error: ${errorMessage(error)}\n`);
    return 2;
  }
}
