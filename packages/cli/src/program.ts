/**
 * Commander program definition. Every action loads configuration on its own,
 * so `--help` works without a complete environment.
 */

import { Command } from 'commander';
import { z } from 'zod';
import type { Logger, LevelWithSilent } from 'pino';
import { EmbeddingBatcher, buildLifecycleReport, errorMessage } from '@embedbatch/core';
import type { CliConfig } from './config.js';
import { loadConfig } from './config.js';
import { CliError } from './errors.js';
import { parseFragmentLines } from './fragments.js';
import type { CliServices, Storage } from './services.js';

export const CLI_NAME = 'embedbatch';
export const VERSION = '0.1.0';

/** Line errors quoted in a rejected import before the rest are summarised. */
const MAX_REPORTED_LINE_ERRORS = 5;

export interface OutputSink {
  write(text: string): unknown;
}

export interface ProgramDeps {
  readonly env: NodeJS.ProcessEnv;
  readonly services: CliServices;
  readonly createLogger: (level: LevelWithSilent) => Logger;
  readonly readFile: (path: string) => Promise<string>;
  readonly stdout: OutputSink;
  readonly stderr: OutputSink;
  /** Calls `handler` on an interrupt for the duration of a run. Returns the unsubscribe. */
  readonly onInterrupt: (handler: () => void) => () => void;
}

interface CommandContext {
  readonly config: CliConfig;
  readonly logger: Logger;
}

const retryOptionsSchema = z.object({
  all: z.boolean().optional(),
  job: z.string().min(1).optional(),
  first: z.boolean().optional(),
});

function prepare(deps: ProgramDeps): CommandContext {
  const config = loadConfig(deps.env);
  return { config, logger: deps.createLogger(config.logLevel) };
}

async function withStorage<T>(deps: ProgramDeps, ctx: CommandContext, fn: (storage: Storage) => Promise<T>): Promise<T> {
  const storage = await deps.services.openStorage(ctx.config, ctx.logger);
  try {
    return await fn(storage);
  } finally {
    await storage.close();
  }
}

function writeJson(sink: OutputSink, value: unknown): void {
  sink.write(`${JSON.stringify(value, null, 2)}\n`);
}

export function createProgram(deps: ProgramDeps): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Embed text fragments through the OpenAI Batch API')
    .version(VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout.write(text),
      writeErr: (text) => deps.stderr.write(text),
    });

  program
    .command('run')
    .description('Resume incomplete jobs, then embed every fragment without an active job')
    .action(async () => {
      const ctx = prepare(deps);
      const client = deps.services.createClient(ctx.config, ctx.logger);
      const summary = await withStorage(deps, ctx, async ({ store, vectorStore }) => {
        const batcher = new EmbeddingBatcher({
          client,
          store,
          vectorStore,
          settings: ctx.config.settings,
          logger: ctx.logger,
        });
        const release = deps.onInterrupt(() => {
          ctx.logger.info('Interrupt received, stopping run');
          batcher.stop().catch((error: unknown) => {
            ctx.logger.error({ error: errorMessage(error) }, 'Failed to stop run');
          });
        });
        try {
          return await batcher.run();
        } finally {
          release();
        }
      });

      writeJson(deps.stdout, summary);
      if (summary.shutdownReason !== null) {
        throw new CliError('RUNTIME', `Pipeline shut down: ${summary.shutdownReason}`);
      }
    });

  program
    .command('retry')
    .description('Resubmit failed jobs: all of them in combined groups (default), or one job in place')
    .option('--all', 'retry every failed job, combined into groups')
    .option('--job <id>', 'retry the failed job with this id')
    .option('--first', 'retry the oldest failed job')
    .action(async (cmdOpts: unknown) => {
      const options = retryOptionsSchema.parse(cmdOpts);
      const selectors = [options.all, options.job !== undefined, options.first].filter(Boolean).length;
      if (selectors > 1) {
        throw new CliError('VALIDATION', 'Choose only one of --all, --job <id> or --first');
      }

      const ctx = prepare(deps);
      const client = deps.services.createClient(ctx.config, ctx.logger);
      await withStorage(deps, ctx, async ({ store, vectorStore }) => {
        const batcher = new EmbeddingBatcher({
          client,
          store,
          vectorStore,
          settings: ctx.config.settings,
          logger: ctx.logger,
        });

        if (options.job === undefined && options.first !== true) {
          writeJson(deps.stdout, await batcher.retryFailedJobs());
          return;
        }

        const target = await store.findFailedJob(options.job);
        if (target === null) {
          if (options.job !== undefined) {
            throw new CliError('VALIDATION', `No failed job with id ${options.job}`);
          }
          deps.stdout.write('No failed jobs\n');
          return;
        }

        const outcome = await batcher.retryJob(target.jobId);
        if (outcome === null) {
          throw new CliError('RUNTIME', `Job ${target.jobId} could not be resubmitted`);
        }
        writeJson(deps.stdout, outcome);
      });
    });

  program
    .command('import-fragments <path>')
    .description('Load fragments from a JSONL file of { ownerId, fragmentId, text } objects')
    .action(async (path: string) => {
      const ctx = prepare(deps);

      let content: string;
      try {
        content = await deps.readFile(path);
      } catch (error) {
        throw new CliError('VALIDATION', `Cannot read ${path}: ${errorMessage(error)}`);
      }

      const { fragments, errors } = parseFragmentLines(content);
      if (errors.length > 0) {
        const quoted = errors.slice(0, MAX_REPORTED_LINE_ERRORS).map((e) => `line ${String(e.line)}: ${e.message}`);
        const rest = errors.length - quoted.length;
        const suffix = rest > 0 ? ` (and ${String(rest)} more)` : '';
        throw new CliError('VALIDATION', `Invalid fragments file: ${quoted.join('; ')}${suffix}`, { errors });
      }

      await withStorage(deps, ctx, async ({ store }) => {
        if (fragments.length > 0) await store.saveFragments(fragments);
      });
      ctx.logger.info({ path, fragments: fragments.length }, 'Fragments imported');
      deps.stdout.write(`Imported ${String(fragments.length)} fragments from ${path}\n`);
    });

  program
    .command('status')
    .description('Count stored files and jobs by status')
    .action(async () => {
      const ctx = prepare(deps);
      const report = await withStorage(deps, ctx, ({ store, vectorStore }) => buildLifecycleReport(store, vectorStore));
      writeJson(deps.stdout, report);
    });

  return program;
}
