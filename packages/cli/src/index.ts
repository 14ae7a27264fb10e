/**
 * @tessera/cli: command surface of a ledger node.
 *
 * {@link run} takes the user arguments and returns the exit code and the
 * text for stdout and stderr. It never throws and never touches
 * `process.exit`, so the whole surface can be driven from tests.
 *
 * @packageDocumentation
 */

import { resolve } from 'path';

import { loadNodeProvider, systemClock } from '@tessera/ledger';
import type { Clock, Config, NodeProvider } from '@tessera/ledger';
import {
  ErrorCode,
  LogLevel,
  Logger,
  NodeError,
  TesseraError,
  classifyError,
  parseLogLevel,
} from '@tessera/types';
import type { LogOutput } from '@tessera/types';

import { parseArgs } from './args';
import { parseCommand } from './commands';
import { describeConfig, loadConfig } from './config';
import { dim, error as errorLine, setColorsEnabled } from './format';
import { executeCommand } from './router';

export { parseArgs } from './args';
export { parseCommand, SHELLS } from './commands';
export type { Command, Shell } from './commands';
export { CONFIG_FILE_NAME, configPath, describeConfig, loadConfig, parseConfig } from './config';
export { executeCommand } from './router';
export type { RouterContext } from './router';
export { CLI_NAME, CLI_VERSION, COMMAND_USAGE, helpText } from './usage';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface RunOptions {
  /** Directory `--path` is resolved against. Defaults to `process.cwd()`. */
  cwd?: string;
  /** Node provider to use instead of the `nodeModule` named in config. */
  provider?: NodeProvider;
  clock?: Clock;
  /** Log sink. By default entries are appended to `stderr` as JSON lines. */
  logOutput?: LogOutput;
  /** Environment consulted for `TESSERA_LOG`. Defaults to `process.env`. */
  env?: Readonly<Record<string, string | undefined>>;
}

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTEGRITY_VIOLATION = 3;

// ─── Error reporting ──────────────────────────────────────────────────────────

function errorJson(err: unknown): Record<string, unknown> {
  if (err instanceof TesseraError) {
    return { ...err.toJSON() };
  }
  if (err instanceof Error) {
    const code: unknown = Reflect.get(err, 'code');
    return typeof code === 'string' ? { code, message: err.message } : { message: err.message };
  }
  return { message: String(err) };
}

function causes(err: unknown): string[] {
  const lines: string[] = [];
  let cause: unknown = err instanceof Error ? err.cause : undefined;
  while (cause instanceof Error) {
    lines.push(dim(`  caused by: ${cause.message}`));
    cause = cause.cause;
  }
  return lines;
}

interface ReportOptions {
  json: boolean;
  verbose: boolean;
  logger: Logger;
  stderr: string[];
}

/** Print an error and pick the exit code. */
function report(err: unknown, { json, verbose, logger, stderr }: ReportOptions): number {
  const kind = classifyError(err);
  const message = err instanceof Error ? err.message : String(err);

  if (kind === 'integrity') {
    logger.error('integrity violation', { code: ErrorCode.INTEGRITY_VIOLATION, reason: message });
    stderr.push(json ? JSON.stringify(errorJson(err)) : errorLine(`integrity violation: ${message}`));
    return EXIT_INTEGRITY_VIOLATION;
  }

  logger.debug('command failed', { kind, error: errorJson(err) });
  if (json) {
    stderr.push(JSON.stringify(errorJson(err)));
    return EXIT_FAILURE;
  }
  stderr.push(errorLine(message));
  if (verbose) {
    stderr.push(...causes(err));
  }
  if (err instanceof TesseraError && err.hint) {
    stderr.push(dim(`Hint: ${err.hint}`));
  }
  return EXIT_FAILURE;
}

// ─── Entry point ──────────────────────────────────────────────────────────────

async function resolveProvider(config: Config, provider: NodeProvider | undefined): Promise<NodeProvider> {
  if (provider) return provider;
  if (config.nodeModule === undefined) {
    throw new NodeError(ErrorCode.NODE_UNAVAILABLE, 'no node module configured', {
      hint: 'Set "nodeModule" in config.json to the node package to use.',
    });
  }
  return loadNodeProvider(config.nodeModule);
}

/**
 * Run one command.
 *
 * @param argv - User arguments, without the node and script entries.
 *
 * @example
 * ```typescript
 * const result = await run(['veto', '--path', '/srv/node']);
 * process.stdout.write(result.stdout);
 * process.exitCode = result.exitCode;
 * ```
 */
export async function run(argv: readonly string[], options: RunOptions = {}): Promise<RunResult> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const env = options.env ?? process.env;

  const parsed = parseArgs(argv);
  const flags = parsed.ok ? parsed.value.flags : new Set(argv.filter((a) => a.startsWith('--')).map((a) => a.slice(2)));
  const json = flags.has('json');
  const verbose = flags.has('verbose');
  setColorsEnabled(!flags.has('no-color'));

  const logger = new Logger({
    level: verbose ? LogLevel.DEBUG : (parseLogLevel(env['TESSERA_LOG']) ?? LogLevel.WARN),
    component: 'cli',
    output: options.logOutput ?? ((entry) => stderr.push(JSON.stringify(entry))),
  });

  const finish = (exitCode: number): RunResult => ({
    exitCode,
    stdout: stdout.join('\n'),
    stderr: stderr.join('\n'),
  });

  try {
    if (!parsed.ok) throw parsed.error;
    const { positional, path } = parsed.value;
    const nodePath = resolve(options.cwd ?? process.cwd(), path);
    const clock = options.clock ?? systemClock;

    const command = parseCommand(positional, flags, clock);
    logger.debug('command parsed', { command: command.kind, path: nodePath });

    const lines = await executeCommand(
      {
        path: nodePath,
        json,
        clock,
        logger: logger.child('router'),
        loadConfig: async () => {
          const config = await loadConfig(nodePath);
          logger.debug('config loaded', describeConfig(config));
          return config;
        },
        loadProvider: (config) => resolveProvider(config, options.provider),
      },
      command,
    );
    stdout.push(...lines);
    return finish(EXIT_OK);
  } catch (err) {
    return finish(report(err, { json, verbose, logger, stderr }));
  }
}
