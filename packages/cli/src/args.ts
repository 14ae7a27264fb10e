/**
 * Minimal argument parser.
 *
 * Splits argv into positionals and flags. Boolean flags are recognised by
 * name, so an argument following one is never swallowed as its value; the
 * only option that takes a value is `--path`.
 *
 * @packageDocumentation
 */

import { ErrorCode, InputError, err, ok } from '@tessera/types';
import type { Result } from '@tessera/types';

export interface ParsedArgs {
  positional: string[];
  flags: Set<string>;
  /** Node working directory (`--path`), `.` when absent. */
  path: string;
}

/** Flags accepted by every command. */
export const GLOBAL_FLAGS = ['json', 'no-color', 'verbose', 'help'] as const;

/** Flags accepted by one command only. */
export const COMMAND_FLAGS: Record<string, readonly string[]> = {
  clean: ['hard'],
  consensus: ['show'],
};

const BOOLEAN_FLAGS = new Set<string>([...GLOBAL_FLAGS, ...Object.values(COMMAND_FLAGS).flat()]);

function usageError(message: string): InputError {
  return new InputError(ErrorCode.INVALID_ARGUMENT, message, 'arguments', {
    hint: "Run 'tessera help' for usage.",
  });
}

/**
 * Parse user arguments (without the node and script entries).
 *
 * @example
 * ```typescript
 * parseArgs(['clean', '--hard', '--path', '/srv/node']);
 * // ok({ positional: ['clean'], flags: Set{'hard'}, path: '/srv/node' })
 * ```
 */
export function parseArgs(args: readonly string[]): Result<ParsedArgs, InputError> {
  const positional: string[] = [];
  const flags = new Set<string>();
  let path = '.';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '-h') {
      flags.add('help');
    } else if (arg.startsWith('--')) {
      const key = arg.slice(2);
      if (key === 'path') {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('--')) {
          return err(usageError('--path requires a directory'));
        }
        path = value;
        i += 1;
      } else if (BOOLEAN_FLAGS.has(key)) {
        flags.add(key);
      } else {
        return err(usageError(`unknown option --${key}`));
      }
    } else {
      positional.push(arg);
    }
  }

  return ok({ positional, flags, path });
}

/** Reject flags that belong to another command. */
export function checkFlags(command: string, flags: ReadonlySet<string>): Result<void, InputError> {
  const allowed = new Set<string>([...GLOBAL_FLAGS, ...(COMMAND_FLAGS[command] ?? [])]);
  for (const flag of flags) {
    if (!allowed.has(flag)) {
      return err(usageError(`option --${flag} is not valid for '${command}'`));
    }
  }
  return ok(undefined);
}
