/**
 * Command table shared by help output, argument checks and shell
 * completions.
 *
 * @packageDocumentation
 */

import { ErrorCode, InputError } from '@tessera/types';

import { bold, dim, header } from './format';

export const CLI_NAME = 'tessera';
export const CLI_VERSION = '0.1.0';

export interface CommandUsage {
  /** One or two words: `vote`, `create tx-delegate`. */
  readonly name: string;
  /** `<x>` is required, `[<x>]` optional, `...` any number of words. */
  readonly args: string;
  readonly summary: string;
}

export const COMMAND_USAGE: readonly CommandUsage[] = [
  { name: 'genesis', args: '', summary: 'Create the genesis commit of a new ledger repository' },
  { name: 'init', args: '', summary: 'Initialize a node directory' },
  { name: 'clone', args: '<url>', summary: 'Clone a ledger repository into the node directory' },
  { name: 'sync', args: '<last_finalization_proof>', summary: 'Sync the finalized chain up to a finalization proof' },
  { name: 'clean', args: '[--hard]', summary: 'Remove outdated branches and orphan commits' },
  { name: 'create tx-delegate', args: '<delegator> <delegatee> <governance> <proof>', summary: 'Submit a delegation transaction' },
  { name: 'create tx-undelegate', args: '<delegator> <proof>', summary: 'Submit an undelegation transaction' },
  { name: 'create tx-report', args: '', summary: 'Submit a report transaction' },
  { name: 'create block', args: '', summary: 'Create a block for the next height' },
  { name: 'create agenda', args: '', summary: 'Create an agenda for the next height' },
  { name: 'vote', args: '<commit>', summary: 'Vote on an agenda' },
  { name: 'veto', args: '[<commit>]', summary: 'Veto the current round, or one block' },
  { name: 'consensus', args: '[--show]', summary: 'Make progress on consensus' },
  { name: 'git', args: '', summary: 'Show the state of the ledger repository' },
  { name: 'show', args: '<commit>', summary: 'Show the content and hash of a commit' },
  { name: 'network', args: '', summary: 'Show the peer network' },
  { name: 'serve', args: '', summary: 'Run the node as a server' },
  { name: 'update', args: '', summary: 'Fetch new commits from peers' },
  { name: 'broadcast', args: '', summary: 'Broadcast local commits to peers' },
  { name: 'chat', args: '...', summary: 'Chat with the other validators' },
  { name: 'sign tx-delegate', args: '<delegatee> <governance> <target_height>', summary: 'Sign a delegation with the node key' },
  { name: 'sign tx-undelegate', args: '<target_height>', summary: 'Sign an undelegation with the node key' },
  { name: 'sign custom', args: '<hash>', summary: 'Sign a 32-byte hash with the node key' },
  { name: 'check-push', args: '...', summary: 'Check whether a pushed commit is acceptable' },
  { name: 'notify-push', args: '...', summary: 'Tell the node about a pushed commit' },
  { name: 'completions', args: '<bash|zsh|fish>', summary: 'Print a shell completion script' },
  { name: 'version', args: '', summary: 'Print version information' },
  { name: 'help', args: '[<command>]', summary: 'Show help for all commands, or one' },
];

/** Top-level command words, in table order and without repeats. */
export const TOP_LEVEL_COMMANDS: readonly string[] = [
  ...new Set(COMMAND_USAGE.map((usage) => usage.name.split(' ')[0] ?? usage.name)),
];

/** Subcommand words of a two-word command (`create`, `sign`). */
export function subcommandsOf(command: string): string[] {
  const prefix = `${command} `;
  return COMMAND_USAGE.filter((usage) => usage.name.startsWith(prefix)).map((usage) =>
    usage.name.slice(prefix.length),
  );
}

export function findUsage(name: string): CommandUsage | undefined {
  return COMMAND_USAGE.find((usage) => usage.name === name);
}

function synopsis(usage: CommandUsage): string {
  return `${usage.name}${usage.args ? ` ${usage.args}` : ''}`;
}

export function usageLine(usage: CommandUsage): string {
  return `${CLI_NAME} ${synopsis(usage)}`;
}

// ─── Arity ────────────────────────────────────────────────────────────────────

interface Arity {
  required: string[];
  optional: string[];
  variadic: boolean;
}

function arityOf(usage: CommandUsage): Arity {
  const arity: Arity = { required: [], optional: [], variadic: false };
  for (const token of usage.args.split(' ')) {
    if (token === '...') {
      arity.variadic = true;
    } else if (/^<[^>]+>$/.test(token)) {
      arity.required.push(token);
    } else if (/^\[<[^>]+>\]$/.test(token)) {
      arity.optional.push(token.slice(1, -1));
    }
  }
  return arity;
}

/**
 * Check the positional arguments of a command against its table entry.
 *
 * @throws {InputError} `INVALID_ARGUMENT` naming the missing or surplus
 *   argument, with the usage line as hint.
 */
export function checkArity(usage: CommandUsage, args: readonly string[]): void {
  const { required, optional, variadic } = arityOf(usage);
  const hint = `Usage: ${usageLine(usage)}`;
  const missing = required[args.length];
  if (missing !== undefined) {
    throw new InputError(ErrorCode.INVALID_ARGUMENT, `'${usage.name}' is missing ${missing}`, 'arguments', { hint });
  }
  const max = required.length + optional.length;
  const surplus = args[max];
  if (!variadic && surplus !== undefined) {
    throw new InputError(
      ErrorCode.INVALID_ARGUMENT,
      `'${usage.name}' takes at most ${max} argument${max === 1 ? '' : 's'}, got "${surplus}"`,
      'arguments',
      { hint },
    );
  }
}

// ─── Help ─────────────────────────────────────────────────────────────────────

/** Full help text, or the entries under `topic` when it names commands. */
export function helpText(topic?: string): string {
  const entries = topic
    ? COMMAND_USAGE.filter((usage) => usage.name === topic || usage.name.startsWith(`${topic} `))
    : [];
  if (entries.length > 0) {
    return entries.map((usage) => `Usage: ${usageLine(usage)}\n  ${usage.summary}`).join('\n\n');
  }

  const width = Math.max(...COMMAND_USAGE.map((usage) => synopsis(usage).length));
  const lines = [
    header(`${CLI_NAME} ${CLI_VERSION}: ledger node command surface`),
    '',
    `Usage: ${CLI_NAME} <command> [options]`,
    '',
    bold('Commands:'),
    ...COMMAND_USAGE.map((usage) => `  ${synopsis(usage).padEnd(width)}  ${dim(usage.summary)}`),
    '',
    bold('Options:'),
    '  --path <dir>   Node directory holding config.json (default: .)',
    '  --json         Machine-readable output',
    '  --no-color     Disable colored output',
    '  --verbose      Debug logging on stderr',
    '  --help, -h     Show help',
  ];
  return lines.join('\n');
}
