/**
 * Command parsing.
 *
 * Turns positional arguments into a {@link Command} with every operand
 * already decoded, so that a malformed argument is reported before any
 * configuration is read or any node is initialized.
 *
 * @packageDocumentation
 */

import {
  Roles,
  buildTxDelegate,
  buildTxUndelegate,
  decodeBlockHeight,
  decodeCommitHash,
  decodeFinalizationProof,
  decodeGovernance,
  decodeHash256,
  decodePublicKey,
  decodeVetoTarget,
  decodeVoteTarget,
} from '@tessera/ledger';
import type {
  Clock,
  CommitHash,
  ExtraAgendaTransaction,
  FinalizationProof,
  Hash256,
  PublicKey,
} from '@tessera/ledger';
import { ErrorCode, InputError } from '@tessera/types';

import { checkFlags } from './args';
import { CLI_NAME, checkArity, findUsage, subcommandsOf } from './usage';

export const SHELLS = ['bash', 'zsh', 'fish'] as const;
export type Shell = (typeof SHELLS)[number];

/** A fully validated invocation. */
export type Command =
  | { readonly kind: 'help'; readonly topic?: string }
  | { readonly kind: 'version' }
  | { readonly kind: 'completions'; readonly shell: Shell }
  | { readonly kind: 'unimplemented'; readonly feature: string }
  | { readonly kind: 'genesis' }
  | { readonly kind: 'clone'; readonly url: string }
  | { readonly kind: 'serve' }
  | { readonly kind: 'sync'; readonly proof: FinalizationProof }
  | { readonly kind: 'clean'; readonly hard: boolean }
  | { readonly kind: 'submit'; readonly transaction: ExtraAgendaTransaction }
  | { readonly kind: 'create-block' }
  | { readonly kind: 'create-agenda' }
  | { readonly kind: 'vote'; readonly target: CommitHash }
  | { readonly kind: 'veto-round' }
  | { readonly kind: 'veto-block'; readonly target: CommitHash }
  | { readonly kind: 'consensus' }
  | { readonly kind: 'show'; readonly commit: CommitHash }
  | { readonly kind: 'update' }
  | { readonly kind: 'broadcast' }
  | {
      readonly kind: 'sign-delegation';
      readonly delegatee: PublicKey;
      readonly governance: boolean;
      readonly blockHeight: number;
    }
  | { readonly kind: 'sign-undelegation'; readonly blockHeight: number }
  | { readonly kind: 'sign-custom'; readonly hash: Hash256 };

function isShell(value: string): value is Shell {
  return SHELLS.some((shell) => shell === value);
}

function unknownCommand(name: string, hint: string): InputError {
  return new InputError(ErrorCode.INVALID_ARGUMENT, `unknown command '${name}'`, 'command', { hint });
}

/** Resolve the one- or two-word command name and its operands. */
function splitCommand(positional: readonly string[]): { name: string; args: string[] } {
  const [first = '', second, ...rest] = positional;
  const subcommands = subcommandsOf(first);
  if (subcommands.length === 0) {
    if (findUsage(first) === undefined) {
      throw unknownCommand(first, `Run '${CLI_NAME} help' for the list of commands.`);
    }
    return { name: first, args: positional.slice(1) };
  }
  const expected = `Expected one of: ${subcommands.join(', ')}.`;
  if (second === undefined) {
    throw new InputError(ErrorCode.INVALID_ARGUMENT, `'${first}' needs a subcommand`, 'command', {
      hint: expected,
    });
  }
  if (!subcommands.includes(second)) {
    throw unknownCommand(`${first} ${second}`, expected);
  }
  return { name: `${first} ${second}`, args: rest };
}

/**
 * Parse and validate a command line.
 *
 * Operands are decoded here, in argument order, so the first malformed one
 * is the one reported. Transactions are stamped with `clock`.
 *
 * @throws {InputError} for an unknown command, a wrong number of
 *   arguments, a flag the command does not take, or a malformed operand.
 */
export function parseCommand(
  positional: readonly string[],
  flags: ReadonlySet<string>,
  clock: Clock,
): Command {
  if (positional.length === 0 || flags.has('help')) {
    const topic = positional.slice(0, 2).join(' ');
    return topic ? { kind: 'help', topic } : { kind: 'help' };
  }

  const { name, args } = splitCommand(positional);
  const topLevel = name.split(' ')[0] ?? name;
  const flagCheck = checkFlags(topLevel, flags);
  if (!flagCheck.ok) throw flagCheck.error;

  const usage = findUsage(name);
  if (usage !== undefined) checkArity(usage, args);

  const arg = (index: number): string => args[index] ?? '';

  switch (name) {
    case 'help':
      return args[0] === undefined ? { kind: 'help' } : { kind: 'help', topic: args[0] };
    case 'version':
      return { kind: 'version' };
    case 'completions': {
      const shell = arg(0);
      if (!isShell(shell)) {
        throw new InputError(ErrorCode.INVALID_ARGUMENT, `unsupported shell '${shell}'`, 'shell', {
          hint: `Supported shells: ${SHELLS.join(', ')}.`,
        });
      }
      return { kind: 'completions', shell };
    }

    case 'genesis':
      return { kind: 'genesis' };
    case 'clone':
      if (arg(0) === '') {
        throw new InputError(ErrorCode.INVALID_ARGUMENT, 'clone url must not be empty', 'url');
      }
      return { kind: 'clone', url: arg(0) };
    case 'serve':
      return { kind: 'serve' };

    case 'sync':
      return { kind: 'sync', proof: decodeFinalizationProof(arg(0)) };
    case 'clean':
      return { kind: 'clean', hard: flags.has('hard') };
    case 'create tx-delegate':
      return {
        kind: 'submit',
        transaction: buildTxDelegate(
          { delegator: arg(0), delegatee: arg(1), governance: arg(2), proof: arg(3) },
          clock,
        ),
      };
    case 'create tx-undelegate':
      return {
        kind: 'submit',
        transaction: buildTxUndelegate({ delegator: arg(0), proof: arg(1) }, clock),
      };
    case 'create block':
      return { kind: 'create-block' };
    case 'create agenda':
      return { kind: 'create-agenda' };
    case 'vote':
      return { kind: 'vote', target: decodeVoteTarget(arg(0)) };
    case 'veto': {
      const commit = args[0];
      return commit === undefined ? { kind: 'veto-round' } : { kind: 'veto-block', target: decodeVetoTarget(commit) };
    }
    case 'consensus':
      return flags.has('show') ? { kind: 'unimplemented', feature: 'consensus --show' } : { kind: 'consensus' };
    case 'show':
      return { kind: 'show', commit: decodeCommitHash(arg(0), 'commit') };
    case 'update':
      return { kind: 'update' };
    case 'broadcast':
      return { kind: 'broadcast' };

    case 'sign tx-delegate':
      return {
        kind: 'sign-delegation',
        delegatee: decodePublicKey(arg(0), Roles.delegationDelegatee),
        governance: decodeGovernance(arg(1)),
        blockHeight: decodeBlockHeight(arg(2)),
      };
    case 'sign tx-undelegate':
      return { kind: 'sign-undelegation', blockHeight: decodeBlockHeight(arg(0)) };
    case 'sign custom':
      return { kind: 'sign-custom', hash: decodeHash256(arg(0)) };

    default:
      // init, create tx-report, git, network, chat, check-push, notify-push
      return { kind: 'unimplemented', feature: name };
  }
}
