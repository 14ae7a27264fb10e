/**
 * Command execution.
 *
 * Runs a validated {@link Command}: at most one node lifecycle call per
 * invocation, signing offline with the configured key, and output returned
 * as lines for the caller to print.
 *
 * @packageDocumentation
 */

import {
  DelegationTarget,
  UndelegationTarget,
  buildDelegationData,
  buildUndelegationData,
  describeTransaction,
  encodeTypedSignature,
  hashBlockHeader,
  signHash,
  signTyped,
} from '@tessera/ledger';
import type {
  BlockHeader,
  Clock,
  CommitInfo,
  Config,
  LedgerNode,
  NodeProvider,
  SignTarget,
  Timestamp,
  TypedSignature,
} from '@tessera/ledger';
import {
  ErrorCode,
  NodeError,
  NotImplementedError,
  TesseraError,
  assertNever,
  classifyError,
} from '@tessera/types';
import type { Logger } from '@tessera/types';

import type { Command } from './commands';
import { bashCompletions, fishCompletions, zshCompletions } from './completions';
import { keyValue, success } from './format';
import { CLI_NAME, CLI_VERSION, helpText } from './usage';

// ─── Context ──────────────────────────────────────────────────────────────────

export interface RouterContext {
  /** Node working directory. */
  readonly path: string;
  readonly json: boolean;
  readonly clock: Clock;
  readonly logger: Logger;
  loadConfig(): Promise<Config>;
  loadProvider(config: Config): Promise<NodeProvider>;
}

/** Commands that go through the node provider. */
type NodeCommand = Exclude<
  Command,
  { kind: 'help' | 'version' | 'completions' | 'unimplemented' | 'sign-delegation' | 'sign-undelegation' | 'sign-custom' }
>;

// ─── Node calls ───────────────────────────────────────────────────────────────

/**
 * Call into the node. Errors the node raises in this taxonomy pass through
 * unchanged, integrity violations included; anything else becomes a
 * `NODE_OPERATION_FAILED` naming the operation.
 */
async function nodeCall<T>(operation: string, logger: Logger, call: () => Promise<T>): Promise<T> {
  logger.debug('node call', { operation });
  try {
    return await call();
  } catch (err) {
    if (err instanceof TesseraError || classifyError(err) !== 'unknown') {
      throw err;
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new NodeError(ErrorCode.NODE_OPERATION_FAILED, `${operation} failed: ${message}`, {
      cause: err instanceof Error ? err : undefined,
      context: { operation },
    });
  }
}

function done(ctx: RouterContext, command: string, message: string, fields: Record<string, unknown> = {}): string[] {
  if (ctx.json) {
    return [JSON.stringify({ command, status: 'ok', ...fields })];
  }
  return [success(message)];
}

// ─── Output of show ───────────────────────────────────────────────────────────

function showBlock(ctx: RouterContext, header: BlockHeader): string[] {
  const hash = hashBlockHeader(header).toHex();
  if (ctx.json) {
    return [JSON.stringify({ type: 'block', hash, blockHeader: header })];
  }
  return [
    `hash: ${hash}`,
    keyValue([
      ['height', String(header.height)],
      ['author', header.author.toHex()],
      ['timestamp', String(header.timestamp)],
      ['previous hash', header.previousHash.toHex()],
      ['finalization round', String(header.previousFinalizationProof.round)],
      ['commit merkle root', header.commitMerkleRoot.toHex()],
      ['repository merkle root', header.repositoryMerkleRoot.toHex()],
      ['version', header.version],
    ]),
  ];
}

function showCommit(ctx: RouterContext, info: CommitInfo): string[] {
  switch (info.type) {
    case 'block':
      return showBlock(ctx, info.blockHeader);
    case 'agenda':
    case 'agenda-proof':
    case 'transaction':
    case 'extra-agenda-transaction':
    case 'chat-log':
      throw new NotImplementedError(`show for ${info.type} commits`);
    default:
      return assertNever(info);
  }
}

// ─── Signing ──────────────────────────────────────────────────────────────────

/**
 * Sign a transaction payload. Text output is the proof on the first line,
 * then the height and timestamp it was signed for: a verifier needs both
 * to rebuild the payload.
 */
async function signPayload<T extends { readonly blockHeight: number; readonly timestamp: Timestamp }>(
  ctx: RouterContext,
  config: Config,
  target: SignTarget<T>,
  payload: T,
): Promise<string[]> {
  const proof: TypedSignature<T> = await signTyped(target, payload, config.privateKey);
  ctx.logger.info('signed payload', { kind: target.kind, signer: proof.signer.toHex() });
  if (ctx.json) {
    return [
      JSON.stringify({
        payload: target.encode(payload),
        proof: { signature: proof.signature.toHex(), signer: proof.signer.toHex() },
      }),
    ];
  }
  return [
    encodeTypedSignature(proof),
    keyValue([
      ['block height', String(payload.blockHeight)],
      ['timestamp', String(payload.timestamp)],
    ]),
  ];
}

// ─── Dispatch ─────────────────────────────────────────────────────────────────

async function runOnNode(
  ctx: RouterContext,
  provider: NodeProvider,
  config: Config,
  command: NodeCommand,
): Promise<string[]> {
  const { logger, path } = ctx;
  const node = (): Promise<LedgerNode> => nodeCall('initialize', logger, () => provider.initialize(config, path));

  switch (command.kind) {
    case 'genesis':
      await nodeCall('genesis', logger, () => provider.genesis(config, path));
      return done(ctx, 'genesis', 'genesis commit created');
    case 'clone': {
      const { url } = command;
      await nodeCall('clone', logger, () => provider.clone(config, path, url));
      return done(ctx, 'clone', `cloned ${url}`, { url });
    }
    case 'serve':
      await nodeCall('serve', logger, () => provider.serve(config, path));
      return done(ctx, 'serve', 'server stopped');

    case 'sync': {
      const { proof } = command;
      const n = await node();
      await nodeCall('sync', logger, () => n.sync(proof));
      return done(ctx, 'sync', `synced to finalization round ${proof.round}`, { round: proof.round });
    }
    case 'clean': {
      const { hard } = command;
      const n = await node();
      await nodeCall('clean', logger, () => n.clean(hard));
      return done(ctx, 'clean', hard ? 'repository cleaned (hard)' : 'repository cleaned', { hard });
    }
    case 'submit': {
      const { transaction } = command;
      const summary = describeTransaction(transaction);
      logger.info('submitting transaction', { transaction: summary });
      const n = await node();
      await nodeCall('createExtraAgendaTransaction', logger, () => n.createExtraAgendaTransaction(transaction));
      return done(ctx, 'create', `transaction created: ${summary}`, { transaction: summary });
    }
    case 'create-block': {
      const n = await node();
      await nodeCall('createBlock', logger, () => n.createBlock());
      return done(ctx, 'create', 'block created');
    }
    case 'create-agenda': {
      const n = await node();
      await nodeCall('createAgenda', logger, () => n.createAgenda());
      return done(ctx, 'create', 'agenda created');
    }
    case 'vote': {
      const { target } = command;
      const n = await node();
      await nodeCall('vote', logger, () => n.vote(target));
      return done(ctx, 'vote', `voted on agenda ${target.toHex()}`, { commit: target.toHex() });
    }
    case 'veto-round': {
      const n = await node();
      await nodeCall('vetoRound', logger, () => n.vetoRound());
      return done(ctx, 'veto', 'vetoed the current round');
    }
    case 'veto-block': {
      const { target } = command;
      const n = await node();
      await nodeCall('vetoBlock', logger, () => n.vetoBlock(target));
      return done(ctx, 'veto', `vetoed block ${target.toHex()}`, { commit: target.toHex() });
    }
    case 'consensus': {
      const n = await node();
      await nodeCall('progressForConsensus', logger, () => n.progressForConsensus());
      return done(ctx, 'consensus', 'consensus progressed');
    }
    case 'show': {
      const { commit } = command;
      const n = await node();
      const info = await nodeCall('show', logger, () => n.show(commit));
      return showCommit(ctx, info);
    }
    case 'update': {
      const n = await node();
      await nodeCall('fetch', logger, () => n.fetch());
      return done(ctx, 'update', 'fetched from peers');
    }
    case 'broadcast': {
      const n = await node();
      await nodeCall('broadcast', logger, () => n.broadcast());
      return done(ctx, 'broadcast', 'broadcast to peers');
    }
    default:
      return assertNever(command);
  }
}

/**
 * Execute a command and return the lines it prints on stdout.
 *
 * Configuration is read only by commands that need it, and the node
 * provider is loaded only by commands that call it.
 */
export async function executeCommand(ctx: RouterContext, command: Command): Promise<string[]> {
  switch (command.kind) {
    case 'help':
      return [helpText(command.topic)];
    case 'version':
      return [ctx.json ? JSON.stringify({ name: CLI_NAME, version: CLI_VERSION }) : `${CLI_NAME} ${CLI_VERSION}`];
    case 'completions':
      switch (command.shell) {
        case 'bash':
          return [bashCompletions()];
        case 'zsh':
          return [zshCompletions()];
        case 'fish':
          return [fishCompletions()];
        default:
          return assertNever(command.shell);
      }
    case 'unimplemented':
      throw new NotImplementedError(command.feature);

    case 'sign-delegation': {
      const config = await ctx.loadConfig();
      const data = buildDelegationData(
        {
          delegator: config.publicKey,
          delegatee: command.delegatee,
          governance: command.governance,
          blockHeight: command.blockHeight,
        },
        ctx.clock,
      );
      return signPayload(ctx, config, DelegationTarget, data);
    }
    case 'sign-undelegation': {
      const config = await ctx.loadConfig();
      const data = buildUndelegationData({ delegator: config.publicKey, blockHeight: command.blockHeight }, ctx.clock);
      return signPayload(ctx, config, UndelegationTarget, data);
    }
    case 'sign-custom': {
      const config = await ctx.loadConfig();
      const signature = await signHash(command.hash, config.privateKey);
      if (ctx.json) {
        return [
          JSON.stringify({
            hash: command.hash.toHex(),
            signature: signature.toHex(),
            signer: config.publicKey.toHex(),
          }),
        ];
      }
      return [signature.toHex()];
    }

    default: {
      const config = await ctx.loadConfig();
      const provider = await ctx.loadProvider(config);
      return runOnNode(ctx, provider, config, command);
    }
  }
}
