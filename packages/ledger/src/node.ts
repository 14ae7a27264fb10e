/**
 * Interface to the ledger node.
 *
 * Consensus, gossip, repository storage and integrity checks live in the
 * node, which this package only calls. A node is any module whose default
 * export implements {@link NodeProvider}.
 *
 * @packageDocumentation
 */

import { ErrorCode, NodeError } from '@tessera/types';

import type { CommitInfo } from './commit';
import type { CommitHash } from './hash';
import type { ExtraAgendaTransaction } from './transaction';
import type { FinalizationProof, PublicKey } from './values';

/** Node configuration, read once from `config.json`. */
export interface Config {
  readonly publicKey: PublicKey;
  /** 32-byte Ed25519 private key. Never logged, persisted or transmitted. */
  readonly privateKey: Uint8Array;
  /** Module specifier of the node provider. */
  readonly nodeModule?: string;
  /** Every other field of `config.json`, passed through untouched. */
  readonly extra: Readonly<Record<string, unknown>>;
}

/** An initialized node working on one repository. */
export interface LedgerNode {
  sync(lastFinalizationProof: FinalizationProof): Promise<void>;
  clean(hard: boolean): Promise<void>;
  createExtraAgendaTransaction(transaction: ExtraAgendaTransaction): Promise<void>;
  createBlock(): Promise<void>;
  createAgenda(): Promise<void>;
  vote(agendaCommit: CommitHash): Promise<void>;
  vetoRound(): Promise<void>;
  vetoBlock(blockCommit: CommitHash): Promise<void>;
  progressForConsensus(): Promise<void>;
  fetch(): Promise<void>;
  broadcast(): Promise<void>;
  show(commit: CommitHash): Promise<CommitInfo>;
}

/** Entry points of a node implementation. */
export interface NodeProvider {
  genesis(config: Config, path: string): Promise<void>;
  clone(config: Config, path: string, url: string): Promise<void>;
  initialize(config: Config, path: string): Promise<LedgerNode>;
  serve(config: Config, path: string): Promise<void>;
}

const PROVIDER_METHODS = ['genesis', 'clone', 'initialize', 'serve'] as const;

function isNodeProvider(value: unknown): value is NodeProvider {
  if (typeof value !== 'object' || value === null) return false;
  return PROVIDER_METHODS.every((name) => name in value && typeof Reflect.get(value, name) === 'function');
}

/**
 * Import a node provider from a module specifier (package name or file URL).
 *
 * @throws {NodeError} `NODE_UNAVAILABLE` when the module cannot be imported
 *   or its default export is not a provider.
 */
export async function loadNodeProvider(specifier: string): Promise<NodeProvider> {
  let imported: unknown;
  try {
    imported = await import(specifier);
  } catch (err) {
    throw new NodeError(
      ErrorCode.NODE_UNAVAILABLE,
      `could not load node module '${specifier}': ${err instanceof Error ? err.message : String(err)}`,
      { cause: err instanceof Error ? err : undefined, hint: 'Set "nodeModule" in config.json to an installed node package.' },
    );
  }
  const provider: unknown = typeof imported === 'object' && imported !== null ? Reflect.get(imported, 'default') : undefined;
  if (!isNodeProvider(provider)) {
    throw new NodeError(
      ErrorCode.NODE_UNAVAILABLE,
      `node module '${specifier}' must export a default object with ${PROVIDER_METHODS.join(', ')}`,
    );
  }
  return provider;
}
