import { canonicalizeJson } from '@tessera/crypto';

import { Hash256 } from './hash';
import type { CommitHash } from './hash';
import type { ExtraAgendaTransaction, Timestamp } from './transaction';
import type { FinalizationProof, PublicKey } from './values';

export interface BlockHeader {
  readonly author: PublicKey;
  readonly previousHash: Hash256;
  readonly previousFinalizationProof: FinalizationProof;
  readonly height: number;
  readonly timestamp: Timestamp;
  readonly commitMerkleRoot: Hash256;
  readonly repositoryMerkleRoot: Hash256;
  readonly version: string;
}

/** What a commit in the ledger repository holds, as reported by `show`. */
export type CommitInfo =
  | { readonly type: 'block'; readonly blockHeader: BlockHeader }
  | { readonly type: 'agenda'; readonly height: number; readonly author: PublicKey }
  | { readonly type: 'agenda-proof'; readonly agendaHash: Hash256 }
  | { readonly type: 'transaction'; readonly head: string; readonly body: string }
  | { readonly type: 'extra-agenda-transaction'; readonly transaction: ExtraAgendaTransaction }
  | { readonly type: 'chat-log'; readonly parent: CommitHash };

/** Content hash of a block header: SHA-256 of its canonical JSON. */
export function hashBlockHeader(header: BlockHeader): Hash256 {
  return Hash256.digest(new TextEncoder().encode(canonicalizeJson(header)));
}
