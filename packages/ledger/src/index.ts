/**
 * @tessera/ledger: typed values, transaction construction and signing for
 * the governance layer, and the interface of the node that consumes them.
 *
 * @packageDocumentation
 */

export { FixedBytes, decodeHexBytes } from './bytes';

export { CommitHash, Hash256, decodeCommitHash, decodeHash256 } from './hash';

export { PublicKey, Signature } from './values';
export type { TypedSignature, FinalizationProof, FinalizationSignTarget } from './values';

export {
  Roles,
  decodePublicKey,
  decodeSignature,
  decodeTypedSignature,
  decodeFinalizationProof,
  decodeGovernance,
  decodeBlockHeight,
  decodeVoteTarget,
  decodeVetoTarget,
  encodePublicKey,
  encodeTypedSignature,
  encodeFinalizationProof,
} from './decode';
export type { Role } from './decode';

export {
  createClock,
  systemClock,
  describeTransaction,
  buildTxDelegate,
  buildTxUndelegate,
  buildDelegationData,
  buildUndelegationData,
} from './transaction';
export type {
  Timestamp,
  Clock,
  DelegationTransactionData,
  UndelegationTransactionData,
  TxDelegate,
  TxUndelegate,
  TxReport,
  ExtraAgendaTransaction,
  TxDelegateFields,
  TxUndelegateFields,
} from './transaction';

export {
  DelegationTarget,
  UndelegationTarget,
  FinalizationTarget,
  signingMessage,
  signTyped,
  verifyTyped,
  signHash,
  verifyHash,
} from './signer';
export type { SignTarget } from './signer';

export { hashBlockHeader } from './commit';
export type { BlockHeader, CommitInfo } from './commit';

export { loadNodeProvider } from './node';
export type { Config, LedgerNode, NodeProvider } from './node';
