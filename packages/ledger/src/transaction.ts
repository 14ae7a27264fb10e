/**
 * Governance transaction payloads and their builders.
 *
 * Builders decode operator text field by field (delegator, delegatee,
 * governance, proof), stop at the first malformed field, and stamp the
 * result with the current time. Every value they return is frozen.
 *
 * @packageDocumentation
 */

import { assertNever, freezeDeep } from '@tessera/types';

import {
  Roles,
  decodeGovernance,
  decodePublicKey,
  decodeTypedSignature,
} from './decode';
import type { PublicKey, TypedSignature } from './values';

// ─── Time ─────────────────────────────────────────────────────────────────────

/** Milliseconds since the Unix epoch. */
export type Timestamp = number;

/** A source of timestamps. */
export type Clock = () => Timestamp;

/**
 * Wrap a wall clock so that it never goes backwards within this process.
 *
 * @param now - Underlying clock, `Date.now` by default.
 */
export function createClock(now: () => number = Date.now): Clock {
  let last = 0;
  return () => {
    last = Math.max(last, Math.floor(now()));
    return last;
  };
}

/** Process-wide default clock. */
export const systemClock: Clock = createClock();

// ─── Signing payloads ─────────────────────────────────────────────────────────

/** Request to move the delegator's voting weight to the delegatee. */
export interface DelegationTransactionData {
  readonly delegator: PublicKey;
  readonly delegatee: PublicKey;
  readonly governance: boolean;
  readonly blockHeight: number;
  readonly timestamp: Timestamp;
}

/** Request to reverse the delegator's active delegation. */
export interface UndelegationTransactionData {
  readonly delegator: PublicKey;
  readonly blockHeight: number;
  readonly timestamp: Timestamp;
}

// ─── Extra-agenda transactions ────────────────────────────────────────────────

export interface TxDelegate {
  readonly delegator: PublicKey;
  readonly delegatee: PublicKey;
  readonly governance: boolean;
  readonly proof: TypedSignature<DelegationTransactionData>;
  readonly timestamp: Timestamp;
}

export interface TxUndelegate {
  readonly delegator: PublicKey;
  readonly proof: TypedSignature<UndelegationTransactionData>;
  readonly timestamp: Timestamp;
}

/** Reserved: report transactions have no fields yet. */
export interface TxReport {
  readonly timestamp: Timestamp;
}

/** A governance-layer transaction submitted outside the block agenda. */
export type ExtraAgendaTransaction =
  | { readonly type: 'delegate'; readonly tx: TxDelegate }
  | { readonly type: 'undelegate'; readonly tx: TxUndelegate }
  | { readonly type: 'report'; readonly tx: TxReport };

/**
 * One-line summary of a transaction for logs and command output.
 * Never includes proof bytes.
 */
export function describeTransaction(transaction: ExtraAgendaTransaction): string {
  switch (transaction.type) {
    case 'delegate':
      return `delegate ${transaction.tx.delegator.toHex()} -> ${transaction.tx.delegatee.toHex()} (governance: ${transaction.tx.governance})`;
    case 'undelegate':
      return `undelegate ${transaction.tx.delegator.toHex()}`;
    case 'report':
      return 'report';
    default:
      return assertNever(transaction);
  }
}

// ─── Builders ─────────────────────────────────────────────────────────────────

/** Operator text for `create tx-delegate`. */
export interface TxDelegateFields {
  delegator: string;
  delegatee: string;
  governance: string;
  proof: string;
}

/** Operator text for `create tx-undelegate`. */
export interface TxUndelegateFields {
  delegator: string;
  proof: string;
}

/**
 * Build a delegation transaction from operator text.
 *
 * @throws {InputError} for the first malformed field, in the order
 *   delegator, delegatee, governance, proof.
 */
export function buildTxDelegate(
  fields: TxDelegateFields,
  clock: Clock = systemClock,
): ExtraAgendaTransaction {
  const delegator = decodePublicKey(fields.delegator, Roles.delegationDelegator);
  const delegatee = decodePublicKey(fields.delegatee, Roles.delegationDelegatee);
  const governance = decodeGovernance(fields.governance, Roles.delegationGovernance);
  const proof = decodeTypedSignature<DelegationTransactionData>(fields.proof, Roles.delegationProof);
  const transaction: ExtraAgendaTransaction = {
    type: 'delegate',
    tx: { delegator, delegatee, governance, proof, timestamp: clock() },
  };
  return freezeDeep(transaction);
}

/**
 * Build an undelegation transaction from operator text.
 *
 * @throws {InputError} for the first malformed field (delegator, then proof).
 */
export function buildTxUndelegate(
  fields: TxUndelegateFields,
  clock: Clock = systemClock,
): ExtraAgendaTransaction {
  const delegator = decodePublicKey(fields.delegator, Roles.undelegationDelegator);
  const proof = decodeTypedSignature<UndelegationTransactionData>(fields.proof, Roles.undelegationProof);
  const transaction: ExtraAgendaTransaction = {
    type: 'undelegate',
    tx: { delegator, proof, timestamp: clock() },
  };
  return freezeDeep(transaction);
}

/** Assemble the payload signed by `sign tx-delegate`. */
export function buildDelegationData(
  fields: { delegator: PublicKey; delegatee: PublicKey; governance: boolean; blockHeight: number },
  clock: Clock = systemClock,
): DelegationTransactionData {
  return freezeDeep({ ...fields, timestamp: clock() });
}

/** Assemble the payload signed by `sign tx-undelegate`. */
export function buildUndelegationData(
  fields: { delegator: PublicKey; blockHeight: number },
  clock: Clock = systemClock,
): UndelegationTransactionData {
  return freezeDeep({ ...fields, timestamp: clock() });
}
