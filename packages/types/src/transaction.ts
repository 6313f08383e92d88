/**
 * Transaction Types
 *
 * The unit of work consumed by the state engine.
 *
 * Rules:
 * - Records are immutable after construction
 * - The shape encodes validity: only transfer kinds carry an amount
 * - Amounts are bigint minor units (never floating point)
 */

/**
 * Account owner identifier. Unsigned 16-bit integer.
 */
export type ClientId = number;

/**
 * Transaction identifier. Unsigned 32-bit integer, globally unique
 * among deposits and withdrawals.
 */
export type TxId = number;

/**
 * A non-negative amount scaled by 10^decimals.
 * "1.5" at 4 decimals → 15000n
 */
export type MinorUnits = bigint;

/** Kinds that move money into or out of an account. */
export type TransferKind = "deposit" | "withdrawal";

/** Kinds that reference an earlier transfer by its id. */
export type ReferenceKind = "dispute" | "resolve" | "chargeback";

export type TransactionKind = TransferKind | ReferenceKind;

/**
 * A deposit or withdrawal. Always carries an amount.
 */
export interface TransferRecord {
  readonly kind: TransferKind;
  readonly clientId: ClientId;
  readonly txId: TxId;
  readonly amount: MinorUnits;
}

/**
 * A dispute, resolve or chargeback. Never carries an amount;
 * the amount is looked up from the referenced transfer.
 */
export interface ReferenceRecord {
  readonly kind: ReferenceKind;
  readonly clientId: ClientId;
  readonly txId: TxId;
}

export type TransactionRecord = TransferRecord | ReferenceRecord;

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TX_ID = 0xffff_ffff;
