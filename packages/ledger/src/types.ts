/**
 * @settlekit/ledger — Types for the transaction state engine.
 *
 * Rules:
 * - Views handed out of the engine are readonly copies
 * - Rejections are values, never thrown
 * - The error taxonomy is closed: one code per rejection rule
 */

import type { ClientId, MinorUnits, TransferKind, TxId } from "@settlekit/types";

// ─── Accounts ────────────────────────────────────────────────────────────

/**
 * Mutable account state. Only the engine holds references to these.
 */
export interface ClientAccount {
  readonly clientId: ClientId;
  available: MinorUnits;
  held: MinorUnits;
  locked: boolean;
}

/**
 * Read-only account view with the derived total.
 */
export interface AccountView {
  readonly clientId: ClientId;
  readonly available: MinorUnits;
  readonly held: MinorUnits;
  /** Always available + held. */
  readonly total: MinorUnits;
  readonly locked: boolean;
}

// ─── History ─────────────────────────────────────────────────────────────

/**
 * A successfully applied deposit or withdrawal, kept for later
 * dispute lookups. Never removed.
 */
export interface HistoryEntry {
  readonly clientId: ClientId;
  readonly amount: MinorUnits;
  readonly kind: TransferKind;
}

// ─── Dispute Policy ──────────────────────────────────────────────────────

export type PolicyDecision = "reject" | "allow";

/**
 * Rules the dispute lifecycle leaves open.
 */
export interface DisputePolicy {
  /**
   * Whether dispute, resolve and chargeback are accepted on a locked
   * account. Rejected with ACCOUNT_LOCKED otherwise.
   */
  readonly lockedAccountDisputes: PolicyDecision;

  /**
   * Whether a charged-back transaction can be disputed again.
   * Rejected with TRANSACTION_CHARGED_BACK otherwise.
   */
  readonly redisputeAfterChargeback: PolicyDecision;
}

export const DEFAULT_DISPUTE_POLICY: DisputePolicy = {
  lockedAccountDisputes: "reject",
  redisputeAfterChargeback: "reject",
} as const;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Rejection codes for engine operations. */
export type TransactionErrorCode =
  | "DUPLICATE_TRANSACTION"
  | "INSUFFICIENT_FUNDS"
  | "ACCOUNT_LOCKED"
  | "TRANSACTION_NOT_FOUND"
  | "ALREADY_DISPUTED"
  | "TRANSACTION_NOT_DISPUTED"
  | "CLIENT_MISMATCH"
  | "TRANSACTION_CHARGED_BACK";

/**
 * Structured rejection of a single record.
 * Returned inside an ApplyResult, not thrown.
 */
export class TransactionError extends Error {
  public readonly code: TransactionErrorCode;
  public readonly clientId: ClientId;
  public readonly txId: TxId;

  constructor(
    code: TransactionErrorCode,
    message: string,
    context: { readonly clientId: ClientId; readonly txId: TxId },
  ) {
    super(message);
    this.name = "TransactionError";
    this.code = code;
    this.clientId = context.clientId;
    this.txId = context.txId;
  }
}

// ─── Apply ───────────────────────────────────────────────────────────────

export type ApplyResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: TransactionError };

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface AccountSnapshot {
  readonly clientId: ClientId;
  /** Minor units as a decimal string (JSON has no bigint). */
  readonly available: string;
  readonly held: string;
  readonly total: string;
  readonly locked: boolean;
}

export interface HistorySnapshot {
  readonly txId: TxId;
  readonly clientId: ClientId;
  readonly kind: TransferKind;
  readonly amount: string;
}

/**
 * Deterministic, JSON-safe view of the full engine state.
 * Every list is sorted by id.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly accounts: readonly AccountSnapshot[];
  readonly transactions: readonly HistorySnapshot[];
  readonly disputed: readonly TxId[];
  readonly chargedBack: readonly TxId[];
}
