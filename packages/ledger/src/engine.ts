/**
 * @settlekit/ledger — Transaction state engine.
 *
 * Applies one validated record at a time against the client ledger,
 * using the transaction history and dispute set to enforce the
 * business rules. Pure with respect to I/O.
 *
 * API surface:
 * - apply() — Apply one record; returns a typed result, never throws
 * - account() / accounts() — Read-only account views
 * - isDisputed() / disputedIds() — Dispute set queries
 * - historyEntry() — Look up an applied transfer
 * - snapshot() — Deterministic JSON-safe state
 *
 * Per-transaction lifecycle:
 *   normal ──dispute──▶ disputed ──resolve──▶ normal
 *                           └──chargeback──▶ charged back (account locked)
 */

import type {
  ClientId,
  ReferenceRecord,
  TransactionRecord,
  TransferRecord,
  TxId,
} from "@settlekit/types";
import { ClientLedger } from "./client-ledger.js";
import { DisputeSet, TransactionHistory, TransactionIdSet } from "./history.js";
import type {
  AccountView,
  ApplyResult,
  ClientAccount,
  DisputePolicy,
  HistoryEntry,
  LedgerSnapshot,
  TransactionErrorCode,
} from "./types.js";
import { DEFAULT_DISPUTE_POLICY, TransactionError } from "./types.js";

const APPLIED: ApplyResult = { ok: true };

function reject(
  code: TransactionErrorCode,
  record: TransactionRecord,
  message: string,
): ApplyResult {
  return {
    ok: false,
    error: new TransactionError(code, message, {
      clientId: record.clientId,
      txId: record.txId,
    }),
  };
}

export interface StateEngineOptions {
  readonly policy?: Partial<DisputePolicy> | undefined;
}

export class StateEngine {
  private readonly _ledger = new ClientLedger();
  private readonly _history = new TransactionHistory();
  private readonly _disputes = new DisputeSet();
  private readonly _chargedBack = new TransactionIdSet();
  private readonly _policy: DisputePolicy;

  constructor(options?: StateEngineOptions) {
    this._policy = { ...DEFAULT_DISPUTE_POLICY, ...options?.policy };
  }

  get policy(): DisputePolicy {
    return this._policy;
  }

  // ─── Apply (The Only Write Operation) ────────────────────────────────

  /**
   * Apply a single record. Records must be applied in input order.
   *
   * A rejected record has no effect beyond lazily creating the
   * client's account for deposits and withdrawals.
   */
  apply(record: TransactionRecord): ApplyResult {
    switch (record.kind) {
      case "deposit":
        return this._deposit(record);
      case "withdrawal":
        return this._withdraw(record);
      case "dispute":
        return this._dispute(record);
      case "resolve":
        return this._resolve(record);
      case "chargeback":
        return this._chargeback(record);
    }
  }

  // ─── Transfers ───────────────────────────────────────────────────────

  private _checkTransfer(record: TransferRecord): ApplyResult | ClientAccount {
    const account = this._ledger.getOrCreate(record.clientId);

    if (this._history.has(record.txId)) {
      return reject(
        "DUPLICATE_TRANSACTION",
        record,
        `Transaction ${String(record.txId)} already exists`,
      );
    }
    if (account.locked) {
      return reject(
        "ACCOUNT_LOCKED",
        record,
        `Client ${String(record.clientId)} is locked`,
      );
    }
    return account;
  }

  private _deposit(record: TransferRecord): ApplyResult {
    const checked = this._checkTransfer(record);
    if ("ok" in checked) return checked;

    checked.available += record.amount;
    this._history.record(record);
    return APPLIED;
  }

  private _withdraw(record: TransferRecord): ApplyResult {
    const checked = this._checkTransfer(record);
    if ("ok" in checked) return checked;

    if (checked.available < record.amount) {
      return reject(
        "INSUFFICIENT_FUNDS",
        record,
        `Client ${String(record.clientId)} has insufficient funds for transaction ${String(record.txId)}`,
      );
    }

    checked.available -= record.amount;
    this._history.record(record);
    return APPLIED;
  }

  // ─── Dispute Lifecycle ───────────────────────────────────────────────

  /**
   * Shared ownership and lock checks for dispute, resolve and chargeback.
   */
  private _checkReference(
    record: ReferenceRecord,
    entry: HistoryEntry,
  ): ApplyResult | ClientAccount {
    if (entry.clientId !== record.clientId) {
      return reject(
        "CLIENT_MISMATCH",
        record,
        `Transaction ${String(record.txId)} belongs to client ${String(entry.clientId)}, not ${String(record.clientId)}`,
      );
    }

    const account = this._ledger.getOrCreate(entry.clientId);
    if (account.locked && this._policy.lockedAccountDisputes === "reject") {
      return reject(
        "ACCOUNT_LOCKED",
        record,
        `Client ${String(record.clientId)} is locked`,
      );
    }
    return account;
  }

  private _dispute(record: ReferenceRecord): ApplyResult {
    const entry = this._history.get(record.txId);
    if (entry === undefined) {
      return reject(
        "TRANSACTION_NOT_FOUND",
        record,
        `Transaction ${String(record.txId)} does not exist`,
      );
    }

    const checked = this._checkReference(record, entry);
    if ("ok" in checked) return checked;

    if (
      this._chargedBack.has(record.txId) &&
      this._policy.redisputeAfterChargeback === "reject"
    ) {
      return reject(
        "TRANSACTION_CHARGED_BACK",
        record,
        `Transaction ${String(record.txId)} has already been charged back`,
      );
    }
    if (this._disputes.has(record.txId)) {
      return reject(
        "ALREADY_DISPUTED",
        record,
        `Transaction ${String(record.txId)} is already disputed`,
      );
    }

    checked.available -= entry.amount;
    checked.held += entry.amount;
    this._disputes.add(record.txId);
    return APPLIED;
  }

  /**
   * Look up a transaction that must currently be under dispute.
   */
  private _disputedEntry(record: ReferenceRecord): HistoryEntry | ApplyResult {
    const entry = this._history.get(record.txId);
    if (entry === undefined || !this._disputes.has(record.txId)) {
      return reject(
        "TRANSACTION_NOT_DISPUTED",
        record,
        `Transaction ${String(record.txId)} is not under dispute`,
      );
    }
    return entry;
  }

  private _resolve(record: ReferenceRecord): ApplyResult {
    const entry = this._disputedEntry(record);
    if ("ok" in entry) return entry;

    const checked = this._checkReference(record, entry);
    if ("ok" in checked) return checked;

    checked.held -= entry.amount;
    checked.available += entry.amount;
    this._disputes.delete(record.txId);
    return APPLIED;
  }

  private _chargeback(record: ReferenceRecord): ApplyResult {
    const entry = this._disputedEntry(record);
    if ("ok" in entry) return entry;

    const checked = this._checkReference(record, entry);
    if ("ok" in checked) return checked;

    checked.held -= entry.amount;
    checked.locked = true;
    this._disputes.delete(record.txId);
    this._chargedBack.add(record.txId);
    return APPLIED;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  account(clientId: ClientId): AccountView | undefined {
    return this._ledger.get(clientId);
  }

  /**
   * All accounts, sorted by client id.
   */
  accounts(): readonly AccountView[] {
    return this._ledger.accounts();
  }

  isDisputed(txId: TxId): boolean {
    return this._disputes.has(txId);
  }

  disputedIds(): readonly TxId[] {
    return this._disputes.ids();
  }

  isChargedBack(txId: TxId): boolean {
    return this._chargedBack.has(txId);
  }

  historyEntry(txId: TxId): HistoryEntry | undefined {
    return this._history.get(txId);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      accounts: this._ledger.accounts().map((a) => ({
        clientId: a.clientId,
        available: a.available.toString(),
        held: a.held.toString(),
        total: a.total.toString(),
        locked: a.locked,
      })),
      transactions: this._history.entries().map(([txId, e]) => ({
        txId,
        clientId: e.clientId,
        kind: e.kind,
        amount: e.amount.toString(),
      })),
      disputed: this._disputes.ids(),
      chargedBack: this._chargedBack.ids(),
    };
  }
}
