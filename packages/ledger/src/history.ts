/**
 * @settlekit/ledger — Transaction history and dispute tracking.
 *
 * The history is append-only: entries for applied deposits and
 * withdrawals are never removed, so a transaction stays resolvable
 * after its dispute ends.
 */

import type { TransferRecord, TxId } from "@settlekit/types";
import type { HistoryEntry } from "./types.js";

export class TransactionHistory {
  private readonly _entries: Map<TxId, HistoryEntry> = new Map();

  has(txId: TxId): boolean {
    return this._entries.has(txId);
  }

  get(txId: TxId): HistoryEntry | undefined {
    return this._entries.get(txId);
  }

  /**
   * Record an applied transfer. The caller has already checked
   * that the id is unused.
   */
  record(record: TransferRecord): void {
    this._entries.set(record.txId, {
      clientId: record.clientId,
      amount: record.amount,
      kind: record.kind,
    });
  }

  /**
   * All entries, sorted by transaction id.
   */
  entries(): readonly (readonly [TxId, HistoryEntry])[] {
    return [...this._entries.entries()].sort(([a], [b]) => a - b);
  }

  get size(): number {
    return this._entries.size;
  }
}

/**
 * A set of transaction ids with sorted enumeration.
 * Used for the open disputes and for charged-back transactions.
 */
export class TransactionIdSet {
  private readonly _ids: Set<TxId> = new Set();

  has(txId: TxId): boolean {
    return this._ids.has(txId);
  }

  add(txId: TxId): void {
    this._ids.add(txId);
  }

  delete(txId: TxId): boolean {
    return this._ids.delete(txId);
  }

  ids(): readonly TxId[] {
    return [...this._ids].sort((a, b) => a - b);
  }

  get size(): number {
    return this._ids.size;
  }
}

/** Transactions currently under dispute. */
export class DisputeSet extends TransactionIdSet {}
