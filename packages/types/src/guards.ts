/**
 * Runtime Type Guards
 *
 * Narrowing functions for settlekit domain types.
 * Used at system boundaries (parsed rows, deserialized fixtures)
 * and to discriminate records inside the engine.
 */

import type {
  ReferenceKind,
  ReferenceRecord,
  TransactionKind,
  TransactionRecord,
  TransferKind,
  TransferRecord,
} from "./transaction.js";
import { MAX_CLIENT_ID, MAX_TX_ID } from "./transaction.js";

const TRANSFER_KINDS = new Set<string>(["deposit", "withdrawal"]);
const REFERENCE_KINDS = new Set<string>(["dispute", "resolve", "chargeback"]);

export function isTransferKind(value: unknown): value is TransferKind {
  return typeof value === "string" && TRANSFER_KINDS.has(value);
}

export function isReferenceKind(value: unknown): value is ReferenceKind {
  return typeof value === "string" && REFERENCE_KINDS.has(value);
}

export function isTransactionKind(value: unknown): value is TransactionKind {
  return isTransferKind(value) || isReferenceKind(value);
}

export function isClientId(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CLIENT_ID
  );
}

export function isTxId(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_TX_ID
  );
}

export function isTransferRecord(record: TransactionRecord): record is TransferRecord {
  return isTransferKind(record.kind);
}

export function isReferenceRecord(record: TransactionRecord): record is ReferenceRecord {
  return isReferenceKind(record.kind);
}

/**
 * Full structural check for an unknown value.
 * Rejects transfers without a non-negative bigint amount and
 * references that carry any amount at all.
 */
export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (!isClientId(v.clientId) || !isTxId(v.txId)) return false;

  if (isTransferKind(v.kind)) {
    return typeof v.amount === "bigint" && v.amount >= 0n;
  }
  if (isReferenceKind(v.kind)) {
    return !("amount" in v);
  }
  return false;
}
