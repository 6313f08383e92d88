/**
 * @settlekit/types — Shared domain types for the settlekit stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Illegal record shapes are unrepresentable
 */

// Transaction types
export type {
  ClientId,
  TxId,
  MinorUnits,
  TransferKind,
  ReferenceKind,
  TransactionKind,
  TransferRecord,
  ReferenceRecord,
  TransactionRecord,
} from "./transaction.js";

export { MAX_CLIENT_ID, MAX_TX_ID } from "./transaction.js";

// Runtime type guards
export {
  isTransferKind,
  isReferenceKind,
  isTransactionKind,
  isClientId,
  isTxId,
  isTransferRecord,
  isReferenceRecord,
  isTransactionRecord,
} from "./guards.js";
