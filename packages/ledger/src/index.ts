/**
 * @settlekit/ledger — Transaction state engine.
 *
 * Replays deposits, withdrawals and the dispute lifecycle into
 * per-client balances.
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Rejections are typed results; apply() never throws for a rule
 * - The engine owns all state; callers get readonly views
 * - Zero runtime dependencies
 */

// Core engine
export { StateEngine } from "./engine.js";
export type { StateEngineOptions } from "./engine.js";

// Client ledger
export { ClientLedger, toAccountView } from "./client-ledger.js";

// History and dispute tracking
export { TransactionHistory, TransactionIdSet, DisputeSet } from "./history.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  AmountError,
  DEFAULT_DECIMALS,
} from "./money-math.js";

// Types
export type {
  ClientAccount,
  AccountView,
  HistoryEntry,
  PolicyDecision,
  DisputePolicy,
  TransactionErrorCode,
  ApplyResult,
  AccountSnapshot,
  HistorySnapshot,
  LedgerSnapshot,
} from "./types.js";

export { TransactionError, DEFAULT_DISPUTE_POLICY } from "./types.js";
