/**
 * @settlekit/verify — Deterministic replay verification.
 *
 * Content-addressed hashing of engine state and an audit that checks
 * per-client replay reaches the same balances as sequential replay.
 */

export { hashAccounts, hashLedgerSnapshot } from "./state-hash.js";
export { replayRecords, partitionByClient, auditShardedReplay } from "./replay.js";

export type {
  StateHash,
  ReplayOptions,
  RejectedRecord,
  ReplayReport,
  VerificationVerdict,
  ShardDiscrepancy,
  ShardedAuditResult,
  LedgerSnapshot,
  AccountSnapshot,
} from "./types.js";
