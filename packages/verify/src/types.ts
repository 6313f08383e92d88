/**
 * @settlekit/verify — Types for replay verification.
 *
 * - StateHash: content-addressed digest of an engine snapshot
 * - ReplayReport: outcome of a sequential replay
 * - ShardedAuditResult: sequential versus per-client replay verdict
 */

import type { ClientId, TransactionRecord } from "@settlekit/types";
import type {
  AccountSnapshot,
  DisputePolicy,
  LedgerSnapshot,
  TransactionError,
} from "@settlekit/ledger";

export type { LedgerSnapshot, AccountSnapshot } from "@settlekit/ledger";

// =============================================================================
// State Hash
// =============================================================================

export interface StateHash {
  /** SHA-256 hex digest (64 characters, lowercase) */
  readonly hash: string;

  /** Individual hashes for pinpointing divergence */
  readonly parts: {
    readonly accounts: string;
    readonly transactions: string;
    readonly disputes: string;
  };
}

// =============================================================================
// Replay
// =============================================================================

export interface ReplayOptions {
  readonly policy?: Partial<DisputePolicy> | undefined;
}

export interface RejectedRecord {
  /** Zero-based position in the replayed sequence */
  readonly index: number;
  readonly record: TransactionRecord;
  readonly error: TransactionError;
}

export interface ReplayReport {
  readonly applied: number;
  readonly rejected: readonly RejectedRecord[];
  readonly snapshot: LedgerSnapshot;
  readonly stateHash: StateHash;
}

// =============================================================================
// Sharded Audit
// =============================================================================

export type VerificationVerdict = "PASS" | "FAIL";

/**
 * A client whose final account differs between the sequential replay
 * and its own shard.
 */
export interface ShardDiscrepancy {
  readonly clientId: ClientId;
  readonly expected: AccountSnapshot | undefined;
  readonly actual: AccountSnapshot | undefined;
  readonly description: string;
}

export interface ShardedAuditResult {
  readonly verdict: VerificationVerdict;
  /** Hash of account state after the sequential replay */
  readonly sequentialHash: string;
  /** Hash of the merged per-client account states */
  readonly shardedHash: string;
  readonly shardCount: number;
  readonly discrepancies: readonly ShardDiscrepancy[];
}
