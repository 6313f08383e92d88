/**
 * @settlekit/verify — Replay and sharded replay audit.
 *
 * Operations on different clients commute as long as transaction ids
 * are not shared between clients. The sharded audit replays each
 * client's records on its own engine and compares the merged result
 * with the sequential replay; any difference points at records whose
 * outcome depended on another client's history.
 */

import type { ClientId, TransactionRecord } from "@settlekit/types";
import { StateEngine } from "@settlekit/ledger";
import type { AccountSnapshot } from "@settlekit/ledger";
import { hashAccounts, hashLedgerSnapshot } from "./state-hash.js";
import type {
  RejectedRecord,
  ReplayOptions,
  ReplayReport,
  ShardDiscrepancy,
  ShardedAuditResult,
} from "./types.js";

/**
 * Replay records in order on a fresh engine.
 */
export function replayRecords(
  records: Iterable<TransactionRecord>,
  options?: ReplayOptions,
): ReplayReport {
  const engine = new StateEngine({ policy: options?.policy });
  const rejected: RejectedRecord[] = [];
  let applied = 0;
  let index = 0;

  for (const record of records) {
    const result = engine.apply(record);
    if (result.ok) {
      applied++;
    } else {
      rejected.push({ index, record, error: result.error });
    }
    index++;
  }

  const snapshot = engine.snapshot();
  return {
    applied,
    rejected,
    snapshot,
    stateHash: hashLedgerSnapshot(snapshot),
  };
}

/**
 * Split records by client, keeping per-client order.
 */
export function partitionByClient(
  records: readonly TransactionRecord[],
): Map<ClientId, TransactionRecord[]> {
  const shards = new Map<ClientId, TransactionRecord[]>();
  for (const record of records) {
    const shard = shards.get(record.clientId) ?? [];
    shard.push(record);
    shards.set(record.clientId, shard);
  }
  return shards;
}

function sameAccount(a: AccountSnapshot | undefined, b: AccountSnapshot | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  return (
    a.available === b.available &&
    a.held === b.held &&
    a.total === b.total &&
    a.locked === b.locked
  );
}

/**
 * Replay sequentially and per client, then compare final accounts.
 */
export function auditShardedReplay(
  records: readonly TransactionRecord[],
  options?: ReplayOptions,
): ShardedAuditResult {
  const sequential = replayRecords(records, options).snapshot.accounts;

  const sharded: AccountSnapshot[] = [];
  const shards = partitionByClient(records);
  for (const shard of shards.values()) {
    sharded.push(...replayRecords(shard, options).snapshot.accounts);
  }

  const expectedById = new Map(sequential.map((a) => [a.clientId, a] as const));
  const actualById = new Map(sharded.map((a) => [a.clientId, a] as const));
  const clientIds = [...new Set([...expectedById.keys(), ...actualById.keys()])].sort(
    (a, b) => a - b,
  );

  const discrepancies: ShardDiscrepancy[] = [];
  for (const clientId of clientIds) {
    const expected = expectedById.get(clientId);
    const actual = actualById.get(clientId);
    if (!sameAccount(expected, actual)) {
      discrepancies.push({
        clientId,
        expected,
        actual,
        description: `Client ${String(clientId)} diverges between sequential and sharded replay`,
      });
    }
  }

  return {
    verdict: discrepancies.length === 0 ? "PASS" : "FAIL",
    sequentialHash: hashAccounts(sequential),
    shardedHash: hashAccounts(sharded),
    shardCount: shards.size,
    discrepancies,
  };
}
