/**
 * Tests for state hash computation.
 *
 * Verifies:
 * - Determinism: same state → same hash
 * - Key order independence (canonical JSON)
 * - Part isolation: each part hash tracks its own slice of state
 */

import { describe, it, expect } from "vitest";
import { StateEngine } from "@settlekit/ledger";
import type { LedgerSnapshot } from "@settlekit/ledger";
import type { TransactionRecord } from "@settlekit/types";
import { hashAccounts, hashLedgerSnapshot } from "../src/state-hash.js";

const SHA256_REGEX = /^[0-9a-f]{64}$/;

const RECORDS: readonly TransactionRecord[] = [
  { kind: "deposit", clientId: 1, txId: 1, amount: 100_000n },
  { kind: "deposit", clientId: 2, txId: 2, amount: 50_000n },
  { kind: "dispute", clientId: 2, txId: 2 },
];

function snapshotOf(records: readonly TransactionRecord[]): LedgerSnapshot {
  const engine = new StateEngine();
  for (const record of records) {
    engine.apply(record);
  }
  return engine.snapshot();
}

describe("hashLedgerSnapshot", () => {
  it("produces SHA-256 hex digests", () => {
    const result = hashLedgerSnapshot(snapshotOf(RECORDS));
    expect(result.hash).toMatch(SHA256_REGEX);
    expect(result.parts.accounts).toMatch(SHA256_REGEX);
    expect(result.parts.transactions).toMatch(SHA256_REGEX);
    expect(result.parts.disputes).toMatch(SHA256_REGEX);
  });

  it("is deterministic across replays", () => {
    expect(hashLedgerSnapshot(snapshotOf(RECORDS))).toEqual(
      hashLedgerSnapshot(snapshotOf(RECORDS)),
    );
  });

  it("ignores property order", () => {
    const a: LedgerSnapshot = {
      version: 1,
      accounts: [{ clientId: 1, available: "5", held: "0", total: "5", locked: false }],
      transactions: [{ txId: 1, clientId: 1, kind: "deposit", amount: "5" }],
      disputed: [],
      chargedBack: [],
    };
    const b: LedgerSnapshot = {
      chargedBack: [],
      disputed: [],
      transactions: [{ amount: "5", kind: "deposit", clientId: 1, txId: 1 }],
      accounts: [{ locked: false, total: "5", held: "0", available: "5", clientId: 1 }],
      version: 1,
    };
    expect(hashLedgerSnapshot(a).hash).toBe(hashLedgerSnapshot(b).hash);
  });

  it("changes when any part changes", () => {
    const base = snapshotOf(RECORDS);
    const withChargeback: LedgerSnapshot = { ...base, chargedBack: [9] };

    const h1 = hashLedgerSnapshot(base);
    const h2 = hashLedgerSnapshot(withChargeback);

    expect(h2.hash).not.toBe(h1.hash);
    expect(h2.parts.disputes).not.toBe(h1.parts.disputes);
    expect(h2.parts.accounts).toBe(h1.parts.accounts);
    expect(h2.parts.transactions).toBe(h1.parts.transactions);
  });

  it("distinguishes a rejected record from an applied one", () => {
    const applied = snapshotOf([{ kind: "deposit", clientId: 1, txId: 1, amount: 1n }]);
    const rejected = snapshotOf([{ kind: "withdrawal", clientId: 1, txId: 1, amount: 1n }]);
    expect(hashLedgerSnapshot(applied).hash).not.toBe(hashLedgerSnapshot(rejected).hash);
  });
});

describe("hashAccounts", () => {
  it("sorts accounts by client before hashing", () => {
    const one = { clientId: 1, available: "1", held: "0", total: "1", locked: false };
    const two = { clientId: 2, available: "2", held: "0", total: "2", locked: true };
    expect(hashAccounts([two, one])).toBe(hashAccounts([one, two]));
  });
});
