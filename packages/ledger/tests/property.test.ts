/**
 * Property-Based Tests for @settlekit/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY record
 * sequence, valid or not:
 *
 * 1. held is never negative and total = available + held
 * 2. Without disputes, available is never negative
 * 3. Conservation: sum of totals = deposits - withdrawals - chargebacks
 * 4. Rejected records leave history, disputes and balances untouched
 * 5. Replay is deterministic
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { TransactionRecord } from "@settlekit/types";
import { StateEngine } from "../src/engine.js";

// =============================================================================
// Arbitraries
// =============================================================================

const TRANSFER_KINDS = ["deposit", "withdrawal"] as const;
const REFERENCE_KINDS = ["dispute", "resolve", "chargeback"] as const;

/** Few clients and ids so references often hit real transactions. */
const arbClientId = fc.integer({ min: 1, max: 3 });
const arbTxId = fc.integer({ min: 1, max: 8 });

const arbTransfer: fc.Arbitrary<TransactionRecord> = fc.record({
  kind: fc.constantFrom(...TRANSFER_KINDS),
  clientId: arbClientId,
  txId: arbTxId,
  amount: fc.bigInt({ min: 0n, max: 1_000_000n }),
});

const arbReference: fc.Arbitrary<TransactionRecord> = fc.record({
  kind: fc.constantFrom(...REFERENCE_KINDS),
  clientId: arbClientId,
  txId: arbTxId,
});

const arbRecords = fc.array(fc.oneof(arbTransfer, arbReference), {
  maxLength: 60,
});

function sumTotals(engine: StateEngine): bigint {
  return engine.accounts().reduce((sum, a) => sum + a.total, 0n);
}

// =============================================================================
// Properties
// =============================================================================

describe("property: account invariants", () => {
  it("held is never negative and total is available + held", () => {
    fc.assert(
      fc.property(arbRecords, (records) => {
        const engine = new StateEngine();
        for (const record of records) {
          engine.apply(record);
          for (const account of engine.accounts()) {
            expect(account.held >= 0n).toBe(true);
            expect(account.total).toBe(account.available + account.held);
          }
        }
      }),
      { numRuns: 200 },
    );
  });

  it("available never goes negative without disputes", () => {
    fc.assert(
      fc.property(fc.array(arbTransfer, { maxLength: 60 }), (records) => {
        const engine = new StateEngine();
        for (const record of records) {
          engine.apply(record);
        }
        for (const account of engine.accounts()) {
          expect(account.available >= 0n).toBe(true);
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: conservation", () => {
  it("sum of totals equals deposits minus withdrawals minus chargebacks", () => {
    fc.assert(
      fc.property(arbRecords, (records) => {
        const engine = new StateEngine();
        let expected = 0n;

        for (const record of records) {
          const result = engine.apply(record);
          if (!result.ok) continue;

          if (record.kind === "deposit") {
            expected += record.amount;
          } else if (record.kind === "withdrawal") {
            expected -= record.amount;
          } else if (record.kind === "chargeback") {
            expected -= engine.historyEntry(record.txId)?.amount ?? 0n;
          }
        }

        expect(sumTotals(engine)).toBe(expected);
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: rejected records have no effect", () => {
  it("history, disputes and existing balances are unchanged by a rejection", () => {
    fc.assert(
      fc.property(arbRecords, (records) => {
        const engine = new StateEngine();

        for (const record of records) {
          const before = engine.snapshot();
          const result = engine.apply(record);
          if (result.ok) continue;

          const after = engine.snapshot();
          expect(after.transactions).toEqual(before.transactions);
          expect(after.disputed).toEqual(before.disputed);
          expect(after.chargedBack).toEqual(before.chargedBack);
          for (const account of before.accounts) {
            expect(after.accounts).toContainEqual(account);
          }
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: determinism", () => {
  it("replaying the same records twice yields identical snapshots", () => {
    fc.assert(
      fc.property(arbRecords, (records) => {
        const first = new StateEngine();
        const second = new StateEngine();
        for (const record of records) {
          first.apply(record);
          second.apply(record);
        }
        expect(second.snapshot()).toEqual(first.snapshot());
      }),
      { numRuns: 100 },
    );
  });
});
