/**
 * @settlekit/cli — Replay runner.
 *
 * Drives one replay: reads records from the input, applies them to a
 * fresh engine, reports every rejected row through a callback and
 * writes the final ledger. Rejections never stop the run; only stream
 * failures (and malformed rows in strict mode) do.
 */

import type { Readable, Writable } from "node:stream";
import type { ClientId, TransactionKind, TxId } from "@settlekit/types";
import type { DisputePolicy } from "@settlekit/ledger";
import { StateEngine } from "@settlekit/ledger";
import type { RecordParseError } from "@settlekit/csv";
import { readRecords, writeAccountsCsv } from "@settlekit/csv";
import { hashLedgerSnapshot } from "@settlekit/verify";

export interface RejectionLogEntry {
  /** Data row number, from 1 */
  readonly row: number;
  /** "parse" for malformed rows, "apply" for engine rejections */
  readonly stage: "parse" | "apply";
  readonly code: string;
  readonly message: string;
  readonly kind?: TransactionKind | undefined;
  readonly clientId?: ClientId | undefined;
  readonly txId?: TxId | undefined;
}

export interface ReplayRunOptions {
  readonly input: Readable;
  readonly output: Writable;
  readonly decimals: number;
  readonly policy: DisputePolicy;
  readonly strict: boolean;
  readonly onRejected: (entry: RejectionLogEntry) => void;
}

export interface ReplaySummary {
  readonly rows: number;
  readonly applied: number;
  readonly rejected: number;
  readonly malformed: number;
  readonly accounts: number;
  readonly stateHash: string;
}

/**
 * Raised in strict mode for the first row that fails to parse.
 */
export class StrictModeError extends Error {
  public readonly code = "MALFORMED_ROW";
  public readonly row: number;

  constructor(row: number, cause: RecordParseError) {
    super(`Row ${String(row)} is malformed: ${cause.message}`, { cause });
    this.name = "StrictModeError";
    this.row = row;
  }
}

/**
 * @throws {RecordStreamError} when the input cannot be read
 * @throws {StrictModeError} on a malformed row in strict mode
 */
export async function runReplay(options: ReplayRunOptions): Promise<ReplaySummary> {
  const engine = new StateEngine({ policy: options.policy });
  let rows = 0;
  let applied = 0;
  let rejected = 0;
  let malformed = 0;

  for await (const { row, result } of readRecords(options.input, { decimals: options.decimals })) {
    rows++;

    if (!result.ok) {
      malformed++;
      options.onRejected({
        row,
        stage: "parse",
        code: result.error.code,
        message: result.error.message,
      });
      if (options.strict) {
        throw new StrictModeError(row, result.error);
      }
      continue;
    }

    const { record } = result;
    const outcome = engine.apply(record);
    if (outcome.ok) {
      applied++;
      continue;
    }

    rejected++;
    options.onRejected({
      row,
      stage: "apply",
      code: outcome.error.code,
      message: outcome.error.message,
      kind: record.kind,
      clientId: record.clientId,
      txId: record.txId,
    });
  }

  const accounts = engine.accounts();
  await writeAccountsCsv(accounts, options.output, options.decimals);

  return {
    rows,
    applied,
    rejected,
    malformed,
    accounts: accounts.length,
    stateHash: hashLedgerSnapshot(engine.snapshot()).hash,
  };
}
