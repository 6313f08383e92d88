/**
 * @settlekit/csv — Record parser.
 *
 * Decodes CSV rows (`type,client,tx,amount`) into TransactionRecords.
 * Rows that cannot form a legal record are rejected one by one; only
 * an unreadable stream or broken CSV syntax stops the read.
 *
 * Rules:
 * - Deposits and withdrawals require a non-negative amount
 * - Disputes, resolves and chargebacks must not carry one
 * - Amounts may not exceed the configured decimal places
 */

import type { Readable } from "node:stream";
import { CsvError, parse } from "csv-parse";
import { z } from "zod";
import type { TransactionKind, TransactionRecord } from "@settlekit/types";
import { MAX_CLIENT_ID, MAX_TX_ID, isTransferKind } from "@settlekit/types";
import { AmountError, DEFAULT_DECIMALS, parseAmount } from "@settlekit/ledger";

// =============================================================================
// Errors
// =============================================================================

export type RecordParseErrorCode =
  | "INVALID_FIELD"
  | "MISSING_AMOUNT"
  | "SUPERFLUOUS_AMOUNT"
  | "INVALID_AMOUNT";

/**
 * A single row that could not be turned into a record.
 * Recoverable: the row is skipped.
 */
export class RecordParseError extends Error {
  public readonly code: RecordParseErrorCode;

  constructor(code: RecordParseErrorCode, message: string) {
    super(message);
    this.name = "RecordParseError";
    this.code = code;
  }
}

export type RecordStreamErrorCode =
  | "UNREADABLE_INPUT"
  | "MALFORMED_CSV"
  | "MISSING_COLUMNS";

/**
 * The input as a whole cannot be read. Fatal to the replay.
 */
export class RecordStreamError extends Error {
  public readonly code: RecordStreamErrorCode;

  constructor(code: RecordStreamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecordStreamError";
    this.code = code;
  }
}

// =============================================================================
// Row Schema
// =============================================================================

export const REQUIRED_COLUMNS = ["type", "client", "tx", "amount"] as const;

const TRANSACTION_KINDS = [
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
] as const satisfies readonly TransactionKind[];

function idSchema(field: string, max: number) {
  return z
    .string({ required_error: `${field} is required` })
    .transform((value, ctx) => {
      if (!/^\d+$/.test(value) || Number(value) > max) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `${field} must be an unsigned integer no greater than ${String(max)}`,
        });
        return z.NEVER;
      }
      return Number(value);
    });
}

export const RawRowSchema = z.object({
  type: z.enum(TRANSACTION_KINDS, {
    errorMap: () => ({ message: `type must be one of ${TRANSACTION_KINDS.join(", ")}` }),
  }),
  client: idSchema("client", MAX_CLIENT_ID),
  tx: idSchema("tx", MAX_TX_ID),
  amount: z.string().optional(),
});

export type RawRow = z.infer<typeof RawRowSchema>;

const NON_NEGATIVE_DECIMAL = /^\d+(\.\d+)?$/;

// =============================================================================
// Row Parsing
// =============================================================================

export type RecordParseResult =
  | { readonly ok: true; readonly record: TransactionRecord }
  | { readonly ok: false; readonly error: RecordParseError };

function fail(code: RecordParseErrorCode, message: string): RecordParseResult {
  return { ok: false, error: new RecordParseError(code, message) };
}

/**
 * Turn one raw CSV row (column name → cell) into a record.
 */
export function parseRecordRow(
  row: unknown,
  decimals: number = DEFAULT_DECIMALS,
): RecordParseResult {
  const parsed = RawRowSchema.safeParse(row);
  if (!parsed.success) {
    return fail(
      "INVALID_FIELD",
      parsed.error.issues.map((issue) => issue.message).join("; "),
    );
  }

  const { type, client, tx, amount } = parsed.data;

  if (!isTransferKind(type)) {
    if (amount !== undefined && amount !== "") {
      return fail("SUPERFLUOUS_AMOUNT", `${type} ${String(tx)} must not carry an amount`);
    }
    return { ok: true, record: { kind: type, clientId: client, txId: tx } };
  }

  if (amount === undefined || amount === "") {
    return fail("MISSING_AMOUNT", `${type} ${String(tx)} requires an amount`);
  }
  if (!NON_NEGATIVE_DECIMAL.test(amount)) {
    return fail(
      "INVALID_AMOUNT",
      `${type} ${String(tx)} amount "${amount}" is not a non-negative decimal`,
    );
  }

  try {
    return {
      ok: true,
      record: { kind: type, clientId: client, txId: tx, amount: parseAmount(amount, decimals) },
    };
  } catch (err) {
    if (err instanceof AmountError) {
      return fail("INVALID_AMOUNT", `${type} ${String(tx)}: ${err.message}`);
    }
    throw err;
  }
}

// =============================================================================
// Stream Reading
// =============================================================================

export interface ReadRecordsOptions {
  readonly decimals?: number | undefined;
}

/**
 * One data row of the input, numbered from 1 (header and blank
 * lines are not counted).
 */
export interface ParsedRow {
  readonly row: number;
  readonly result: RecordParseResult;
}

function checkHeader(header: string[]): string[] {
  const missing = REQUIRED_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new RecordStreamError(
      "MISSING_COLUMNS",
      `Input header is missing column(s): ${missing.join(", ")}`,
    );
  }
  return header;
}

function toStreamError(err: unknown): RecordStreamError {
  if (err instanceof RecordStreamError) {
    return err;
  }
  if (err instanceof CsvError) {
    return new RecordStreamError("MALFORMED_CSV", `Malformed CSV: ${err.message}`, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RecordStreamError("UNREADABLE_INPUT", `Cannot read input: ${message}`, { cause: err });
}

/**
 * Stream records out of a CSV source, in input order. The source is
 * released once reading stops, whether or not it was exhausted.
 *
 * @throws {RecordStreamError} when the source fails or the CSV is malformed
 */
export async function* readRecords(
  input: Readable,
  options?: ReadRecordsOptions,
): AsyncGenerator<ParsedRow> {
  const decimals = options?.decimals ?? DEFAULT_DECIMALS;
  const parser = parse({
    bom: true,
    columns: checkHeader,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  // pipe() does not forward source errors
  input.on("error", (err) => parser.destroy(err));
  input.pipe(parser);

  let row = 0;
  try {
    for await (const raw of parser) {
      const cells: unknown = raw;
      row++;
      yield { row, result: parseRecordRow(cells, decimals) };
    }
  } catch (err) {
    throw toStreamError(err);
  } finally {
    input.unpipe(parser);
    input.destroy();
  }
}
