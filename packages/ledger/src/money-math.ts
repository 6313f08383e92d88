/**
 * @settlekit/ledger — Deterministic monetary arithmetic.
 *
 * Amounts live as bigint minor units. Decimal strings are converted
 * to and from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Zero runtime dependencies
 */

/** Default number of fractional digits carried by amounts. */
export const DEFAULT_DECIMALS = 4;

export class AmountError extends Error {
  public readonly code = "INVALID_AMOUNT";

  constructor(message: string) {
    super(message);
    this.name = "AmountError";
  }
}

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new AmountError(`Decimals must be a non-negative integer, got: ${String(decimals)}`);
  }
}

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=4 → 1005000n
 * "7" with decimals=0 → 7n
 * "-2.5" with decimals=1 → -25n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  assertDecimals(decimals);
  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new AmountError(`Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new AmountError(
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string with exactly
 * `decimals` fractional digits.
 *
 * 1005000n with decimals=4 → "100.5000"
 * -25n with decimals=1 → "-2.5"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  assertDecimals(decimals);
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}
