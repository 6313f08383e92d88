/**
 * Tests for the deterministic money math.
 *
 * Covers:
 * - parseAmount scaling and padding
 * - formatAmount fixed-width output
 * - Validation and error cases
 */

import { describe, it, expect } from "vitest";
import { parseAmount, formatAmount, AmountError } from "../src/money-math.js";

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100", 4)).toBe(1_000_000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("100.50", 4)).toBe(1_005_000n);
  });

  it("pads fractional part when shorter than decimals", () => {
    expect(parseAmount("1.5", 4)).toBe(15_000n);
  });

  it("parses zero", () => {
    expect(parseAmount("0", 4)).toBe(0n);
    expect(parseAmount("0.0000", 4)).toBe(0n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-2.5", 1)).toBe(-25n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseAmount("  3.25 ", 2)).toBe(325n);
  });

  it("handles zero decimals", () => {
    expect(parseAmount("7", 0)).toBe(7n);
  });

  it("rejects more decimal places than allowed", () => {
    expect(() => parseAmount("1.23456", 4)).toThrow(AmountError);
    expect(() => parseAmount("1.23456", 4)).toThrow(/5 decimal places/);
  });

  it("rejects malformed strings", () => {
    for (const bad of ["", "abc", "1.", ".5", "1e3", "1,5", "+1"]) {
      expect(() => parseAmount(bad, 4)).toThrow(AmountError);
    }
  });

  it("rejects invalid decimals", () => {
    expect(() => parseAmount("1", -1)).toThrow(AmountError);
    expect(() => parseAmount("1", 1.5)).toThrow(AmountError);
  });

  it("carries the INVALID_AMOUNT code", () => {
    try {
      parseAmount("x", 4);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AmountError);
      expect((err as AmountError).code).toBe("INVALID_AMOUNT");
    }
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats with exactly the given decimals", () => {
    expect(formatAmount(1_005_000n, 4)).toBe("100.5000");
  });

  it("formats zero", () => {
    expect(formatAmount(0n, 4)).toBe("0.0000");
  });

  it("pads small values with leading zeros", () => {
    expect(formatAmount(5n, 4)).toBe("0.0005");
  });

  it("formats negative values", () => {
    expect(formatAmount(-25n, 1)).toBe("-2.5");
    expect(formatAmount(-5n, 4)).toBe("-0.0005");
  });

  it("formats with zero decimals", () => {
    expect(formatAmount(7n, 0)).toBe("7");
  });

  it("inverts parseAmount for canonical strings", () => {
    for (const s of ["0.0001", "12.3400", "99999999.9999"]) {
      expect(formatAmount(parseAmount(s, 4), 4)).toBe(s);
    }
  });
});
