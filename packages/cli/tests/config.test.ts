/**
 * Tests for config.ts — loadConfig + resolveSettings.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, resolveSettings } from "../src/config.js";

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      LOG_LEVEL: "info",
      NODE_ENV: "production",
      AMOUNT_DECIMALS: 4,
      LOCKED_ACCOUNT_DISPUTES: "reject",
      REDISPUTE_AFTER_CHARGEBACK: "reject",
    });
  });

  it("coerces AMOUNT_DECIMALS from a string", () => {
    expect(loadConfig({ AMOUNT_DECIMALS: "2" }).AMOUNT_DECIMALS).toBe(2);
  });

  it("reads the dispute policy", () => {
    const config = loadConfig({
      LOCKED_ACCOUNT_DISPUTES: "allow",
      REDISPUTE_AFTER_CHARGEBACK: "allow",
    });
    expect(config.LOCKED_ACCOUNT_DISPUTES).toBe("allow");
    expect(config.REDISPUTE_AFTER_CHARGEBACK).toBe("allow");
  });

  it("ignores unrelated variables", () => {
    expect(loadConfig({ HOME: "/home/test", PATH: "/bin" }).LOG_LEVEL).toBe("info");
  });

  it("throws on out-of-range decimals", () => {
    expect(() => loadConfig({ AMOUNT_DECIMALS: "19" })).toThrow();
    expect(() => loadConfig({ AMOUNT_DECIMALS: "-1" })).toThrow();
    expect(() => loadConfig({ AMOUNT_DECIMALS: "1.5" })).toThrow();
  });

  it("throws on an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow();
  });

  it("throws on an unknown policy decision", () => {
    expect(() => loadConfig({ LOCKED_ACCOUNT_DISPUTES: "maybe" })).toThrow();
  });
});

// =============================================================================
// resolveSettings
// =============================================================================

describe("resolveSettings", () => {
  const defaults = loadConfig({});

  it("falls back to the environment when no flags are given", () => {
    expect(resolveSettings(defaults, {})).toEqual({
      decimals: 4,
      policy: { lockedAccountDisputes: "reject", redisputeAfterChargeback: "reject" },
      strict: false,
      summary: false,
      digest: false,
    });
  });

  it("lets flags override the environment", () => {
    const config = loadConfig({ AMOUNT_DECIMALS: "6" });
    const settings = resolveSettings(config, {
      decimals: 2,
      allowLockedDisputes: true,
      allowRedispute: true,
      strict: true,
      summary: true,
      digest: true,
    });
    expect(settings).toEqual({
      decimals: 2,
      policy: { lockedAccountDisputes: "allow", redisputeAfterChargeback: "allow" },
      strict: true,
      summary: true,
      digest: true,
    });
  });

  it("keeps an allow from the environment when the flag is absent", () => {
    const config = loadConfig({ REDISPUTE_AFTER_CHARGEBACK: "allow" });
    expect(resolveSettings(config, {}).policy.redisputeAfterChargeback).toBe("allow");
  });
});
