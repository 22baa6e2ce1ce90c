/**
 * Tests for config.ts
 */

import { describe, it, expect } from "vitest";
import { configFingerprint, createConfig, describeConfig, featureTags } from "../config.js";
import { ConfigurationError } from "../errors.js";

const base = { depth: 1024, width: 32, banks: 1, voltage: 0.9, process_node: 28 };

function fieldOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError) return e.field;
    throw e;
  }
  return undefined;
}

// ══════════════════════════════════════════════════════════════════════
// createConfig
// ══════════════════════════════════════════════════════════════════════

describe("createConfig", () => {
  it("accepts a minimal record and defaults every feature flag to false", () => {
    const cfg = createConfig(base);
    expect(cfg).toEqual({
      ...base,
      power_gating: false,
      clock_gating: false,
      retention_mode: false,
      ecc_enable: false,
    });
  });

  it("returns a frozen record", () => {
    const cfg = createConfig(base);
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it("keeps explicit feature flags", () => {
    const cfg = createConfig({ ...base, power_gating: true, ecc_enable: true });
    expect(cfg.power_gating).toBe(true);
    expect(cfg.ecc_enable).toBe(true);
    expect(cfg.clock_gating).toBe(false);
  });

  it("rejects a non-record input", () => {
    expect(fieldOf(() => createConfig("1024x32"))).toBe("configuration");
    expect(fieldOf(() => createConfig(null))).toBe("configuration");
    expect(fieldOf(() => createConfig([base]))).toBe("configuration");
  });

  it("names a missing required field", () => {
    const { depth: _depth, ...rest } = base;
    try {
      createConfig(rest);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (!(e instanceof ConfigurationError)) return;
      expect(e.field).toBe("depth");
      expect(e.value).toBeUndefined();
      expect(e.expected).toBe("a positive integer number of words (required)");
    }
  });

  it("rejects non-integer and non-positive sizes", () => {
    expect(fieldOf(() => createConfig({ ...base, depth: 1.5 }))).toBe("depth");
    expect(fieldOf(() => createConfig({ ...base, width: 0 }))).toBe("width");
    expect(fieldOf(() => createConfig({ ...base, banks: -2 }))).toBe("banks");
  });

  it("rejects sizes beyond the safe integer range", () => {
    try {
      createConfig({ ...base, depth: 1e21 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      if (!(e instanceof ConfigurationError)) return;
      expect(e.field).toBe("depth");
      expect(e.value).toBe(1e21);
      expect(e.expected).toBe("a positive integer number of words no larger than 9007199254740991");
    }
    expect(fieldOf(() => createConfig({ ...base, width: 2 ** 60 }))).toBe("width");
    expect(fieldOf(() => createConfig({ ...base, banks: Number.MAX_SAFE_INTEGER + 1 }))).toBe("banks");
  });

  it("rejects a non-positive voltage", () => {
    expect(fieldOf(() => createConfig({ ...base, voltage: 0 }))).toBe("voltage");
    expect(fieldOf(() => createConfig({ ...base, voltage: "0.9" }))).toBe("voltage");
  });

  it("rejects a non-boolean flag", () => {
    expect(fieldOf(() => createConfig({ ...base, clock_gating: "yes" }))).toBe("clock_gating");
  });

  it("rejects unknown fields", () => {
    expect(fieldOf(() => createConfig({ ...base, colour: "blue" }))).toBe("colour");
  });

  it("rejects more banks than words", () => {
    expect(() => createConfig({ ...base, depth: 4, banks: 8 })).toThrow("at most depth (4)");
  });

  it("rejects a bank count that does not divide depth", () => {
    expect(() => createConfig({ ...base, banks: 3 })).toThrow("a divisor of depth (1024)");
  });

  it("rejects an unsupported process node", () => {
    expect(fieldOf(() => createConfig({ ...base, process_node: 30 }))).toBe("process_node");
  });

  it("formats the error message with the field, value and expectation", () => {
    expect(() => createConfig({ ...base, banks: 3 })).toThrow(
      "Invalid configuration field 'banks': got 3, expected a divisor of depth (1024)",
    );
  });
});

// ══════════════════════════════════════════════════════════════════════
// describeConfig / featureTags / configFingerprint
// ══════════════════════════════════════════════════════════════════════

describe("describeConfig", () => {
  it("summarizes a configuration without features", () => {
    expect(describeConfig(createConfig(base))).toBe("1024x32, 1 bank, 28nm, 0.9V [none]");
  });

  it("lists feature tags in a fixed order", () => {
    const cfg = createConfig({ ...base, banks: 4, ecc_enable: true, retention_mode: true, clock_gating: true, power_gating: true });
    expect(featureTags(cfg)).toEqual(["PG", "CG", "RET", "ECC"]);
    expect(describeConfig(cfg)).toBe("1024x32, 4 banks, 28nm, 0.9V [PG, CG, RET, ECC]");
  });
});

describe("configFingerprint", () => {
  it("is stable for equal configurations regardless of key order", () => {
    const a = createConfig(base);
    const b = createConfig({ process_node: 28, voltage: 0.9, banks: 1, width: 32, depth: 1024 });
    expect(configFingerprint(a)).toBe(configFingerprint(b));
    expect(configFingerprint(a)).toMatch(/^[0-9a-f]{12}$/);
  });

  it("changes with any field", () => {
    const a = createConfig(base);
    const b = createConfig({ ...base, clock_gating: true });
    expect(configFingerprint(a)).not.toBe(configFingerprint(b));
  });
});
