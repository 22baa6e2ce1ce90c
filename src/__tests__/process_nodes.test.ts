/**
 * Tests for process_nodes.ts
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError } from "../errors.js";
import { lookupNode, mergeProcessTable, PROCESS_NODES, supportedNodes } from "../process_nodes.js";

describe("process table", () => {
  it("lists supported nodes from largest to smallest", () => {
    expect(supportedNodes()).toEqual([180, 130, 90, 65, 45, 28, 22, 16, 7]);
  });

  it("keeps every node's threshold below its operating window", () => {
    for (const node of PROCESS_NODES.values()) {
      expect(node.v_th).toBeLessThan(node.v_min);
      expect(node.v_min).toBeLessThanOrEqual(node.v_nominal);
      expect(node.v_nominal).toBeLessThanOrEqual(node.v_max);
    }
  });

  it("shrinks the bit cell with the node", () => {
    const sizes = supportedNodes().map((n) => lookupNode(n).bitcell_area_um2);
    for (let i = 1; i < sizes.length; i += 1) {
      expect(sizes[i]).toBeLessThan(sizes[i - 1]);
    }
  });

  it("rejects an unknown node with the supported list", () => {
    expect(() => lookupNode(30)).toThrow(ConfigurationError);
    expect(() => lookupNode(30)).toThrow("one of 180, 130, 90, 65, 45, 28, 22, 16, 7 (nm)");
  });
});

// ══════════════════════════════════════════════════════════════════════
// mergeProcessTable
// ══════════════════════════════════════════════════════════════════════

describe("mergeProcessTable", () => {
  it("returns an equal copy when there is nothing to merge", () => {
    const merged = mergeProcessTable(PROCESS_NODES, {});
    expect(merged).not.toBe(PROCESS_NODES);
    expect([...merged.keys()]).toEqual([...PROCESS_NODES.keys()]);
  });

  it("patches a single constant of an existing node", () => {
    const merged = mergeProcessTable(PROCESS_NODES, { process_nodes: { 28: { leakage_mw_per_mm2: 50 } } });
    expect(lookupNode(28, merged).leakage_mw_per_mm2).toBe(50);
    expect(lookupNode(28, merged).bitcell_area_um2).toBe(0.127);
    expect(lookupNode(28).leakage_mw_per_mm2).toBe(35);
  });

  it("accepts numeric strings from YAML", () => {
    const merged = mergeProcessTable(PROCESS_NODES, { process_nodes: { "16": { v_max: "1.0" } } });
    expect(lookupNode(16, merged).v_max).toBe(1);
  });

  it("adds a fully specified new node", () => {
    const row = { ...lookupNode(22), bitcell_area_um2: 0.08 };
    const merged = mergeProcessTable(PROCESS_NODES, { process_nodes: { 20: row } });
    expect(supportedNodes(merged)).toContain(20);
    expect(lookupNode(20, merged).bitcell_area_um2).toBe(0.08);
  });

  it("requires every constant for a new node", () => {
    expect(() => mergeProcessTable(PROCESS_NODES, { process_nodes: { 20: { v_th: 0.3 } } })).toThrow(
      ConfigurationError,
    );
  });

  it("rejects unknown constants", () => {
    expect(() => mergeProcessTable(PROCESS_NODES, { process_nodes: { 28: { bogus: 1 } } })).toThrow(
      "process_nodes.28.bogus",
    );
  });

  it("rejects non-positive values", () => {
    expect(() => mergeProcessTable(PROCESS_NODES, { process_nodes: { 28: { v_max: -1 } } })).toThrow(
      "process_nodes.28.v_max",
    );
  });

  it("rejects a window that does not sit above the threshold", () => {
    expect(() => mergeProcessTable(PROCESS_NODES, { process_nodes: { 28: { v_th: 0.85 } } })).toThrow(
      "process_nodes.28.v_min",
    );
  });

  it("rejects node keys that are not positive integers", () => {
    expect(() => mergeProcessTable(PROCESS_NODES, { process_nodes: { small: {} } })).toThrow(ConfigurationError);
  });
});
