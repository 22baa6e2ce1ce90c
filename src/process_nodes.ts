import { ConfigurationError } from "./errors.js";
import { asNum, isRecord } from "./util.js";

/** Per-node constants the area, timing and power models are fitted with. */
export type ProcessNode = {
  /** 6T bit-cell area, µm² */
  bitcell_area_um2: number;
  /** NAND2-equivalent logic gate area, µm² */
  gate_area_um2: number;
  /** leakage power per mm² per volt of supply, mW */
  leakage_mw_per_mm2: number;
  /** switched capacitance of one column in one bank, pF */
  column_cap_pf: number;
  base_access_ns: number;
  /** wordline/bitline RC per √row, ns */
  wire_delay_ns: number;
  /** drive term k in k / (V - v_th), ns·V */
  drive_delay_ns_v: number;
  v_th: number;
  setup_hold_ns: number;
  ecc_stage_ns: number;
  v_min: number;
  v_max: number;
  v_nominal: number;
};

export type ProcessTable = ReadonlyMap<number, ProcessNode>;

export const PROCESS_NODE_FIELDS = [
  "bitcell_area_um2",
  "gate_area_um2",
  "leakage_mw_per_mm2",
  "column_cap_pf",
  "base_access_ns",
  "wire_delay_ns",
  "drive_delay_ns_v",
  "v_th",
  "setup_hold_ns",
  "ecc_stage_ns",
  "v_min",
  "v_max",
  "v_nominal",
] as const satisfies readonly (keyof ProcessNode)[];

const KNOWN_FIELDS: ReadonlySet<string> = new Set(PROCESS_NODE_FIELDS);

const ROWS: Array<[number, ProcessNode]> = [
  [180, { bitcell_area_um2: 4.65,  gate_area_um2: 9.98, leakage_mw_per_mm2: 0.8, column_cap_pf: 0.45,  base_access_ns: 1.2,  wire_delay_ns: 0.02,   drive_delay_ns_v: 0.6,  v_th: 0.45,  setup_hold_ns: 0.3,   ecc_stage_ns: 0.6,  v_min: 1.62, v_max: 1.98, v_nominal: 1.8 }],
  [130, { bitcell_area_um2: 2.43,  gate_area_um2: 5.1,  leakage_mw_per_mm2: 2,   column_cap_pf: 0.32,  base_access_ns: 0.9,  wire_delay_ns: 0.014,  drive_delay_ns_v: 0.42, v_th: 0.4,   setup_hold_ns: 0.22,  ecc_stage_ns: 0.45, v_min: 1.08, v_max: 1.32, v_nominal: 1.2 }],
  [90,  { bitcell_area_um2: 0.99,  gate_area_um2: 2.82, leakage_mw_per_mm2: 6,   column_cap_pf: 0.22,  base_access_ns: 0.62, wire_delay_ns: 0.01,   drive_delay_ns_v: 0.3,  v_th: 0.35,  setup_hold_ns: 0.16,  ecc_stage_ns: 0.32, v_min: 0.9,  v_max: 1.1,  v_nominal: 1.0 }],
  [65,  { bitcell_area_um2: 0.525, gate_area_um2: 1.41, leakage_mw_per_mm2: 12,  column_cap_pf: 0.16,  base_access_ns: 0.45, wire_delay_ns: 0.008,  drive_delay_ns_v: 0.22, v_th: 0.33,  setup_hold_ns: 0.12,  ecc_stage_ns: 0.24, v_min: 0.9,  v_max: 1.1,  v_nominal: 1.0 }],
  [45,  { bitcell_area_um2: 0.346, gate_area_um2: 0.98, leakage_mw_per_mm2: 20,  column_cap_pf: 0.12,  base_access_ns: 0.34, wire_delay_ns: 0.006,  drive_delay_ns_v: 0.17, v_th: 0.32,  setup_hold_ns: 0.09,  ecc_stage_ns: 0.18, v_min: 0.8,  v_max: 1.1,  v_nominal: 1.0 }],
  [28,  { bitcell_area_um2: 0.127, gate_area_um2: 0.49, leakage_mw_per_mm2: 35,  column_cap_pf: 0.08,  base_access_ns: 0.25, wire_delay_ns: 0.004,  drive_delay_ns_v: 0.12, v_th: 0.3,   setup_hold_ns: 0.07,  ecc_stage_ns: 0.13, v_min: 0.8,  v_max: 1.1,  v_nominal: 0.9 }],
  [22,  { bitcell_area_um2: 0.092, gate_area_um2: 0.35, leakage_mw_per_mm2: 45,  column_cap_pf: 0.065, base_access_ns: 0.22, wire_delay_ns: 0.0035, drive_delay_ns_v: 0.1,  v_th: 0.28,  setup_hold_ns: 0.06,  ecc_stage_ns: 0.11, v_min: 0.72, v_max: 1.0,  v_nominal: 0.8 }],
  [16,  { bitcell_area_um2: 0.074, gate_area_um2: 0.2,  leakage_mw_per_mm2: 60,  column_cap_pf: 0.05,  base_access_ns: 0.18, wire_delay_ns: 0.003,  drive_delay_ns_v: 0.08, v_th: 0.26,  setup_hold_ns: 0.05,  ecc_stage_ns: 0.09, v_min: 0.65, v_max: 0.95, v_nominal: 0.8 }],
  [7,   { bitcell_area_um2: 0.027, gate_area_um2: 0.08, leakage_mw_per_mm2: 90,  column_cap_pf: 0.03,  base_access_ns: 0.12, wire_delay_ns: 0.002,  drive_delay_ns_v: 0.06, v_th: 0.22,  setup_hold_ns: 0.035, ecc_stage_ns: 0.06, v_min: 0.6,  v_max: 0.9,  v_nominal: 0.75 }],
];

export const PROCESS_NODES: ProcessTable = new Map(ROWS);

export function supportedNodes(table: ProcessTable = PROCESS_NODES): number[] {
  return [...table.keys()].sort((a, b) => b - a);
}

export function lookupNode(node: number, table: ProcessTable = PROCESS_NODES): ProcessNode {
  const entry = table.get(node);
  if (!entry) {
    throw new ConfigurationError("process_node", node, `one of ${supportedNodes(table).join(", ")} (nm)`);
  }
  return entry;
}

function overrideValue(node: string, field: keyof ProcessNode, raw: unknown): number {
  const n = asNum(raw);
  if (n === undefined || n <= 0) {
    throw new ConfigurationError(`process_nodes.${node}.${field}`, raw, "a positive number");
  }
  return n;
}

/**
 * Merges a `{ process_nodes: { <nm>: { field: value } } }` override document
 * into a copy of `base`. Partial entries patch an existing node; a new node
 * has to define every field.
 */
export function mergeProcessTable(base: ProcessTable, overrides: unknown): ProcessTable {
  const merged = new Map(base);
  const raw = isRecord(overrides) ? overrides.process_nodes : undefined;
  if (raw === undefined || raw === null) return merged;
  if (!isRecord(raw)) {
    throw new ConfigurationError("process_nodes", raw, "a mapping of node (nm) to constants");
  }
  for (const [key, patch] of Object.entries(raw)) {
    const node = asNum(key);
    if (node === undefined || !Number.isInteger(node) || node <= 0) {
      throw new ConfigurationError("process_nodes", key, "positive integer node keys (nm)");
    }
    if (!isRecord(patch)) {
      throw new ConfigurationError(`process_nodes.${key}`, patch, "a mapping of constants");
    }
    for (const field of Object.keys(patch)) {
      if (!KNOWN_FIELDS.has(field)) {
        throw new ConfigurationError(`process_nodes.${key}.${field}`, patch[field], `one of ${PROCESS_NODE_FIELDS.join(", ")}`);
      }
    }
    const previous = merged.get(node);
    const need = (field: keyof ProcessNode): number => {
      if (patch[field] !== undefined) return overrideValue(key, field, patch[field]);
      if (previous) return previous[field];
      throw new ConfigurationError(`process_nodes.${key}.${field}`, undefined, "a positive number for a new node");
    };
    const entry: ProcessNode = {
      bitcell_area_um2: need("bitcell_area_um2"),
      gate_area_um2: need("gate_area_um2"),
      leakage_mw_per_mm2: need("leakage_mw_per_mm2"),
      column_cap_pf: need("column_cap_pf"),
      base_access_ns: need("base_access_ns"),
      wire_delay_ns: need("wire_delay_ns"),
      drive_delay_ns_v: need("drive_delay_ns_v"),
      v_th: need("v_th"),
      setup_hold_ns: need("setup_hold_ns"),
      ecc_stage_ns: need("ecc_stage_ns"),
      v_min: need("v_min"),
      v_max: need("v_max"),
      v_nominal: need("v_nominal"),
    };
    if (entry.v_min > entry.v_max || entry.v_th >= entry.v_min) {
      throw new ConfigurationError(`process_nodes.${key}.v_min`, entry.v_min, `v_th < v_min <= v_max (v_th=${entry.v_th}, v_max=${entry.v_max})`);
    }
    merged.set(node, entry);
  }
  return merged;
}
