import type { SramConfig } from "./config.js";
import { eccCheckBits } from "./ecc.js";
import { lookupNode, PROCESS_NODES, type ProcessTable } from "./process_nodes.js";

export type AreaEstimate = {
  bitcell_area_mm2: number;
  periphery_area_mm2: number;
  total_area_mm2: number;
  area_efficiency: number;
  bank_area_mm2: number;
};

/** Periphery of a single-bank macro as a fraction of its bit-cell area. */
export const PERIPHERY_BASE = 0.35;
export const BANK_OVERHEAD_EXPONENT = 0.5;
export const ECC_GATES_PER_BIT = 14;
export const POWER_SWITCH_OVERHEAD = 0.04;
export const RETENTION_OVERHEAD = 0.02;
export const CLOCK_GATE_GATES = 6;

const UM2_PER_MM2 = 1e6;

/**
 * Bit-cell array plus periphery. Periphery adjustments are applied in a fixed
 * order: banking, ECC columns and logic, power switches, retention bias,
 * clock gates.
 */
export function estimateArea(config: SramConfig, table: ProcessTable = PROCESS_NODES): AreaEstimate {
  const node = lookupNode(config.process_node, table);
  const bitcell = config.depth * config.width * node.bitcell_area_um2;

  let periphery = bitcell * PERIPHERY_BASE * config.banks ** BANK_OVERHEAD_EXPONENT;
  if (config.ecc_enable) {
    periphery += config.depth * eccCheckBits(config.width) * node.bitcell_area_um2;
    periphery += config.width * ECC_GATES_PER_BIT * node.gate_area_um2;
  }
  if (config.power_gating) periphery += bitcell * POWER_SWITCH_OVERHEAD;
  if (config.retention_mode) periphery += bitcell * RETENTION_OVERHEAD;
  if (config.clock_gating) periphery += config.banks * CLOCK_GATE_GATES * node.gate_area_um2;

  const bitcellMm2 = bitcell / UM2_PER_MM2;
  const peripheryMm2 = periphery / UM2_PER_MM2;
  const total = bitcellMm2 + peripheryMm2;
  return {
    bitcell_area_mm2: bitcellMm2,
    periphery_area_mm2: peripheryMm2,
    total_area_mm2: total,
    area_efficiency: bitcellMm2 / total,
    bank_area_mm2: total / config.banks,
  };
}
