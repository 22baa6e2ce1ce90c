import type { SramConfig } from "./config.js";
import { ModelRangeError } from "./errors.js";
import { lookupNode, PROCESS_NODES, type ProcessNode, type ProcessTable } from "./process_nodes.js";

export type TimingEstimate = {
  access_time_ns: number;
  cycle_time_ns: number;
  max_frequency_mhz: number;
};

export const CLOCK_GATE_INSERTION_NS = 0.02;

export function checkVoltage(config: SramConfig, node: ProcessNode): void {
  if (config.voltage < node.v_min || config.voltage > node.v_max) {
    throw new ModelRangeError("voltage", config.voltage, [node.v_min, node.v_max], config.process_node);
  }
}

/**
 * access = base + wire·√(rows per bank) + k / (V − v_th)
 * cycle  = access + setup/hold [+ ECC decode stage] [+ clock-gate insertion]
 */
export function estimateTiming(config: SramConfig, table: ProcessTable = PROCESS_NODES): TimingEstimate {
  const node = lookupNode(config.process_node, table);
  checkVoltage(config, node);

  const rows = config.depth / config.banks;
  const access =
    node.base_access_ns +
    node.wire_delay_ns * Math.sqrt(rows) +
    node.drive_delay_ns_v / (config.voltage - node.v_th);

  let cycle = access + node.setup_hold_ns;
  if (config.ecc_enable) cycle += node.ecc_stage_ns;
  if (config.clock_gating) cycle += CLOCK_GATE_INSERTION_NS;

  return {
    access_time_ns: access,
    cycle_time_ns: cycle,
    max_frequency_mhz: 1000 / cycle,
  };
}
