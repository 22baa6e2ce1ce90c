import { estimateArea } from "./area.js";
import type { SramConfig } from "./config.js";
import { eccCheckBits } from "./ecc.js";
import { InvalidActivityFactorError, ModelRangeError } from "./errors.js";
import { lookupNode, PROCESS_NODES, type ProcessTable } from "./process_nodes.js";
import { estimateTiming } from "./timing.js";

export type PowerEstimate = {
  dynamic_power_mw: number;
  static_power_mw: number;
  total_power_mw: number;
  /** Deep-sleep figure; exactly 0 when retention_mode is off. */
  retention_power_uw: number;
  activity_factor: number;
  frequency_mhz: number;
};

export type PowerOptions = {
  /** Operating frequency; defaults to the timing model's maximum. */
  frequency_mhz?: number;
  table?: ProcessTable;
};

export const DEFAULT_ACTIVITY_FACTOR = 0.1;
export const DEFAULT_ACTIVITY_SWEEP = [0.01, 0.05, 0.1, 0.2, 0.5] as const;

/** Fraction of dynamic power left once idle banks stop toggling. */
export const CLOCK_GATING_DYNAMIC_SCALE = 0.75;
/** Fraction of leakage left once idle banks have their rail switched off. */
export const POWER_GATING_STATIC_SCALE = 0.4;
/** Retention bias leakage as a fraction of active-mode static power. */
export const RETENTION_STATIC_FRACTION = 0.1;

function checkActivity(activity: number): void {
  if (typeof activity !== "number" || !Number.isFinite(activity) || activity < 0 || activity > 1) {
    throw new InvalidActivityFactorError(activity);
  }
}

/**
 * P_dyn = C·V²·f·α with C = column capacitance × stored width × banks,
 * P_static = total area × leakage density × V. Clock gating scales the first,
 * power gating the second; retention is reported separately in µW.
 */
export function estimatePower(
  config: SramConfig,
  activityFactor: number = DEFAULT_ACTIVITY_FACTOR,
  options: PowerOptions = {},
): PowerEstimate {
  checkActivity(activityFactor);
  const table = options.table ?? PROCESS_NODES;
  const node = lookupNode(config.process_node, table);
  const timing = estimateTiming(config, table);

  let frequency = timing.max_frequency_mhz;
  if (options.frequency_mhz !== undefined) {
    const f = options.frequency_mhz;
    if (!Number.isFinite(f) || f <= 0 || f > timing.max_frequency_mhz) {
      throw new ModelRangeError("frequency_mhz", f, [0, timing.max_frequency_mhz], config.process_node, true);
    }
    frequency = f;
  }

  const storedWidth = config.width + (config.ecc_enable ? eccCheckBits(config.width) : 0);
  const capacitancePf = node.column_cap_pf * storedWidth * config.banks;
  // pF · V² · MHz = µW
  let dynamic = (capacitancePf * config.voltage ** 2 * frequency * activityFactor) / 1000;
  if (config.clock_gating) dynamic *= CLOCK_GATING_DYNAMIC_SCALE;

  const area = estimateArea(config, table);
  let leakage = area.total_area_mm2 * node.leakage_mw_per_mm2 * config.voltage;
  if (config.power_gating) leakage *= POWER_GATING_STATIC_SCALE;

  const retention = config.retention_mode ? leakage * RETENTION_STATIC_FRACTION * 1000 : 0;

  return {
    dynamic_power_mw: dynamic,
    static_power_mw: leakage,
    total_power_mw: dynamic + leakage,
    retention_power_uw: retention,
    activity_factor: activityFactor,
    frequency_mhz: frequency,
  };
}

export function sweepActivity(
  config: SramConfig,
  factors: readonly number[] = DEFAULT_ACTIVITY_SWEEP,
  options: PowerOptions = {},
): Array<{ activity_factor: number; power: PowerEstimate }> {
  return factors.map((a) => ({ activity_factor: a, power: estimatePower(config, a, options) }));
}
