import { estimateArea, type AreaEstimate } from "./area.js";
import { describeConfig, featureTags, type SramConfig } from "./config.js";
import { DEFAULT_ACTIVITY_FACTOR, DEFAULT_ACTIVITY_SWEEP, estimatePower, type PowerEstimate } from "./power.js";
import { PROCESS_NODES, type ProcessTable } from "./process_nodes.js";
import { describeDesign } from "./rtl_structure.js";
import { estimateTiming, type TimingEstimate } from "./timing.js";

export type DesignSummary = {
  configuration: SramConfig;
  area: AreaEstimate;
  timing: TimingEstimate;
  power: PowerEstimate;
};

export type ComparisonRow = DesignSummary & { config_name: string };

export function summarize(
  config: SramConfig,
  activity: number = DEFAULT_ACTIVITY_FACTOR,
  table: ProcessTable = PROCESS_NODES,
): DesignSummary {
  return {
    configuration: config,
    area: estimateArea(config, table),
    timing: estimateTiming(config, table),
    power: estimatePower(config, activity, { table }),
  };
}

/** `{ "activity_0.01": {...}, ... }` over the default activity sweep. */
export function powerAnalysis(
  config: SramConfig,
  table: ProcessTable = PROCESS_NODES,
  factors: readonly number[] = DEFAULT_ACTIVITY_SWEEP,
): Record<string, PowerEstimate> {
  const out: Record<string, PowerEstimate> = {};
  for (const a of factors) out[`activity_${a}`] = estimatePower(config, a, { table });
  return out;
}

export function areaTimingAnalysis(
  config: SramConfig,
  table: ProcessTable = PROCESS_NODES,
): { area: AreaEstimate; timing: TimingEstimate } {
  return { area: estimateArea(config, table), timing: estimateTiming(config, table) };
}

function row(cells: Array<string | number>): string {
  return `| ${cells.join(" | ")} |`;
}

function mdTable(headers: string[], rows: string[]): string[] {
  return [row(headers), row(headers.map((h) => "-".repeat(Math.max(3, h.length)))), ...rows];
}

export function renderComparisonMarkdown(rows: ComparisonRow[]): string {
  const lines = ["# SRAM Configuration Comparison Report", "", "## Configuration Summary", ""];
  lines.push(
    ...mdTable(
      ["Config", "Depth", "Width", "Banks", "Voltage", "Process", "Power Features"],
      rows.map((r) => {
        const c = r.configuration;
        return row([r.config_name, c.depth, c.width, c.banks, `${c.voltage}V`, `${c.process_node}nm`, featureTags(c).join(", ")]);
      }),
    ),
  );

  lines.push("", "## Power Comparison", "");
  lines.push(
    ...mdTable(
      ["Config", "Dynamic Power (mW)", "Static Power (mW)", "Total Power (mW)", "Retention Power (µW)"],
      rows.map((r) =>
        row([
          r.config_name,
          r.power.dynamic_power_mw.toFixed(3),
          r.power.static_power_mw.toFixed(3),
          r.power.total_power_mw.toFixed(3),
          r.power.retention_power_uw.toFixed(1),
        ]),
      ),
    ),
  );

  lines.push("", "## Area Comparison", "");
  lines.push(
    ...mdTable(
      ["Config", "Total Area (mm²)", "Area Efficiency (%)", "Access Time (ns)", "Max Frequency (MHz)"],
      rows.map((r) =>
        row([
          r.config_name,
          r.area.total_area_mm2.toFixed(4),
          (r.area.area_efficiency * 100).toFixed(1),
          r.timing.access_time_ns.toFixed(2),
          r.timing.max_frequency_mhz.toFixed(1),
        ]),
      ),
    ),
  );
  return lines.join("\n") + "\n";
}

export function renderDesignReport(name: string, summary: DesignSummary): string {
  const { configuration: c, area, timing, power } = summary;
  const design = describeDesign(c);
  const lines = [
    `# SRAM Design Report: ${name}`,
    "",
    describeConfig(c),
    "",
    "## Configuration",
    "",
    ...mdTable(
      ["Parameter", "Value"],
      [
        row(["Depth", `${c.depth} words`]),
        row(["Width", `${c.width} bits`]),
        row(["Banks", c.banks]),
        row(["Voltage", `${c.voltage} V`]),
        row(["Process", `${c.process_node} nm`]),
        row(["Power gating", c.power_gating ? "yes" : "no"]),
        row(["Clock gating", c.clock_gating ? "yes" : "no"]),
        row(["Retention", c.retention_mode ? "yes" : "no"]),
        row(["ECC", c.ecc_enable ? `yes (${design.codeWidth - c.width} check bits)` : "no"]),
      ],
    ),
    "",
    "## Area",
    "",
    ...mdTable(
      ["Metric", "Value"],
      [
        row(["Bit-cell area (mm²)", area.bitcell_area_mm2.toFixed(4)]),
        row(["Periphery area (mm²)", area.periphery_area_mm2.toFixed(4)]),
        row(["Total area (mm²)", area.total_area_mm2.toFixed(4)]),
        row(["Area per bank (mm²)", area.bank_area_mm2.toFixed(4)]),
        row(["Area efficiency (%)", (area.area_efficiency * 100).toFixed(1)]),
      ],
    ),
    "",
    "## Timing",
    "",
    ...mdTable(
      ["Metric", "Value"],
      [
        row(["Access time (ns)", timing.access_time_ns.toFixed(2)]),
        row(["Cycle time (ns)", timing.cycle_time_ns.toFixed(2)]),
        row(["Max frequency (MHz)", timing.max_frequency_mhz.toFixed(1)]),
      ],
    ),
    "",
    `## Power (activity ${power.activity_factor}, ${power.frequency_mhz.toFixed(1)} MHz)`,
    "",
    ...mdTable(
      ["Metric", "Value"],
      [
        row(["Dynamic power (mW)", power.dynamic_power_mw.toFixed(3)]),
        row(["Static power (mW)", power.static_power_mw.toFixed(3)]),
        row(["Total power (mW)", power.total_power_mw.toFixed(3)]),
        row(["Retention power (µW)", power.retention_power_uw.toFixed(1)]),
      ],
    ),
    "",
    "## Modules",
    "",
    ...design.modules.map((m) => `- \`${m.name}\` (${m.role})`),
  ];
  return lines.join("\n") + "\n";
}
