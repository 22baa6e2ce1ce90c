import { createHash } from "crypto";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { lookupNode, PROCESS_NODES, type ProcessTable } from "./process_nodes.js";
import { isRecord } from "./util.js";

export type SramConfig = Readonly<{
  depth: number;
  width: number;
  banks: number;
  voltage: number;
  process_node: number;
  power_gating: boolean;
  clock_gating: boolean;
  retention_mode: boolean;
  ecc_enable: boolean;
}>;

export type ConfigField = keyof SramConfig;

export const CONFIG_FIELDS = [
  "depth",
  "width",
  "banks",
  "voltage",
  "process_node",
  "power_gating",
  "clock_gating",
  "retention_mode",
  "ecc_enable",
] as const satisfies readonly ConfigField[];

const FIELD_SET: ReadonlySet<string> = new Set(CONFIG_FIELDS);

const EXPECTED: Record<ConfigField, string> = {
  depth: "a positive integer number of words",
  width: "a positive integer number of bits per word",
  banks: "a positive integer number of banks",
  voltage: "a positive supply voltage in volts",
  process_node: "a positive integer process node in nm",
  power_gating: "a boolean",
  clock_gating: "a boolean",
  retention_mode: "a boolean",
  ecc_enable: "a boolean",
};

const configSchema = z
  .object({
    depth: z.number().int().positive().safe(),
    width: z.number().int().positive().safe(),
    banks: z.number().int().positive().safe(),
    voltage: z.number().finite().positive(),
    process_node: z.number().int().positive().safe(),
    power_gating: z.boolean().default(false),
    clock_gating: z.boolean().default(false),
    retention_mode: z.boolean().default(false),
    ecc_enable: z.boolean().default(false),
  })
  .strict();

function isConfigField(s: string): s is ConfigField {
  return FIELD_SET.has(s);
}

function issueToError(raw: Record<string, unknown>, issue: z.ZodIssue): ConfigurationError {
  if (issue.code === "unrecognized_keys") {
    const key = issue.keys[0] ?? "?";
    return new ConfigurationError(key, raw[key], `no such field (known fields: ${CONFIG_FIELDS.join(", ")})`);
  }
  const field = String(issue.path[0] ?? "?");
  const value = raw[field];
  if (!isConfigField(field)) return new ConfigurationError(field, value, issue.message);
  if (issue.code === "too_big") {
    return new ConfigurationError(field, value, `${EXPECTED[field]} no larger than ${String(issue.maximum)}`);
  }
  return new ConfigurationError(field, value, value === undefined ? `${EXPECTED[field]} (required)` : EXPECTED[field]);
}

/**
 * Validates a raw configuration record and returns a frozen SramConfig.
 * Feature flags default to false when omitted; every other field is required.
 * A depth that does not divide evenly into banks is rejected rather than
 * rounded or padded.
 */
export function createConfig(raw: unknown, table: ProcessTable = PROCESS_NODES): SramConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError("configuration", raw, "a record of configuration fields");
  }
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw first ? issueToError(raw, first) : new ConfigurationError("configuration", raw, parsed.error.message);
  }
  const cfg = parsed.data;
  if (cfg.banks > cfg.depth) {
    throw new ConfigurationError("banks", cfg.banks, `at most depth (${cfg.depth})`);
  }
  if (cfg.depth % cfg.banks !== 0) {
    throw new ConfigurationError("banks", cfg.banks, `a divisor of depth (${cfg.depth})`);
  }
  lookupNode(cfg.process_node, table);
  return Object.freeze({ ...cfg });
}

export function featureTags(config: SramConfig): string[] {
  const tags: string[] = [];
  if (config.power_gating) tags.push("PG");
  if (config.clock_gating) tags.push("CG");
  if (config.retention_mode) tags.push("RET");
  if (config.ecc_enable) tags.push("ECC");
  return tags;
}

export function describeConfig(config: SramConfig): string {
  const tags = featureTags(config);
  const banks = `${config.banks} ${config.banks === 1 ? "bank" : "banks"}`;
  return `${config.depth}x${config.width}, ${banks}, ${config.process_node}nm, ${config.voltage}V [${tags.length ? tags.join(", ") : "none"}]`;
}

export function configFingerprint(config: SramConfig): string {
  const canonical = JSON.stringify(CONFIG_FIELDS.map((f) => [f, config[f]]));
  return createHash("sha256").update(canonical).digest("hex").slice(0, 12);
}
