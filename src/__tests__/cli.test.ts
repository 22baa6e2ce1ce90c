/**
 * Tests for main.ts and templates.ts
 */

import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeAll, beforeEach, describe, it, expect, vi } from "vitest";
import { ConfigurationError, SramError } from "../errors.js";
import { main, parseArgs } from "../main.js";
import { listTemplates, loadTemplates, parseTemplates, resolveConfigSource } from "../templates.js";

let tmp: string;

beforeAll(() => {
  process.env.SRAM_LOG_LEVEL = "silent";
});

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "sram-cli-"));
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmp, { recursive: true, force: true });
});

// ══════════════════════════════════════════════════════════════════════
// templates
// ══════════════════════════════════════════════════════════════════════

describe("templates", () => {
  it("lists the bundled templates", () => {
    const lines = listTemplates(loadTemplates());
    expect(lines).toContain("low_power_1kx32: 1024x32, 4 banks, 28nm");
    expect(lines).toContain("ecc_protected_2kx32: 2048x32, 4 banks, 28nm");
  });

  it("rejects a document without example_configs", () => {
    expect(() => parseTemplates({ configs: {} })).toThrow(SramError);
  });

  it("resolves a template name", () => {
    const src = resolveConfigSource("legacy_256x8");
    expect(src.name).toBe("legacy_256x8");
    expect(src.raw).toEqual({ depth: 256, width: 8, banks: 1, voltage: 1.8, process_node: 180 });
  });

  it("reads JSON and YAML configuration files", () => {
    const json = path.join(tmp, "tiny.json");
    fs.writeFileSync(json, JSON.stringify({ depth: 16, width: 8, banks: 1, voltage: 1.0, process_node: 65 }));
    expect(resolveConfigSource(json)).toEqual({ name: "tiny", raw: { depth: 16, width: 8, banks: 1, voltage: 1, process_node: 65 } });

    const yml = path.join(tmp, "small.yml");
    fs.writeFileSync(yml, "depth: 64\nwidth: 16\nbanks: 2\nvoltage: 0.8\nprocess_node: 16\n");
    expect(resolveConfigSource(yml).raw).toEqual({ depth: 64, width: 16, banks: 2, voltage: 0.8, process_node: 16 });
  });

  it("names the available templates for an unknown name", () => {
    expect(() => resolveConfigSource("no_such_macro")).toThrow(ConfigurationError);
    expect(() => resolveConfigSource("no_such_macro")).toThrow("low_power_1kx32");
  });
});

// ══════════════════════════════════════════════════════════════════════
// parseArgs
// ══════════════════════════════════════════════════════════════════════

describe("parseArgs", () => {
  it("defaults every switch to off", () => {
    const o = parseArgs([]);
    expect(o.output).toBe("output");
    expect(o.generateVerilog || o.powerAnalysis || o.areaAnalysis || o.diagram || o.listConfigs).toBe(false);
    expect(o.config).toBeUndefined();
  });

  it("reads values and collects compare names up to the next flag", () => {
    const o = parseArgs(["--config", "x", "--compare", "a", "b", "--diagram", "--output", "out"]);
    expect(o.config).toBe("x");
    expect(o.compare).toEqual(["a", "b"]);
    expect(o.diagram).toBe(true);
    expect(o.output).toBe("out");
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown argument '--verbose'");
    expect(() => parseArgs(["--config"])).toThrow("--config expects a value");
    expect(() => parseArgs(["--output", "--diagram"])).toThrow("--output expects a value");
    expect(() => parseArgs(["--compare"])).toThrow("--compare expects at least one configuration");
  });
});

// ══════════════════════════════════════════════════════════════════════
// main
// ══════════════════════════════════════════════════════════════════════

describe("main", () => {
  it("lists configurations on stdout", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    expect(await main(["--list-configs"])).toEqual([]);
    expect(log.mock.calls[0]).toEqual(["Available configurations:"]);
    expect(log.mock.calls[1]).toEqual(["  low_power_1kx32: 1024x32, 4 banks, 28nm"]);
  });

  it("writes RTL, analyses, diagram and report for a template", async () => {
    const written = await main([
      "--config", "low_power_1kx32", "--output", tmp,
      "--generate-verilog", "--power-analysis", "--area-analysis", "--diagram",
    ]);
    expect(written.map((f) => path.relative(tmp, f))).toEqual([
      path.join("verilog", "sram_1024x32_b4_pgcgrt.v"),
      path.join("verilog", "sram_1024x32_b4_pgcgrt_core.v"),
      path.join("verilog", "sram_1024x32_b4_pgcgrt_pg_wrap.v"),
      path.join("verilog", "sram_1024x32_b4_pgcgrt_cg.v"),
      "power_analysis.json",
      "area_timing_analysis.json",
      "low_power_1kx32_diagram.svg",
      "low_power_1kx32_report.md",
    ]);
    const power = JSON.parse(fs.readFileSync(path.join(tmp, "power_analysis.json"), "utf8"));
    expect(Object.keys(power)).toEqual(["activity_0.01", "activity_0.05", "activity_0.1", "activity_0.2", "activity_0.5"]);
    const areaTiming = JSON.parse(fs.readFileSync(path.join(tmp, "area_timing_analysis.json"), "utf8"));
    expect(Object.keys(areaTiming)).toEqual(["area", "timing"]);
    expect(fs.readFileSync(path.join(tmp, "low_power_1kx32_report.md"), "utf8").split("\n")[0]).toBe(
      "# SRAM Design Report: low_power_1kx32",
    );
  });

  it("writes the comparison report", async () => {
    const written = await main(["--compare", "low_power_1kx32", "ecc_protected_2kx32", "--output", tmp]);
    expect(written.map((f) => path.basename(f))).toEqual(["comparison_report.json", "comparison_report.md"]);
    const rows = JSON.parse(fs.readFileSync(path.join(tmp, "comparison_report.json"), "utf8"));
    expect(rows.map((r: { config_name: string }) => r.config_name)).toEqual(["low_power_1kx32", "ecc_protected_2kx32"]);
  });

  it("applies process-node overrides from --tech", async () => {
    const tech = path.join(tmp, "tech.yaml");
    fs.writeFileSync(tech, "process_nodes:\n  28:\n    v_max: 1.3\n");
    const conf = path.join(tmp, "hot.yaml");
    fs.writeFileSync(conf, "depth: 256\nwidth: 16\nbanks: 1\nvoltage: 1.25\nprocess_node: 28\n");
    await expect(main(["--config", conf, "--output", tmp])).rejects.toThrow("outside the supported range [0.8, 1.1]");
    const written = await main(["--config", conf, "--output", tmp, "--tech", tech]);
    expect(written.map((f) => path.basename(f))).toEqual(["hot_report.md"]);
  });

  it("requires a configuration", async () => {
    await expect(main(["--output", tmp])).rejects.toThrow(SramError);
  });

  it("surfaces configuration errors", async () => {
    const conf = path.join(tmp, "bad.json");
    fs.writeFileSync(conf, JSON.stringify({ depth: 1000, width: 8, banks: 3, voltage: 1.0, process_node: 65 }));
    await expect(main(["--config", conf, "--output", tmp])).rejects.toThrow(ConfigurationError);
  });
});
