/**
 * Tests for generate_verilog.ts
 */

import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createConfig, type SramConfig } from "../config.js";
import { ArtifactWriteError } from "../errors.js";
import { generateVerilog, writeArtifacts } from "../generate_verilog.js";

function cfg(overrides: Record<string, unknown> = {}): SramConfig {
  return createConfig({ depth: 1024, width: 32, banks: 4, voltage: 0.9, process_node: 28, ...overrides });
}

function readAll(dir: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const name of fs.readdirSync(dir).sort()) out[name] = fs.readFileSync(path.join(dir, name), "utf8");
  return out;
}

let tmp: string;

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "sram-rtl-"));
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe("generateVerilog", () => {
  it("writes every module and returns the artifact names", () => {
    const dest = path.join(tmp, "rtl");
    const names = generateVerilog(cfg({ clock_gating: true }), dest);
    expect(names).toEqual(["sram_1024x32_b4_cg.v", "sram_1024x32_b4_cg_core.v", "sram_1024x32_b4_cg_cg.v"]);
    expect(fs.readdirSync(dest).sort()).toEqual([...names].sort());
    expect(fs.readdirSync(tmp)).toEqual(["rtl"]);
  });

  it("creates missing parent directories", () => {
    const dest = path.join(tmp, "a", "b", "rtl");
    generateVerilog(cfg(), dest);
    expect(fs.existsSync(path.join(dest, "sram_1024x32_b4.v"))).toBe(true);
  });

  it("replaces an existing destination as a unit", () => {
    const dest = path.join(tmp, "rtl");
    fs.mkdirSync(dest);
    fs.writeFileSync(path.join(dest, "stale.v"), "module stale; endmodule\n");
    const names = generateVerilog(cfg(), dest);
    expect(fs.readdirSync(dest).sort()).toEqual([...names].sort());
    expect(fs.readdirSync(tmp)).toEqual(["rtl"]);
  });

  it("produces byte-identical sets for identical configurations", () => {
    const a = path.join(tmp, "a");
    const b = path.join(tmp, "b");
    generateVerilog(cfg({ ecc_enable: true, power_gating: true }), a);
    generateVerilog(cfg({ ecc_enable: true, power_gating: true }), b);
    expect(readAll(a)).toEqual(readAll(b));
  });

  it("scenario: adds ECC artifacts only when ECC is enabled", () => {
    const on = generateVerilog(cfg({ ecc_enable: true }), path.join(tmp, "on"));
    const off = generateVerilog(cfg(), path.join(tmp, "off"));
    expect(on).toContain("sram_1024x32_b4_ec.v");
    expect(on.filter((n) => n.includes("ecc"))).toEqual(["sram_1024x32_b4_ec_ecc_enc.v", "sram_1024x32_b4_ec_ecc_dec.v"]);
    expect(off.some((n) => n.includes("ecc"))).toBe(false);
  });

  it("fails with ArtifactWriteError when the parent is a file", () => {
    const blocker = path.join(tmp, "blocker");
    fs.writeFileSync(blocker, "");
    const dest = path.join(blocker, "rtl");
    expect(() => generateVerilog(cfg(), dest)).toThrow(ArtifactWriteError);
  });

  it("refuses to replace a file and leaves no staging directory behind", () => {
    const dest = path.join(tmp, "taken.v");
    fs.writeFileSync(dest, "keep");
    try {
      generateVerilog(cfg(), dest);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ArtifactWriteError);
      if (!(e instanceof ArtifactWriteError)) return;
      expect(e.destination).toBe(dest);
      expect(e.message).toContain("destination exists and is not a directory");
    }
    expect(fs.readdirSync(tmp)).toEqual(["taken.v"]);
    expect(fs.readFileSync(dest, "utf8")).toBe("keep");
  });

  it("keeps the previous generation when a staged write fails", () => {
    const dest = path.join(tmp, "rtl");
    const first = generateVerilog(cfg(), dest);
    const before = readAll(dest);
    const artifacts = [
      { name: "ok.v", module: "ok", text: "module ok; endmodule\n" },
      { name: "no/such.v", module: "such", text: "module such; endmodule\n" },
    ];
    expect(() => writeArtifacts(dest, artifacts)).toThrow(ArtifactWriteError);
    expect(fs.readdirSync(dest).sort()).toEqual([...first].sort());
    expect(readAll(dest)).toEqual(before);
    expect(fs.readdirSync(tmp)).toEqual(["rtl"]);
  });

  it("leaves a concurrently published set in place and reports the original failure", () => {
    const dest = path.join(tmp, "rtl");
    generateVerilog(cfg(), dest);
    const rename = fs.renameSync;
    let calls = 0;
    vi.spyOn(fs, "renameSync").mockImplementation((from, to) => {
      calls += 1;
      if (calls === 2) {
        // another writer lands its set between the two renames
        fs.mkdirSync(to);
        fs.writeFileSync(path.join(String(to), "other.v"), "module other; endmodule\n");
        throw new Error("destination taken");
      }
      rename(from, to);
    });
    try {
      generateVerilog(cfg({ clock_gating: true }), dest);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ArtifactWriteError);
      if (!(e instanceof ArtifactWriteError)) return;
      expect(e.message).toBe(`Cannot write artifacts to ${dest} (cannot publish staged artifacts): destination taken`);
      expect(e.cause).toBeInstanceOf(Error);
    }
    expect(calls).toBe(3);
    expect(fs.readdirSync(dest)).toEqual(["other.v"]);
    expect(fs.readdirSync(tmp)).toEqual(["rtl"]);
  });
});
