import { describeConfig } from "./config.js";
import type { EccLayout } from "./ecc.js";
import type { ModuleRole, RtlInstance, RtlModule, RtlPort, SramDesign } from "./rtl_structure.js";
import { die, pad } from "./util.js";

export type VerilogArtifact = {
  name: string;
  module: string;
  text: string;
};

const ROLE_TITLE: Record<ModuleRole, string> = {
  top: "SRAM macro top level",
  core: "banked bit-cell array",
  pg_wrapper: "bank power-gating wrapper",
  clock_gate: "integrated clock gate",
  ecc_encoder: "SEC-DED check-bit encoder",
  ecc_decoder: "SEC-DED decoder and corrector",
};

const XOR_TERMS_PER_LINE = 8;

function range(width: number, widthParam?: string): string {
  if (widthParam) return `[${widthParam}-1:0]`;
  return width > 1 ? `[${width - 1}:0]` : "";
}

function header(design: SramDesign, mod: RtlModule): string[] {
  return [
    `// ${mod.name}: ${ROLE_TITLE[mod.role]}`,
    `// Generated by sram-compiler for ${describeConfig(design.config)}. Do not edit.`,
    `// Configuration fingerprint: ${design.fingerprint}`,
    "`timescale 1ns / 1ps",
    "`default_nettype none",
    "",
  ];
}

function declaration(mod: RtlModule): string[] {
  const lines: string[] = [];
  if (mod.params.length > 0) {
    const nw = Math.max(...mod.params.map((p) => p.name.length));
    lines.push(`module ${mod.name} #(`);
    mod.params.forEach((p, i) => {
      lines.push(`  parameter ${pad(p.name, nw)} = ${p.value}${i < mod.params.length - 1 ? "," : ""}`);
    });
    lines.push(") (");
  } else {
    lines.push(`module ${mod.name} (`);
  }
  lines.push(...portLines(mod.ports));
  lines.push(");");
  return lines;
}

function portLines(ports: RtlPort[]): string[] {
  const rw = Math.max(0, ...ports.map((p) => range(p.width, p.widthParam).length));
  return ports.map((p, i) => {
    const r = rw > 0 ? `${pad(range(p.width, p.widthParam), rw)} ` : "";
    return `  ${pad(p.direction, 6)} wire ${r}${p.name}${i < ports.length - 1 ? "," : ""}`;
  });
}

function instanceLines(inst: RtlInstance): string[] {
  const lines: string[] = [];
  if (inst.params.length > 0) {
    lines.push(`  ${inst.module} #(`);
    inst.params.forEach((p, i) => lines.push(`    .${p.name}(${p.expr})${i < inst.params.length - 1 ? "," : ""}`));
    lines.push(`  ) ${inst.name} (`);
  } else {
    lines.push(`  ${inst.module} ${inst.name} (`);
  }
  const pw = Math.max(...inst.connections.map((c) => c.port.length));
  inst.connections.forEach((c, i) => {
    lines.push(`    .${pad(c.port, pw)} (${c.expr})${i < inst.connections.length - 1 ? "," : ""}`);
  });
  lines.push("  );");
  return lines;
}

function structuralBody(mod: RtlModule): string[] {
  const lines: string[] = [];
  if (mod.nets.length > 0) {
    const rw = Math.max(0, ...mod.nets.map((n) => range(n.width, n.widthParam).length));
    for (const n of mod.nets) {
      const r = rw > 0 ? `${pad(range(n.width, n.widthParam), rw)} ` : "";
      lines.push(`  wire ${r}${n.name};`);
    }
    lines.push("");
  }
  if (mod.assigns.length > 0) {
    for (const a of mod.assigns) lines.push(`  assign ${a.lhs} = ${a.rhs};`);
    lines.push("");
  }
  mod.instances.forEach((inst, i) => {
    if (i > 0) lines.push("");
    lines.push(...instanceLines(inst));
  });
  return lines;
}

function coreBody(mod: RtlModule): string[] {
  const has = (name: string) => mod.ports.some((p) => p.name === name);
  const access = has("ret_en") ? "ce & ~ret_en" : "ce";
  const enable = ["access", ...(has("bank_en") ? ["bank_en[b]"] : []), "bank_sel == b"].join(" && ");
  return [
    "  wire [ADDR_WIDTH-1:0]       bank_sel  = addr / BANK_DEPTH;",
    "  wire [ADDR_WIDTH-1:0]       bank_addr = addr % BANK_DEPTH;",
    `  wire                        access    = ${access};`,
    "  wire [BANKS*CODE_WIDTH-1:0] bank_rdata;",
    "  reg  [ADDR_WIDTH-1:0]       bank_sel_q;",
    "",
    "  always @(posedge clk) begin",
    "    if (access && !we) bank_sel_q <= bank_sel;",
    "  end",
    "",
    "  genvar b;",
    "  generate",
    "    for (b = 0; b < BANKS; b = b + 1) begin : g_bank",
    "      reg [CODE_WIDTH-1:0] mem [0:BANK_DEPTH-1];",
    "      reg [CODE_WIDTH-1:0] q;",
    "",
    "      always @(posedge clk) begin",
    `        if (${enable}) begin`,
    "          if (we) mem[bank_addr] <= wdata;",
    "          else    q <= mem[bank_addr];",
    "        end",
    "      end",
    "",
    "      assign bank_rdata[b*CODE_WIDTH +: CODE_WIDTH] = q;",
    "    end",
    "  endgenerate",
    "",
    "  assign rdata = bank_rdata[bank_sel_q*CODE_WIDTH +: CODE_WIDTH];",
  ];
}

function clockGateBody(): string[] {
  return [
    "  reg en_latch;",
    "",
    "  // Transparent while clk is low.",
    "  always @(*) begin",
    "    if (!clk) en_latch = en;",
    "  end",
    "",
    "  assign gclk = clk & en_latch;",
  ];
}

function xorAssign(lhs: string, terms: string[]): string[] {
  const lead = `  assign ${lhs} = `;
  const lines: string[] = [];
  for (let i = 0; i < terms.length; i += XOR_TERMS_PER_LINE) {
    const chunk = terms.slice(i, i + XOR_TERMS_PER_LINE).join(" ^ ");
    const last = i + XOR_TERMS_PER_LINE >= terms.length;
    const prefix = i === 0 ? lead : " ".repeat(lead.length - 2) + "^ ";
    lines.push(`${prefix}${chunk}${last ? ";" : ""}`);
  }
  return lines;
}

function encoderBody(ecc: EccLayout): string[] {
  const r = ecc.hamming_bits;
  const lines = [`  wire [${r - 1}:0] check;`, ""];
  ecc.coverage.forEach((bits, i) => {
    lines.push(...xorAssign(`check[${i}]`, bits.map((j) => `data_i[${j}]`)));
  });
  lines.push("", "  assign code_o = {^{check, data_i}, check, data_i};");
  return lines;
}

function decoderBody(ecc: EccLayout): string[] {
  const r = ecc.hamming_bits;
  const rw = "[DATA_WIDTH-1:0]".length;
  const decl = (rng: string, rest: string) => `  wire ${pad(rng, rw)} ${rest}`;
  const lines = [
    decl("[DATA_WIDTH-1:0]", "data       = code_i[DATA_WIDTH-1:0];"),
    decl(`[${r - 1}:0]`, `check      = code_i[DATA_WIDTH +: ${r}];`),
    decl(`[${r - 1}:0]`, "syndrome;"),
    decl("", "parity_err = ^code_i;"),
    "",
  ];
  ecc.coverage.forEach((bits, i) => {
    lines.push(...xorAssign(`syndrome[${i}]`, [`check[${i}]`, ...bits.map((j) => `data[${j}]`)]));
  });
  lines.push(
    "",
    "  assign correctable_o   = parity_err;",
    "  assign uncorrectable_o = ~parity_err & (|syndrome);",
    "",
  );
  ecc.data_positions.forEach((pos, j) => {
    lines.push(`  assign data_o[${j}] = data[${j}] ^ (parity_err & (syndrome == ${r}'d${pos}));`);
  });
  return lines;
}

function body(design: SramDesign, mod: RtlModule): string[] {
  switch (mod.role) {
    case "top":
    case "pg_wrapper":
      return structuralBody(mod);
    case "core":
      return coreBody(mod);
    case "clock_gate":
      return clockGateBody();
    case "ecc_encoder":
      return encoderBody(design.ecc ?? die(`${mod.name}: design has no ECC layout`));
    case "ecc_decoder":
      return decoderBody(design.ecc ?? die(`${mod.name}: design has no ECC layout`));
  }
}

export function renderModule(design: SramDesign, mod: RtlModule): string {
  const lines = [...header(design, mod), ...declaration(mod), "", ...body(design, mod), "", "endmodule", "", "`default_nettype wire", ""];
  return lines.join("\n");
}

export function renderDesign(design: SramDesign): VerilogArtifact[] {
  return design.modules.map((m) => ({ name: `${m.name}.v`, module: m.name, text: renderModule(design, m) }));
}
