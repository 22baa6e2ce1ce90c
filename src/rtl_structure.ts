import { configFingerprint, type SramConfig } from "./config.js";
import { eccLayout, type EccLayout } from "./ecc.js";

export type PortDirection = "input" | "output";

export type RtlPort = {
  name: string;
  direction: PortDirection;
  width: number;
  /** Parameter the declared range is written against, e.g. ADDR_WIDTH. */
  widthParam?: string;
};

export type RtlNet = {
  name: string;
  width: number;
  widthParam?: string;
};

export type RtlParam = { name: string; value: number };

export type RtlInstance = {
  module: string;
  name: string;
  params: Array<{ name: string; expr: string }>;
  connections: Array<{ port: string; expr: string }>;
};

export type ModuleRole = "top" | "core" | "pg_wrapper" | "clock_gate" | "ecc_encoder" | "ecc_decoder";

export type RtlModule = {
  name: string;
  role: ModuleRole;
  params: RtlParam[];
  ports: RtlPort[];
  nets: RtlNet[];
  assigns: Array<{ lhs: string; rhs: string }>;
  instances: RtlInstance[];
};

export type SramDesign = {
  config: SramConfig;
  baseName: string;
  fingerprint: string;
  addrWidth: number;
  bankDepth: number;
  codeWidth: number;
  ecc?: EccLayout;
  modules: RtlModule[];
};

export function addrWidthFor(depth: number): number {
  let w = 0;
  while (2 ** w < depth) w += 1;
  return Math.max(1, w);
}

export function moduleBaseName(config: SramConfig): string {
  const tags = [
    config.power_gating ? "pg" : "",
    config.clock_gating ? "cg" : "",
    config.retention_mode ? "rt" : "",
    config.ecc_enable ? "ec" : "",
  ].join("");
  const base = `sram_${config.depth}x${config.width}_b${config.banks}`;
  return tags ? `${base}_${tags}` : base;
}

const input = (name: string, width = 1, widthParam?: string): RtlPort => ({ name, direction: "input", width, widthParam });
const output = (name: string, width = 1, widthParam?: string): RtlPort => ({ name, direction: "output", width, widthParam });

function module(name: string, role: ModuleRole, params: RtlParam[], ports: RtlPort[], body: Partial<Pick<RtlModule, "nets" | "assigns" | "instances">> = {}): RtlModule {
  return {
    name,
    role,
    params,
    ports,
    nets: body.nets ?? [],
    assigns: body.assigns ?? [],
    instances: body.instances ?? [],
  };
}

function passParams(params: RtlParam[]): RtlInstance["params"] {
  return params.map((p) => ({ name: p.name, expr: p.name }));
}

function passPorts(ports: RtlPort[]): RtlInstance["connections"] {
  return ports.map((p) => ({ port: p.name, expr: p.name }));
}

/**
 * Which modules exist, with which parameters, ports, nets and instance
 * connections. Pure function of the configuration; rendering to text lives in
 * rtl_render.
 */
export function describeDesign(config: SramConfig): SramDesign {
  const base = moduleBaseName(config);
  const ecc = config.ecc_enable ? eccLayout(config.width) : undefined;
  const codeWidth = config.width + (ecc?.check_bits ?? 0);
  const addrWidth = addrWidthFor(config.depth);
  const bankDepth = config.depth / config.banks;
  const pg = config.power_gating;
  const ret = config.retention_mode;

  const arrayParams: RtlParam[] = [
    { name: "DEPTH", value: config.depth },
    { name: "ADDR_WIDTH", value: addrWidth },
    { name: "CODE_WIDTH", value: codeWidth },
    { name: "BANKS", value: config.banks },
    { name: "BANK_DEPTH", value: bankDepth },
  ];
  const arrayPorts = (extra: RtlPort[]): RtlPort[] => [
    input("clk"),
    input("ce"),
    input("we"),
    input("addr", addrWidth, "ADDR_WIDTH"),
    input("wdata", codeWidth, "CODE_WIDTH"),
    output("rdata", codeWidth, "CODE_WIDTH"),
    ...extra,
    ...(ret ? [input("ret_en")] : []),
  ];

  const modules: RtlModule[] = [];
  const core = module(`${base}_core`, "core", arrayParams, arrayPorts(pg ? [input("bank_en", config.banks, "BANKS")] : []));

  let arrayModule = core;
  let pgWrapper: RtlModule | undefined;
  if (pg) {
    pgWrapper = module(`${base}_pg_wrap`, "pg_wrapper", arrayParams, arrayPorts([input("sleep", config.banks, "BANKS")]), {
      nets: [{ name: "bank_en", width: config.banks, widthParam: "BANKS" }],
      assigns: [{ lhs: "bank_en", rhs: "~sleep" }],
      instances: [{ module: core.name, name: "u_core", params: passParams(arrayParams), connections: passPorts(core.ports) }],
    });
    arrayModule = pgWrapper;
  }

  const clockGate = config.clock_gating
    ? module(`${base}_cg`, "clock_gate", [], [input("clk"), input("en"), output("gclk")])
    : undefined;

  const eccParams: RtlParam[] = ecc
    ? [
        { name: "DATA_WIDTH", value: config.width },
        { name: "CHECK_BITS", value: ecc.check_bits },
        { name: "CODE_WIDTH", value: codeWidth },
      ]
    : [];
  const encoder = ecc
    ? module(`${base}_ecc_enc`, "ecc_encoder", eccParams, [input("data_i", config.width, "DATA_WIDTH"), output("code_o", codeWidth, "CODE_WIDTH")])
    : undefined;
  const decoder = ecc
    ? module(`${base}_ecc_dec`, "ecc_decoder", eccParams, [
        input("code_i", codeWidth, "CODE_WIDTH"),
        output("data_o", config.width, "DATA_WIDTH"),
        output("correctable_o"),
        output("uncorrectable_o"),
      ])
    : undefined;

  const topParams: RtlParam[] = [
    { name: "DEPTH", value: config.depth },
    { name: "ADDR_WIDTH", value: addrWidth },
    { name: "DATA_WIDTH", value: config.width },
    { name: "CODE_WIDTH", value: codeWidth },
    { name: "BANKS", value: config.banks },
    { name: "BANK_DEPTH", value: bankDepth },
    ...(ecc ? [{ name: "CHECK_BITS", value: ecc.check_bits }] : []),
  ];
  const topPorts: RtlPort[] = [
    input("clk"),
    input("ce"),
    input("we"),
    input("addr", addrWidth, "ADDR_WIDTH"),
    input("wdata", config.width, "DATA_WIDTH"),
    output("rdata", config.width, "DATA_WIDTH"),
    ...(pg ? [input("sleep", config.banks, "BANKS")] : []),
    ...(ret ? [input("ret_en")] : []),
    ...(ecc ? [output("ecc_correctable"), output("ecc_uncorrectable")] : []),
  ];

  const nets: RtlNet[] = [
    { name: "wcode", width: codeWidth, widthParam: "CODE_WIDTH" },
    { name: "rcode", width: codeWidth, widthParam: "CODE_WIDTH" },
    ...(clockGate ? [{ name: "gclk", width: 1 }] : []),
  ];
  const instances: RtlInstance[] = [];
  if (clockGate) {
    instances.push({
      module: clockGate.name,
      name: "u_cg",
      params: [],
      connections: [
        { port: "clk", expr: "clk" },
        { port: "en", expr: ret ? "ce & ~ret_en" : "ce" },
        { port: "gclk", expr: "gclk" },
      ],
    });
  }
  if (encoder) {
    instances.push({
      module: encoder.name,
      name: "u_ecc_enc",
      params: passParams(eccParams),
      connections: [
        { port: "data_i", expr: "wdata" },
        { port: "code_o", expr: "wcode" },
      ],
    });
  }
  const arrayWiring: Record<string, string> = { clk: clockGate ? "gclk" : "clk", wdata: "wcode", rdata: "rcode" };
  instances.push({
    module: arrayModule.name,
    name: pg ? "u_pg" : "u_core",
    params: passParams(arrayParams),
    connections: arrayModule.ports.map((p) => ({ port: p.name, expr: arrayWiring[p.name] ?? p.name })),
  });
  if (decoder) {
    instances.push({
      module: decoder.name,
      name: "u_ecc_dec",
      params: passParams(eccParams),
      connections: [
        { port: "code_i", expr: "rcode" },
        { port: "data_o", expr: "rdata" },
        { port: "correctable_o", expr: "ecc_correctable" },
        { port: "uncorrectable_o", expr: "ecc_uncorrectable" },
      ],
    });
  }
  const assigns = ecc
    ? []
    : [
        { lhs: "wcode", rhs: "wdata" },
        { lhs: "rdata", rhs: "rcode" },
      ];

  modules.push(module(base, "top", topParams, topPorts, { nets, assigns, instances }));
  modules.push(core);
  if (pgWrapper) modules.push(pgWrapper);
  if (clockGate) modules.push(clockGate);
  if (encoder) modules.push(encoder);
  if (decoder) modules.push(decoder);

  return {
    config,
    baseName: base,
    fingerprint: configFingerprint(config),
    addrWidth,
    bankDepth,
    codeWidth,
    ecc,
    modules,
  };
}

export function findModule(design: SramDesign, role: ModuleRole): RtlModule | undefined {
  return design.modules.find((m) => m.role === role);
}
