import { layoutGraph } from "./layout.js";
import { renderSvg } from "./render_svg.js";
import type { ModuleRole, RtlModule, SramDesign } from "./rtl_structure.js";
import { sizeGraph } from "./size.js";
import type { Edge, Graph, Node } from "./util.js";

const ROLE_CATEGORY: Record<ModuleRole, string> = {
  top: "io",
  core: "mem",
  pg_wrapper: "mem",
  clock_gate: "ctrl",
  ecc_encoder: "compute",
  ecc_decoder: "compute",
};

const INPUTS = "inputs";
const OUTPUTS = "outputs";

function identifiers(expr: string): string[] {
  return expr.match(/[A-Za-z_][A-Za-z0-9_]*/g) ?? [];
}

/**
 * One node per instance in the top module plus the two port groups; one edge
 * per (driver, load) pair, labelled with the nets it carries.
 */
export function designGraph(design: SramDesign): Graph {
  const top = design.modules.find((m) => m.role === "top");
  if (!top) return { nodes: [], edges: [] };
  const byName = new Map<string, RtlModule>(design.modules.map((m) => [m.name, m]));

  const nodes: Node[] = [
    { id: INPUTS, label: "inputs", category: "io", attrs: { ports: String(top.ports.filter((p) => p.direction === "input").length) } },
  ];
  const drivers = new Map<string, string>();
  const widths = new Map<string, number>();
  for (const p of top.ports) {
    widths.set(p.name, p.width);
    if (p.direction === "input") drivers.set(p.name, INPUTS);
  }
  for (const n of top.nets) widths.set(n.name, n.width);

  for (const inst of top.instances) {
    const mod = byName.get(inst.module);
    nodes.push({
      id: inst.name,
      label: inst.name,
      category: ROLE_CATEGORY[mod?.role ?? "top"],
      attrs: { module: inst.module, ports: String(inst.connections.length) },
    });
    for (const c of inst.connections) {
      const port = mod?.ports.find((p) => p.name === c.port);
      if (port?.direction === "output") drivers.set(c.expr, inst.name);
    }
  }
  nodes.push({ id: OUTPUTS, label: "outputs", category: "io", attrs: { ports: String(top.ports.filter((p) => p.direction === "output").length) } });

  const assigned = new Map(top.assigns.map((a) => [a.lhs, a.rhs]));
  const driverOf = (net: string, seen: Set<string> = new Set()): string | undefined => {
    const direct = drivers.get(net);
    if (direct) return direct;
    const rhs = assigned.get(net);
    if (rhs === undefined || seen.has(net)) return undefined;
    seen.add(net);
    for (const id of identifiers(rhs)) {
      const d = driverOf(id, seen);
      if (d) return d;
    }
    return undefined;
  };

  const edgeMap = new Map<string, { source: string; target: string; nets: string[]; width: number }>();
  const connect = (net: string, load: string) => {
    const source = driverOf(net);
    if (!source || source === load) return;
    const key = `${source}->${load}`;
    const e = edgeMap.get(key) ?? { source, target: load, nets: [], width: 0 };
    if (!e.nets.includes(net)) {
      e.nets.push(net);
      e.width += widths.get(net) ?? 1;
    }
    edgeMap.set(key, e);
  };

  for (const inst of top.instances) {
    const mod = byName.get(inst.module);
    for (const c of inst.connections) {
      const port = mod?.ports.find((p) => p.name === c.port);
      if (port?.direction === "output") continue;
      for (const id of identifiers(c.expr)) connect(id, inst.name);
    }
  }
  for (const p of top.ports) {
    if (p.direction === "output") connect(p.name, OUTPUTS);
  }

  const edges: Edge[] = Array.from(edgeMap.values()).map((e, i) => ({
    id: `e${i}`,
    source: e.source,
    target: e.target,
    label: e.nets.join(", "),
    attrs: { width: String(e.width) },
  }));
  return { nodes, edges };
}

/** Sizes, lays out and renders the top-level block diagram as SVG text. */
export async function renderBlockDiagram(design: SramDesign, cssPath?: string): Promise<string> {
  const laid = await layoutGraph(sizeGraph(designGraph(design)));
  return renderSvg(laid, cssPath, { title: design.baseName });
}
