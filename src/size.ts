import type { Graph, Node } from "./util.js";
import { asNum, clamp } from "./util.js";

type CategorySizing = {
  metric?: number;
  aspect?: number;
};

export type SizeRules = {
  base_area?: number;
  k?: number;
  min_w?: number;
  max_w?: number;
  min_h?: number;
  max_h?: number;
  grid?: number;
  default_metric?: number;
  metric_attrs?: string[];
  categories?: Record<string, CategorySizing>;
};

type ResolvedSizeRules = Required<Omit<SizeRules, "categories">> & {
  categories: Record<string, Required<CategorySizing>>;
};

const defaultSizeRules: ResolvedSizeRules = {
  base_area: 6400,
  k: 1400,
  min_w: 90,
  max_w: 300,
  min_h: 40,
  max_h: 160,
  grid: 10,
  default_metric: 1,
  metric_attrs: ["metric", "ports"],
  categories: {
    mem: { metric: 8, aspect: 1.6 },
    compute: { metric: 5, aspect: 1.3 },
    ctrl: { metric: 3, aspect: 1.8 },
    io: { metric: 4, aspect: 0.6 },
  },
};

function snap(x: number, grid: number): number {
  if (grid <= 1) return x;
  return Math.round(x / grid) * grid;
}

function nodeMetric(n: Node, cfg: ResolvedSizeRules, cat: string): number {
  for (const key of cfg.metric_attrs) {
    const parsed = asNum(n.attrs?.[key]);
    if (parsed !== undefined && parsed >= 0) return parsed;
  }
  return cfg.categories[cat]?.metric ?? cfg.default_metric;
}

function mergeRules(raw: SizeRules = {}): ResolvedSizeRules {
  const categories: Record<string, Required<CategorySizing>> = { ...defaultSizeRules.categories };
  for (const [k, v] of Object.entries(raw.categories ?? {})) {
    categories[k] = {
      metric: asNum(v.metric) ?? categories[k]?.metric ?? defaultSizeRules.default_metric,
      aspect: asNum(v.aspect) ?? categories[k]?.aspect ?? 1.4,
    };
  }
  return {
    base_area: asNum(raw.base_area) ?? defaultSizeRules.base_area,
    k: asNum(raw.k) ?? defaultSizeRules.k,
    min_w: asNum(raw.min_w) ?? defaultSizeRules.min_w,
    max_w: asNum(raw.max_w) ?? defaultSizeRules.max_w,
    min_h: asNum(raw.min_h) ?? defaultSizeRules.min_h,
    max_h: asNum(raw.max_h) ?? defaultSizeRules.max_h,
    grid: asNum(raw.grid) ?? defaultSizeRules.grid,
    default_metric: asNum(raw.default_metric) ?? defaultSizeRules.default_metric,
    metric_attrs: raw.metric_attrs ?? defaultSizeRules.metric_attrs,
    categories,
  };
}

/** Box size grows with √metric (port count by default), snapped to the grid. */
export function sizeGraph(graph: Graph, rules?: SizeRules): Graph {
  const cfg = mergeRules(rules);
  return {
    ...graph,
    nodes: graph.nodes.map((n) => {
      if (n.width !== undefined && n.height !== undefined) return n;
      const cat = n.category ?? "ctrl";
      const metric = Math.max(0, nodeMetric(n, cfg, cat));
      const area = cfg.base_area + cfg.k * Math.sqrt(metric);
      const aspect = cfg.categories[cat]?.aspect ?? 1.4;
      const w = snap(clamp(Math.sqrt(area * aspect), cfg.min_w, cfg.max_w), cfg.grid);
      const h = snap(clamp(Math.sqrt(area / aspect), cfg.min_h, cfg.max_h), cfg.grid);
      return { ...n, width: w, height: h };
    }),
  };
}
