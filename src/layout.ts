import ELK from "elkjs/lib/elk.bundled.js";
import type { ElkExtendedEdge, ElkNode } from "elkjs/lib/elk-api.js";
import type { Graph, Node } from "./util.js";

export type LayoutRules = {
  direction?: "RIGHT" | "DOWN";
  node_node_between_layers?: number;
  node_node?: number;
  category_order?: string[];
  options?: Record<string, string | number | boolean>;
};

type ElkLayouter = { layout(graph: ElkNode): Promise<ElkNode> };

function buildLayoutOptions(rules: LayoutRules = {}): Record<string, string> {
  const opts: Record<string, string> = {
    "elk.algorithm": "org.eclipse.elk.layered",
    "elk.direction": rules.direction ?? "RIGHT",
    "elk.edgeRouting": "ORTHOGONAL",
    "elk.layered.spacing.nodeNodeBetweenLayers": String(rules.node_node_between_layers ?? 50),
    "elk.spacing.nodeNode": String(rules.node_node ?? 30),
    "org.eclipse.elk.layered.considerModelOrder.strategy": "NODES_AND_EDGES",
  };
  for (const [k, v] of Object.entries(rules.options ?? {})) {
    opts[k] = String(v);
  }
  return opts;
}

function orderNodesForHints(nodes: Node[], rules: LayoutRules = {}): Node[] {
  const categoryOrder = rules.category_order ?? ["io", "ctrl", "compute", "mem"];
  const rank = new Map<string, number>();
  categoryOrder.forEach((c, i) => rank.set(c, i));
  const defaultRank = categoryOrder.length + 1;
  return [...nodes].sort((a, b) => {
    const ra = rank.get(a.category ?? "") ?? defaultRank;
    const rb = rank.get(b.category ?? "") ?? defaultRank;
    if (ra !== rb) return ra - rb;
    return a.id.localeCompare(b.id);
  });
}

function edgePoints(e: ElkExtendedEdge | undefined): { x: number; y: number }[] {
  return (e?.sections ?? []).flatMap((s) => [s.startPoint, ...(s.bendPoints ?? []), s.endPoint]);
}

export async function layoutGraph(graph: Graph, rules?: LayoutRules): Promise<Graph> {
  // elk.bundled is CommonJS; its default export loses its construct signature under NodeNext interop.
  const elk: ElkLayouter = new (ELK as any)();
  const elkGraph: ElkNode = {
    id: "root",
    layoutOptions: buildLayoutOptions(rules),
    children: orderNodesForHints(graph.nodes, rules).map((n) => ({
      id: n.id,
      width: n.width ?? 120,
      height: n.height ?? 60,
    })),
    edges: graph.edges.map((e, i) => ({
      id: e.id ?? `e${i}`,
      sources: [e.source],
      targets: [e.target],
    })),
  };

  const laid = await elk.layout(elkGraph);
  const nodeMap = new Map((laid.children ?? []).map((c) => [c.id, c]));
  const edgeMap = new Map((laid.edges ?? []).map((e) => [e.id, e]));
  return {
    nodes: graph.nodes.map((n) => {
      const c = nodeMap.get(n.id);
      return { ...n, x: c?.x ?? 0, y: c?.y ?? 0, width: c?.width ?? n.width, height: c?.height ?? n.height };
    }),
    edges: graph.edges.map((e, i) => ({ ...e, points: edgePoints(edgeMap.get(e.id ?? `e${i}`)) })),
  };
}
