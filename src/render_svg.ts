import fs from "fs";
import type { Graph } from "./util.js";

export type RenderRules = {
  title?: string;
  show_clusters?: boolean;
};

type Point = { x: number; y: number };

const CATEGORIES = ["mem", "compute", "ctrl", "io"];

export function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function cls(s: string): string {
  return s.replace(/[^a-zA-Z0-9_-]+/g, "-").replace(/^-+|-+$/g, "").toLowerCase();
}

function renderCategory(category: string | undefined): string {
  const c = (category ?? "").toLowerCase();
  return CATEGORIES.includes(c) ? c : "ctrl";
}

function orthPoints(pts: Point[]): Point[] {
  if (pts.length < 2) return pts;
  const out: Point[] = [pts[0]];
  for (let i = 1; i < pts.length; i += 1) {
    const prev = out[out.length - 1];
    const cur = pts[i];
    if (prev.x !== cur.x && prev.y !== cur.y) {
      out.push({ x: cur.x, y: prev.y });
    }
    out.push(cur);
  }
  return out;
}

function longestSegmentMid(pts: Point[]): Point {
  let bestI = 0;
  let bestLen = -1;
  for (let i = 0; i < pts.length - 1; i += 1) {
    const len = Math.abs(pts[i + 1].x - pts[i].x) + Math.abs(pts[i + 1].y - pts[i].y);
    if (len > bestLen) {
      bestLen = len;
      bestI = i;
    }
  }
  const a = pts[bestI];
  const b = pts[Math.min(bestI + 1, pts.length - 1)];
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

/** Serializes a laid-out graph. Nodes without coordinates are drawn at the origin. */
export function renderSvg(graph: Graph, cssPath?: string, rules?: RenderRules): string {
  const pad = 40;
  const maxX = Math.max(...graph.nodes.map((n) => (n.x ?? 0) + (n.width ?? 0)), 0) + pad;
  const maxY = Math.max(...graph.nodes.map((n) => (n.y ?? 0) + (n.height ?? 0)), 0) + pad;
  const css = cssPath ? fs.readFileSync(cssPath, "utf8") : "";

  const clusterMargin = 14;
  const clusterTitleH = 16;
  const byCategory = new Map<string, Graph["nodes"]>();
  for (const n of graph.nodes) {
    const cat = renderCategory(n.category);
    const arr = byCategory.get(cat) ?? [];
    arr.push(n);
    byCategory.set(cat, arr);
  }
  const clusters = Array.from(byCategory.entries()).map(([category, nodes]) => {
    const minX = Math.min(...nodes.map((n) => n.x ?? 0)) - clusterMargin;
    const minY = Math.min(...nodes.map((n) => n.y ?? 0)) - (clusterMargin + clusterTitleH);
    const maxXc = Math.max(...nodes.map((n) => (n.x ?? 0) + (n.width ?? 120))) + clusterMargin;
    const maxYc = Math.max(...nodes.map((n) => (n.y ?? 0) + (n.height ?? 60))) + clusterMargin;
    return { category, x: minX, y: minY, w: maxXc - minX, h: maxYc - minY };
  });
  const showClusters = rules?.show_clusters === true;
  const clusterRects = showClusters
    ? clusters.map((c) => `\n    <rect class="cluster ${cls(c.category)}" x="${c.x}" y="${c.y}" width="${c.w}" height="${c.h}" rx="10" ry="10"/>`).join("")
    : "";

  const rects = graph.nodes.map((n) => {
    const w = n.width ?? 120;
    const h = n.height ?? 60;
    return `\n    <g class="node ${renderCategory(n.category)}" data-id="${esc(n.id)}">\n      <rect x="${n.x ?? 0}" y="${n.y ?? 0}" width="${w}" height="${h}" rx="6" ry="6"/>\n    </g>`;
  }).join("");

  const nodeLabels = graph.nodes.map((n) => {
    const x = (n.x ?? 0) + (n.width ?? 120) / 2;
    const y = (n.y ?? 0) + (n.height ?? 60) / 2;
    return `\n    <text class="nodeLabel ${renderCategory(n.category)}" x="${x}" y="${y}" text-anchor="middle" dominant-baseline="middle">${esc(n.label ?? n.id)}</text>`;
  }).join("");

  const paths = graph.edges.map((e) => {
    const pts = orthPoints(e.points ?? []);
    if (pts.length < 2) return "";
    const d = pts.map((p, i) => `${i === 0 ? "M" : "L"}${p.x},${p.y}`).join(" ");
    const bus = e.attrs?.width && Number(e.attrs.width) > 1 ? " bus" : "";
    return `\n    <path class="edge${bus}" d="${d}" marker-end="url(#arrowhead)"/>`;
  }).join("");

  const edgeLabels = graph.edges.map((e) => {
    const text = e.label?.trim();
    const pts = orthPoints(e.points ?? []);
    if (!text || pts.length < 2) return "";
    const mid = longestSegmentMid(pts);
    return `\n    <text class="edgeLabel" x="${mid.x}" y="${mid.y - 6}" text-anchor="middle">${esc(text)}</text>`;
  }).join("");

  const title = rules?.title ? `\n<title>${esc(rules.title)}</title>` : "";

  return `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" width="${maxX}" height="${maxY}" viewBox="0 0 ${maxX} ${maxY}">${title}\n<style>\n${css}\n</style>\n<defs>\n  <marker id="arrowhead" markerWidth="8" markerHeight="6" refX="7" refY="3" orient="auto" markerUnits="strokeWidth">\n    <path d="M0,0 L8,3 L0,6 z" fill="#222"/>\n  </marker>\n</defs>\n<g class="clusters">${clusterRects}\n</g>\n<g class="wires">${paths}\n</g>\n<g class="nodes">${rects}\n</g>\n<g class="labels">${nodeLabels}${edgeLabels}\n</g>\n</svg>\n`;
}
