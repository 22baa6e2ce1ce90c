import fs from "fs";

export type Node = {
  id: string;
  label?: string;
  attrs?: Record<string, string>;
  width?: number;
  height?: number;
  x?: number;
  y?: number;
  category?: string;
};

export type Edge = {
  id?: string;
  source: string;
  target: string;
  label?: string;
  attrs?: Record<string, string>;
  points?: { x: number; y: number }[];
};

export type Graph = {
  nodes: Node[];
  edges: Edge[];
};

export function die(msg: string): never {
  throw new Error(msg);
}

export function readText(path: string): string {
  return fs.readFileSync(path, "utf8");
}

export function writeText(path: string, data: string): void {
  fs.writeFileSync(path, data, "utf8");
}

export function asNum(v: unknown): number | undefined {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim().length > 0) {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  return undefined;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function clamp(x: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, x));
}

export function pad(s: string, n: number): string {
  return s.length >= n ? s : s + " ".repeat(n - s.length);
}
