import type { EdgeProperties, PathConstraints } from "../types.js";

export interface Link {
  to: string;
  cost: number;
  properties: EdgeProperties;
  /** Zero-cost link between members of the same building complex. */
  internal: boolean;
}

export type Adjacency = ReadonlyMap<string, readonly Link[]>;

interface Label {
  node: string;
  cost: number;
  path: string[];
}

// ---------------------------------------------------------------------------
// Constraint matching
// ---------------------------------------------------------------------------

export function linkSatisfies(link: Link, constraints: PathConstraints): boolean {
  if (link.internal) return true;
  for (const [key, required] of Object.entries(constraints)) {
    const actual = link.properties[key];
    if (actual === undefined) return false;
    if (Array.isArray(actual)) {
      if (typeof required !== "string" || !actual.includes(required)) return false;
      continue;
    }
    if (key === "rain_exposure" && required === "Covered") {
      if (typeof actual !== "string" || actual.includes("Exposed")) return false;
      continue;
    }
    if (actual !== required) return false;
  }
  return true;
}

// ---------------------------------------------------------------------------
// Label ordering: total cost, then the id sequence lexicographically
// ---------------------------------------------------------------------------

export function comparePaths(a: readonly string[], b: readonly string[]): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? "";
    const y = b[i] ?? "";
    if (x !== y) return x < y ? -1 : 1;
  }
  return a.length - b.length;
}

function compareLabels(a: Label, b: Label): number {
  if (a.cost !== b.cost) return a.cost - b.cost;
  return comparePaths(a.path, b.path);
}

class LabelHeap {
  private readonly items: Label[] = [];

  get size(): number {
    return this.items.length;
  }

  push(label: Label): void {
    const items = this.items;
    items.push(label);
    let i = items.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      const p = items[parent];
      const c = items[i];
      if (!p || !c || compareLabels(c, p) >= 0) break;
      items[parent] = c;
      items[i] = p;
      i = parent;
    }
  }

  pop(): Label | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (items.length === 0 || !last) return top;
    items[0] = last;
    let i = 0;
    for (;;) {
      let smallest = i;
      for (const child of [2 * i + 1, 2 * i + 2]) {
        const c = items[child];
        const s = items[smallest];
        if (c && s && compareLabels(c, s) < 0) smallest = child;
      }
      if (smallest === i) break;
      const a = items[i];
      const b = items[smallest];
      if (!a || !b) break;
      items[i] = b;
      items[smallest] = a;
      i = smallest;
    }
    return top;
  }
}

/**
 * Constrained shortest path. Links failing a constraint are dropped before
 * they are relaxed, so every returned hop satisfies every constraint. Among
 * equal-cost simple paths the lexicographically smallest id sequence wins.
 */
export function shortestPath(
  adjacency: Adjacency,
  source: string,
  target: string,
  constraints: PathConstraints = {},
): { path: string[]; cost: number } | null {
  if (!adjacency.has(source) || !adjacency.has(target)) return null;

  const best = new Map<string, Label>();
  const settled = new Set<string>();
  const heap = new LabelHeap();
  const start: Label = { node: source, cost: 0, path: [source] };
  best.set(source, start);
  heap.push(start);

  while (heap.size > 0) {
    const label = heap.pop();
    if (!label || settled.has(label.node)) continue;
    settled.add(label.node);
    if (label.node === target) return { path: label.path, cost: label.cost };

    for (const link of adjacency.get(label.node) ?? []) {
      if (settled.has(link.to) || !linkSatisfies(link, constraints)) continue;
      const candidate: Label = {
        node: link.to,
        cost: label.cost + link.cost,
        path: [...label.path, link.to],
      };
      const existing = best.get(link.to);
      if (!existing || compareLabels(candidate, existing) < 0) {
        best.set(link.to, candidate);
        heap.push(candidate);
      }
    }
  }
  return null;
}
