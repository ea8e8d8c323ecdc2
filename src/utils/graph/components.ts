/**
 * Connected components
 * - weak: union-find over the undirected view
 * - strong: Tarjan's algorithm, iterative so deep chains cannot overflow the stack
 */

import type { DirectedGraph } from "./types.js";

type ComponentGraph = Pick<DirectedGraph, "paths" | "outgoing">;

/**
 * Byte-wise string order, independent of locale
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Union-Find (Disjoint Set Union)
 * Path compression plus union by rank
 */
export class UnionFind {
  private readonly parent: number[];
  private readonly rank: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
    this.rank = new Array<number>(size).fill(0);
  }

  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) {
      root = this.parent[root];
    }
    // Path compression
    let current = x;
    while (this.parent[current] !== root) {
      const next = this.parent[current];
      this.parent[current] = root;
      current = next;
    }
    return root;
  }

  union(x: number, y: number): void {
    const rootX = this.find(x);
    const rootY = this.find(y);
    if (rootX === rootY) return;

    if (this.rank[rootX] < this.rank[rootY]) {
      this.parent[rootX] = rootY;
    } else if (this.rank[rootX] > this.rank[rootY]) {
      this.parent[rootY] = rootX;
    } else {
      this.parent[rootY] = rootX;
      this.rank[rootX]++;
    }
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }

  /**
   * Index groups, each in ascending index order
   */
  getGroups(): number[][] {
    const groups = new Map<number, number[]>();
    for (let i = 0; i < this.parent.length; i++) {
      const root = this.find(i);
      const group = groups.get(root);
      if (group) {
        group.push(i);
      } else {
        groups.set(root, [i]);
      }
    }
    return [...groups.values()];
  }
}

/**
 * Members ascending; components by size descending, then first member
 */
export function sortComponents(components: string[][]): string[][] {
  const sorted = components.map((members) => [...members].sort(compareStrings));
  sorted.sort((a, b) => b.length - a.length || compareStrings(a[0] ?? "", b[0] ?? ""));
  return sorted;
}

function indexPaths(paths: readonly string[]): Map<string, number> {
  const index = new Map<string, number>();
  paths.forEach((path, i) => index.set(path, i));
  return index;
}

/**
 * Weakly connected components, isolated nodes included
 */
export function findWeakComponents(graph: ComponentGraph): string[][] {
  const index = indexPaths(graph.paths);
  const uf = new UnionFind(graph.paths.length);

  for (const [source, targets] of graph.outgoing) {
    const from = index.get(source);
    if (from === undefined) continue;
    for (const target of targets) {
      const to = index.get(target);
      if (to !== undefined) {
        uf.union(from, to);
      }
    }
  }

  return sortComponents(
    uf.getGroups().map((group) => group.map((i) => graph.paths[i]))
  );
}

interface TarjanFrame {
  node: number;
  /** Next successor to visit */
  cursor: number;
}

/**
 * Strongly connected components, singletons included
 */
export function findStrongComponents(graph: ComponentGraph): string[][] {
  const n = graph.paths.length;
  const index = indexPaths(graph.paths);
  const successors: number[][] = graph.paths.map((path) => {
    const targets = graph.outgoing.get(path);
    if (!targets) return [];
    const result: number[] = [];
    for (const target of [...targets].sort(compareStrings)) {
      const i = index.get(target);
      if (i !== undefined) result.push(i);
    }
    return result;
  });

  const order = new Array<number>(n).fill(-1);
  const lowLink = new Array<number>(n).fill(0);
  const onStack = new Array<boolean>(n).fill(false);
  const stack: number[] = [];
  const components: string[][] = [];
  let counter = 0;

  for (let start = 0; start < n; start++) {
    if (order[start] !== -1) continue;

    order[start] = lowLink[start] = counter++;
    stack.push(start);
    onStack[start] = true;
    const callStack: TarjanFrame[] = [{ node: start, cursor: 0 }];

    while (callStack.length > 0) {
      const frame = callStack[callStack.length - 1];
      const next = successors[frame.node];

      if (frame.cursor < next.length) {
        const succ = next[frame.cursor++];
        if (order[succ] === -1) {
          order[succ] = lowLink[succ] = counter++;
          stack.push(succ);
          onStack[succ] = true;
          callStack.push({ node: succ, cursor: 0 });
        } else if (onStack[succ]) {
          lowLink[frame.node] = Math.min(lowLink[frame.node], order[succ]);
        }
        continue;
      }

      callStack.pop();
      if (callStack.length > 0) {
        const parent = callStack[callStack.length - 1].node;
        lowLink[parent] = Math.min(lowLink[parent], lowLink[frame.node]);
      }

      if (lowLink[frame.node] === order[frame.node]) {
        const component: string[] = [];
        let member: number | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack[member] = false;
          component.push(graph.paths[member]);
        } while (member !== frame.node);
        components.push(component);
      }
    }
  }

  return sortComponents(components);
}

/**
 * Map each member to a component ID (`${prefix}1`, `${prefix}2`, ...)
 */
export function assignComponentIds(
  components: readonly (readonly string[])[],
  prefix: string
): Map<string, string> {
  const ids = new Map<string, string>();
  components.forEach((members, i) => {
    for (const member of members) {
      ids.set(member, `${prefix}${i + 1}`);
    }
  });
  return ids;
}
