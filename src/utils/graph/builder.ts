/**
 * Graph builder
 *
 * Turns note entries into a directed graph. Order of operations:
 * 1. include/exclude patterns drop whole notes
 * 2. link-type filters (anchors, embeds), self-links and dangling links drop edges
 * 3. mutual-only keeps A→B only when B→A exists
 * 4. min-degree pruning removes low-degree nodes in a single pass
 */

import { getLogger } from "../logger.js";
import { isPathSelected } from "./patterns.js";
import { normalizeNotePath } from "./wikilinks.js";
import type { GraphAnalysisOptions } from "./options.js";
import type {
  DirectedGraph,
  ExcludedNotes,
  MutableGraphNode,
  NoteEntry,
  NoteLink,
} from "./types.js";

export interface BuildResult {
  graph: DirectedGraph;
  excluded: ExcludedNotes;
}

export type BuildOptions = Pick<
  GraphAnalysisOptions,
  "skipAnchors" | "skipEmbeds" | "includePatterns" | "excludePatterns" | "mutualOnly" | "minDegree"
>;

/**
 * Whether the link-type filters keep a link
 */
export function keepsLink(
  link: NoteLink,
  options: Pick<BuildOptions, "skipAnchors" | "skipEmbeds">
): boolean {
  if (options.skipEmbeds && link.kind === "embed") return false;
  if (options.skipAnchors && link.anchor !== undefined) return false;
  return true;
}

function countInbound(lists: Map<string, string[]>): Map<string, number> {
  const inbound = new Map<string, number>();
  for (const path of lists.keys()) {
    inbound.set(path, 0);
  }
  for (const targets of lists.values()) {
    for (const target of targets) {
      inbound.set(target, (inbound.get(target) ?? 0) + 1);
    }
  }
  return inbound;
}

/**
 * Build the directed graph for one analysis run
 *
 * @example
 * const { graph } = buildGraph(entries, resolveAnalysisOptions({ minDegree: 0 }));
 * graph.outgoing.get("a.md"); // Set { "b.md" }
 */
export function buildGraph(entries: readonly NoteEntry[], options: BuildOptions): BuildResult {
  const logger = getLogger();

  // 1. Pattern filtering
  const selected = new Map<string, NoteEntry>();
  const byPattern: string[] = [];
  for (const entry of entries) {
    const path = normalizeNotePath(entry.path);
    if (selected.has(path) || byPattern.includes(path)) {
      logger.debug(`[builder] Duplicate note path ignored: ${path}`);
      continue;
    }
    if (!isPathSelected(path, options.includePatterns, options.excludePatterns)) {
      byPattern.push(path);
      continue;
    }
    selected.set(path, entry);
  }

  // 2. Adjacency, neighbor order preserved for display
  let lists = new Map<string, string[]>();
  for (const [path, entry] of selected) {
    const seen = new Set<string>();
    const targets: string[] = [];
    for (const link of entry.links) {
      if (!keepsLink(link, options)) continue;
      const target = normalizeNotePath(link.target);
      if (target === path || !selected.has(target) || seen.has(target)) continue;
      seen.add(target);
      targets.push(target);
    }
    lists.set(path, targets);
  }

  // 3. Mutual-only
  if (options.mutualOnly) {
    const initial = new Map<string, Set<string>>();
    for (const [path, targets] of lists) {
      initial.set(path, new Set(targets));
    }
    const mutual = new Map<string, string[]>();
    for (const [path, targets] of lists) {
      mutual.set(
        path,
        targets.filter((target) => initial.get(target)?.has(path) ?? false)
      );
    }
    lists = mutual;
  }

  // 4. Min-degree pruning, one pass only
  const byMinDegree: string[] = [];
  if (options.minDegree > 0) {
    const inbound = countInbound(lists);
    for (const [path, targets] of lists) {
      if ((inbound.get(path) ?? 0) + targets.length < options.minDegree) {
        byMinDegree.push(path);
      }
    }
    const pruned = new Set(byMinDegree);
    const survivors = new Map<string, string[]>();
    for (const [path, targets] of lists) {
      if (!pruned.has(path)) {
        survivors.set(
          path,
          targets.filter((target) => !pruned.has(target))
        );
      }
    }
    lists = survivors;
  }

  const paths = [...lists.keys()].sort();
  const outgoing = new Map<string, Set<string>>();
  const incoming = new Map<string, Set<string>>();
  for (const path of paths) {
    outgoing.set(path, new Set());
    incoming.set(path, new Set());
  }
  for (const [path, targets] of lists) {
    for (const target of targets) {
      outgoing.get(path)?.add(target);
      incoming.get(target)?.add(path);
    }
  }

  const nodes = new Map<string, MutableGraphNode>();
  for (const path of paths) {
    const entry = selected.get(path);
    const neighbors = lists.get(path) ?? [];
    const modified = entry?.modified ?? null;
    nodes.set(path, {
      path,
      title: entry?.title ?? path,
      tags: entry ? [...entry.tags] : [],
      neighbors,
      inbound: incoming.get(path)?.size ?? 0,
      outbound: neighbors.length,
      hub: 0,
      authority: 0,
      community: null,
      strongComponent: "",
      weakComponent: "",
      modified,
      effectiveModified: modified,
    });
  }

  logger.debug(`[builder] Built graph`, {
    nodes: paths.length,
    excludedByPattern: byPattern.length,
    prunedByMinDegree: byMinDegree.length,
  });

  return {
    graph: { paths, nodes, outgoing, incoming },
    excluded: {
      byPattern: byPattern.sort(),
      byMinDegree: byMinDegree.sort(),
    },
  };
}

/**
 * Total number of directed edges
 */
export function countEdges(graph: DirectedGraph): number {
  let edges = 0;
  for (const targets of graph.outgoing.values()) {
    edges += targets.size;
  }
  return edges;
}
