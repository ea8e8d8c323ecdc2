/**
 * Orphans, counts and phase timings
 */

import { performance } from "node:perf_hooks";
import { countEdges } from "./builder.js";
import { compareStrings } from "./components.js";
import type { DirectedGraph, GraphStatsSummary, GraphTimings } from "./types.js";

/**
 * Nodes with no inbound and no outbound edge, sorted
 */
export function findOrphans(graph: Pick<DirectedGraph, "paths" | "outgoing" | "incoming">): string[] {
  return graph.paths
    .filter(
      (path) =>
        (graph.outgoing.get(path)?.size ?? 0) === 0 && (graph.incoming.get(path)?.size ?? 0) === 0
    )
    .sort(compareStrings);
}

export function computeGraphStats(graph: DirectedGraph): GraphStatsSummary {
  return {
    nodeCount: graph.paths.length,
    edgeCount: countEdges(graph),
  };
}

export type TimedPhase = Exclude<keyof GraphTimings, "total">;

/**
 * Wall-clock stopwatch for analysis phases.
 * Timings are advisory only; nothing reads them back into the analysis.
 */
export class PhaseTimer {
  private readonly startedAt = performance.now();
  private readonly durations: Omit<GraphTimings, "total"> = {
    load: 0,
    build: 0,
    hits: 0,
    label: 0,
    recency: 0,
  };

  /**
   * Run `fn` and add its duration to `phase`
   */
  measure<T>(phase: TimedPhase, fn: () => T): T {
    const start = performance.now();
    try {
      return fn();
    } finally {
      this.durations[phase] += performance.now() - start;
    }
  }

  /**
   * Record a duration measured elsewhere (e.g. loading by the caller)
   */
  record(phase: TimedPhase, ms: number): void {
    this.durations[phase] += Math.max(0, ms);
  }

  finish(): GraphTimings {
    return {
      ...this.durations,
      total: performance.now() - this.startedAt + this.durations.load,
    };
  }
}

/**
 * Whole milliseconds for display; any non-zero duration shows as at least 1
 */
export function toDisplayMillis(ms: number): number {
  if (ms <= 0) {
    return 0;
  }
  return Math.max(1, Math.round(ms));
}

export function formatTimings(timings: GraphTimings): Record<keyof GraphTimings, number> {
  return {
    load: toDisplayMillis(timings.load),
    build: toDisplayMillis(timings.build),
    hits: toDisplayMillis(timings.hits),
    label: toDisplayMillis(timings.label),
    recency: toDisplayMillis(timings.recency),
    total: toDisplayMillis(timings.total),
  };
}
