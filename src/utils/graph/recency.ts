/**
 * Recency inference
 *
 * Undated or stale notes borrow freshness from linked notes: a neighbor's
 * timestamp minus a staleness offset can raise a node's effective time.
 * With the cascade on, the inferred times feed the next pass, so freshness
 * travels up to `hops` links.
 */

import { compareStrings } from "./components.js";
import type { RecencyOptions } from "./options.js";
import type { CommunityRecency, DirectedGraph } from "./types.js";

export const DAY_MS = 24 * 60 * 60 * 1000;

type RecencyGraph = Pick<DirectedGraph, "paths" | "outgoing" | "incoming">;

interface NeighborTime {
  path: string;
  time: number;
}

function clampToNow(time: number, now: number): number {
  return time > now ? now : time;
}

function collectNeighborTimes(
  graph: RecencyGraph,
  node: string,
  times: ReadonlyMap<string, number>,
  now: number
): NeighborTime[] {
  const seen = new Set<string>();
  const neighbors: NeighborTime[] = [];
  const candidates = [...(graph.outgoing.get(node) ?? []), ...(graph.incoming.get(node) ?? [])];
  for (const path of candidates) {
    const time = times.get(path);
    if (time === undefined || seen.has(path)) continue;
    seen.add(path);
    neighbors.push({ path, time: clampToNow(time, now) });
  }
  return neighbors.sort((a, b) => b.time - a.time || compareStrings(a.path, b.path));
}

function recencyPass(
  graph: RecencyGraph,
  base: ReadonlyMap<string, number>,
  neighborTimes: ReadonlyMap<string, number>,
  now: number,
  options: RecencyOptions
): Map<string, number> {
  const freshWindow = options.freshWindowDays * DAY_MS;
  const staleness = options.stalenessDays * DAY_MS;
  const next = new Map<string, number>();

  for (const node of graph.paths) {
    let best = Math.max(base.get(node) ?? -Infinity, neighborTimes.get(node) ?? -Infinity);

    const sample = collectNeighborTimes(graph, node, neighborTimes, now).slice(
      0,
      options.neighborSampleLimit
    );
    for (const neighbor of sample) {
      if (now - neighbor.time > freshWindow) continue;
      best = Math.max(best, neighbor.time - staleness);
    }

    if (Number.isFinite(best)) {
      next.set(node, best);
    }
  }
  return next;
}

/**
 * Effective modification times after neighbor inference.
 * Timestamps later than `now` are clamped to `now` first.
 *
 * @param cascade - false keeps every node at its own timestamp
 */
export function computeEffectiveTimes(
  graph: RecencyGraph,
  modified: ReadonlyMap<string, Date | null>,
  now: Date,
  options: RecencyOptions,
  cascade: boolean
): Map<string, Date | null> {
  const nowMs = now.getTime();
  const base = new Map<string, number>();
  for (const path of graph.paths) {
    const date = modified.get(path);
    if (date) {
      base.set(path, clampToNow(date.getTime(), nowMs));
    }
  }

  let current: Map<string, number> = base;
  if (cascade) {
    for (let pass = 0; pass < options.hops; pass++) {
      current = recencyPass(graph, base, current, nowMs, options);
    }
  }

  const effective = new Map<string, Date | null>();
  for (const path of graph.paths) {
    const time = current.get(path);
    effective.set(path, time === undefined ? null : new Date(time));
  }
  return effective;
}

/**
 * Latest member and recent-activity count of one community
 *
 * @returns null when no member carries a timestamp
 */
export function summarizeRecency(
  members: readonly string[],
  times: ReadonlyMap<string, Date | null>,
  now: Date,
  windowDays: number
): CommunityRecency | null {
  const nowMs = now.getTime();
  const window = windowDays * DAY_MS;
  let latestPath: string | null = null;
  let latestTime = -Infinity;
  let recentCount = 0;

  for (const member of [...members].sort(compareStrings)) {
    const date = times.get(member);
    if (!date) continue;
    const time = date.getTime();
    if (time > latestTime) {
      latestTime = time;
      latestPath = member;
    }
    if (nowMs - time <= window) {
      recentCount++;
    }
  }

  if (latestPath === null) {
    return null;
  }
  return {
    latestPath,
    latestAgeDays: Math.max(0, (nowMs - latestTime) / DAY_MS),
    recentCount,
    windowDays,
  };
}
