/**
 * HITS (hubs and authorities)
 *
 * A note is a good authority when good hubs link to it, and a good hub when
 * it links to good authorities. Both vectors are L2-normalised after every
 * half step, so scores are comparable within one run only.
 *
 * @packageDocumentation
 * @module graph/hits
 */

import type { DirectedGraph } from "./types.js";
import type { HitsOptions } from "./options.js";

export interface HitsScores {
  hubs: Map<string, number>;
  authorities: Map<string, number>;
}

export interface HitsResult extends HitsScores {
  /** Iterations actually run */
  iterations: number;
  converged: boolean;
}

type HitsGraph = Pick<DirectedGraph, "paths" | "outgoing" | "incoming">;

function normalize(scores: Map<string, number>): void {
  let sumSquares = 0;
  for (const value of scores.values()) {
    sumSquares += value * value;
  }
  const norm = Math.sqrt(sumSquares);
  // An all-zero vector stays zero
  if (norm === 0) {
    return;
  }
  for (const [key, value] of scores) {
    scores.set(key, value / norm);
  }
}

function sortedNeighbors(neighbors: Set<string> | undefined): string[] {
  return neighbors ? [...neighbors].sort() : [];
}

/**
 * One HITS step: authorities from the current hubs, then hubs from the new
 * authorities.
 */
export function runHitsIteration(graph: HitsGraph, hubs: ReadonlyMap<string, number>): HitsScores {
  const authorities = new Map<string, number>();
  for (const path of graph.paths) {
    let sum = 0;
    for (const source of sortedNeighbors(graph.incoming.get(path))) {
      sum += hubs.get(source) ?? 0;
    }
    authorities.set(path, sum);
  }
  normalize(authorities);

  const nextHubs = new Map<string, number>();
  for (const path of graph.paths) {
    let sum = 0;
    for (const target of sortedNeighbors(graph.outgoing.get(path))) {
      sum += authorities.get(target) ?? 0;
    }
    nextHubs.set(path, sum);
  }
  normalize(nextHubs);

  return { hubs: nextHubs, authorities };
}

function maxDelta(previous: ReadonlyMap<string, number>, next: ReadonlyMap<string, number>): number {
  let delta = 0;
  for (const [key, value] of next) {
    delta = Math.max(delta, Math.abs(value - (previous.get(key) ?? 0)));
  }
  return delta;
}

/**
 * Power iteration until no score moves more than the tolerance
 *
 * @example
 * const { authorities } = computeHits(graph, { maxIterations: 100, tolerance: 1e-8 });
 */
export function computeHits(graph: HitsGraph, options: HitsOptions): HitsResult {
  if (graph.paths.length === 0) {
    return { hubs: new Map(), authorities: new Map(), iterations: 0, converged: true };
  }

  let hubs = new Map<string, number>();
  let authorities = new Map<string, number>();
  for (const path of graph.paths) {
    hubs.set(path, 1);
    authorities.set(path, 1);
  }

  let iterations = 0;
  let converged = false;
  while (iterations < options.maxIterations) {
    iterations++;
    const next = runHitsIteration(graph, hubs);
    const delta = Math.max(maxDelta(hubs, next.hubs), maxDelta(authorities, next.authorities));
    hubs = next.hubs;
    authorities = next.authorities;
    if (delta < options.tolerance) {
      converged = true;
      break;
    }
  }

  return { hubs, authorities, iterations, converged };
}
