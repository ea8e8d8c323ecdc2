/**
 * Community detection and summaries
 *
 * Label propagation over the undirected view of the graph. Rounds are
 * synchronous: every node votes on the labels of the previous round, its own
 * label counting as one vote, and ties go to the smallest label.
 *
 * @packageDocumentation
 * @module graph/communities
 */

import { compareStrings } from "./components.js";
import { summarizeRecency } from "./recency.js";
import type { GraphAnalysisOptions, LabelPropagationOptions } from "./options.js";
import type {
  AuthorityBucket,
  AuthorityScore,
  AuthorityStats,
  CommunitySummary,
  DirectedGraph,
  GraphNode,
  TagCount,
} from "./types.js";

type CommunityGraph = Pick<DirectedGraph, "paths" | "outgoing" | "incoming">;

export interface LabelPropagationResult {
  /** path → raw label (a member path) */
  labels: Map<string, string>;
  rounds: number;
  converged: boolean;
}

/**
 * Community grouping before summaries: display ID plus sorted members
 */
export interface CommunityGroup {
  id: string;
  members: string[];
}

function undirectedNeighbors(graph: CommunityGraph, node: string): string[] {
  const neighbors = new Set<string>([
    ...(graph.outgoing.get(node) ?? []),
    ...(graph.incoming.get(node) ?? []),
  ]);
  neighbors.delete(node);
  return [...neighbors].sort(compareStrings);
}

function pickLabel(votes: Map<string, number>): string | undefined {
  let best: string | undefined;
  let bestCount = -1;
  for (const [label, count] of votes) {
    if (
      count > bestCount ||
      (count === bestCount && best !== undefined && compareStrings(label, best) < 0)
    ) {
      best = label;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Label propagation until a round changes nothing or the cap is hit
 *
 * @example
 * const { labels } = propagateLabels(graph, { maxRounds: 20 });
 * labels.get("b.md"); // "a.md"
 */
export function propagateLabels(
  graph: CommunityGraph,
  options: LabelPropagationOptions
): LabelPropagationResult {
  const neighbors = new Map<string, string[]>();
  let labels = new Map<string, string>();
  for (const path of graph.paths) {
    neighbors.set(path, undirectedNeighbors(graph, path));
    labels.set(path, path);
  }

  if (graph.paths.length === 0) {
    return { labels, rounds: 0, converged: true };
  }

  let rounds = 0;
  let converged = false;
  while (rounds < options.maxRounds) {
    rounds++;
    const next = new Map<string, string>();
    let changed = false;

    for (const path of graph.paths) {
      const current = labels.get(path) ?? path;
      const votes = new Map<string, number>([[current, 1]]);
      for (const neighbor of neighbors.get(path) ?? []) {
        const label = labels.get(neighbor) ?? neighbor;
        votes.set(label, (votes.get(label) ?? 0) + 1);
      }
      const chosen = pickLabel(votes) ?? current;
      if (chosen !== current) {
        changed = true;
      }
      next.set(path, chosen);
    }

    labels = next;
    if (!changed) {
      converged = true;
      break;
    }
  }

  return { labels, rounds, converged };
}

/**
 * Group labelled nodes and give each group a short ID:
 * c1, c2, ... by size descending, then smallest member path
 */
export function groupCommunities(labels: ReadonlyMap<string, string>): CommunityGroup[] {
  const grouped = new Map<string, string[]>();
  for (const [path, label] of labels) {
    const members = grouped.get(label);
    if (members) {
      members.push(path);
    } else {
      grouped.set(label, [path]);
    }
  }

  const groups = [...grouped.values()].map((members) => members.sort(compareStrings));
  groups.sort((a, b) => b.length - a.length || compareStrings(a[0] ?? "", b[0] ?? ""));
  return groups.map((members, i) => ({ id: `c${i + 1}`, members }));
}

// ============================================================================
// Per-community metadata
// ============================================================================

function byAuthority(a: GraphNode, b: GraphNode): number {
  return b.authority - a.authority || compareStrings(a.path, b.path);
}

export function countInternalEdges(graph: CommunityGraph, members: readonly string[]): number {
  const memberSet = new Set(members);
  let edges = 0;
  for (const member of members) {
    for (const target of graph.outgoing.get(member) ?? []) {
      if (memberSet.has(target)) {
        edges++;
      }
    }
  }
  return edges;
}

/**
 * internalEdges / (n * (n - 1)); 0 for fewer than two members
 */
export function communityDensity(internalEdges: number, size: number): number {
  if (size <= 1) {
    return 0;
  }
  return internalEdges / (size * (size - 1));
}

export function topTagsForMembers(members: readonly GraphNode[], limit: number): TagCount[] {
  const counts = new Map<string, number>();
  for (const member of members) {
    for (const tag of member.tags) {
      const key = tag.toLowerCase();
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  return [...counts]
    .map(([tag, count]) => ({ tag, count }))
    .sort((a, b) => b.count - a.count || compareStrings(a.tag, b.tag))
    .slice(0, limit);
}

function percentile(ascending: readonly number[], q: number): number {
  const index = Math.min(ascending.length - 1, Math.max(0, Math.ceil(q * ascending.length) - 1));
  return ascending[index] ?? 0;
}

export function computeAuthorityStats(values: readonly number[]): AuthorityStats {
  if (values.length === 0) {
    return { count: 0, mean: 0, p50: 0, p75: 0, p90: 0, p95: 0, p99: 0, max: 0 };
  }
  const ascending = [...values].sort((a, b) => a - b);
  const sum = ascending.reduce((acc, value) => acc + value, 0);
  return {
    count: ascending.length,
    mean: sum / ascending.length,
    p50: percentile(ascending, 0.5),
    p75: percentile(ascending, 0.75),
    p90: percentile(ascending, 0.9),
    p95: percentile(ascending, 0.95),
    p99: percentile(ascending, 0.99),
    max: ascending[ascending.length - 1] ?? 0,
  };
}

/**
 * Bucket count clamp(ceil(sqrt(n)), 5, 10)
 */
export function bucketCountFor(size: number): number {
  if (size <= 0) {
    return 0;
  }
  return Math.min(10, Math.max(5, Math.ceil(Math.sqrt(size))));
}

/**
 * Equal-width histogram of authority values over [min, max].
 * When every value is equal there is a single bucket.
 */
export function computeAuthorityBuckets(values: readonly number[]): AuthorityBucket[] {
  if (values.length === 0) {
    return [];
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (max === min) {
    return [{ from: min, to: max, count: values.length }];
  }

  const bucketCount = bucketCountFor(values.length);
  const width = (max - min) / bucketCount;
  const buckets: AuthorityBucket[] = [];
  for (let i = 0; i < bucketCount; i++) {
    buckets.push({
      from: min + i * width,
      to: i === bucketCount - 1 ? max : min + (i + 1) * width,
      count: 0,
    });
  }
  for (const value of values) {
    const index = Math.min(bucketCount - 1, Math.floor((value - min) / width));
    buckets[index].count++;
  }
  return buckets;
}

/**
 * Count edges that cross community boundaries, per endpoint
 */
function countCrossEdges(
  graph: CommunityGraph,
  communityOf: ReadonlyMap<string, string>
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const [source, targets] of graph.outgoing) {
    const sourceCommunity = communityOf.get(source);
    if (sourceCommunity === undefined) continue;
    for (const target of targets) {
      const targetCommunity = communityOf.get(target);
      if (targetCommunity === undefined || targetCommunity === sourceCommunity) continue;
      counts.set(source, (counts.get(source) ?? 0) + 1);
      counts.set(target, (counts.get(target) ?? 0) + 1);
    }
  }
  return counts;
}

export type SummaryOptions = Pick<
  GraphAnalysisOptions,
  "includeTags" | "includeSingletonCommunities" | "topTagsLimit" | "topAuthorityLimit" | "bridgeLimit"
> & { recencyWindowDays: number };

function compareForListing(a: CommunitySummary, b: CommunitySummary): number {
  if (a.recency && b.recency && a.recency.latestAgeDays !== b.recency.latestAgeDays) {
    return a.recency.latestAgeDays - b.recency.latestAgeDays;
  }
  if (a.recency && !b.recency) return -1;
  if (!a.recency && b.recency) return 1;
  return b.members.length - a.members.length || compareStrings(a.id, b.id);
}

/**
 * Build the summary of every community, in listing order:
 * most recently active first, then larger, then by ID
 */
export function summarizeCommunities(
  graph: CommunityGraph,
  nodes: ReadonlyMap<string, GraphNode>,
  groups: readonly CommunityGroup[],
  effectiveTimes: ReadonlyMap<string, Date | null>,
  now: Date,
  options: SummaryOptions
): CommunitySummary[] {
  const communityOf = new Map<string, string>();
  for (const group of groups) {
    for (const member of group.members) {
      communityOf.set(member, group.id);
    }
  }
  const crossEdges = countCrossEdges(graph, communityOf);

  const summaries: CommunitySummary[] = [];
  for (const group of groups) {
    if (!options.includeSingletonCommunities && group.members.length === 1) {
      continue;
    }

    const members: GraphNode[] = [];
    for (const path of group.members) {
      const node = nodes.get(path);
      if (node) members.push(node);
    }
    const ranked = [...members].sort(byAuthority);
    const authorities = members.map((member) => member.authority);
    const internalEdges = countInternalEdges(graph, group.members);

    const topAuthority: AuthorityScore[] = ranked
      .slice(0, options.topAuthorityLimit)
      .map((node) => ({ path: node.path, authority: node.authority, hub: node.hub }));

    const bridges = ranked
      .filter((node) => (crossEdges.get(node.path) ?? 0) > 0)
      .sort(
        (a, b) =>
          (crossEdges.get(b.path) ?? 0) - (crossEdges.get(a.path) ?? 0) || byAuthority(a, b)
      )
      .slice(0, options.bridgeLimit)
      .map((node) => node.path);

    summaries.push({
      id: group.id,
      members: [...group.members],
      anchor: ranked[0]?.path ?? group.members[0] ?? "",
      density: communityDensity(internalEdges, group.members.length),
      internalEdges,
      topTags: options.includeTags ? topTagsForMembers(members, options.topTagsLimit) : [],
      topAuthority,
      authorityStats: computeAuthorityStats(authorities),
      authorityBuckets: computeAuthorityBuckets(authorities),
      recency: summarizeRecency(group.members, effectiveTimes, now, options.recencyWindowDays),
      bridges,
    });
  }

  return summaries.sort(compareForListing);
}

/**
 * Quick path → community lookup for reports
 */
export function communityMembershipLookup(
  communities: readonly CommunitySummary[]
): Map<string, CommunitySummary> {
  const lookup = new Map<string, CommunitySummary>();
  for (const community of communities) {
    for (const member of community.members) {
      lookup.set(member, community);
    }
  }
  return lookup;
}
