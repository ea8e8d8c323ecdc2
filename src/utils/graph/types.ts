/**
 * Vault graph type definitions
 * Interfaces shared by the note loader, the analysis engine and the reports
 */

/**
 * Wikilink variant
 * - basic: [[Note]]
 * - alias: [[Note|Shown text]]
 * - heading: [[Note#Section]]
 * - block: [[Note#^block-id]]
 * - embed: ![[Note]]
 */
export type LinkKind = "basic" | "alias" | "heading" | "block" | "embed";

/**
 * Parsed wikilink with position information
 */
export interface ParsedWikilink {
  /** Raw match (e.g. ![[Note#Section|Alias]]) */
  raw: string;
  /** Link target as written, without anchor or alias */
  target: string;
  /** Section or block anchor (text after #) */
  section?: string;
  /** Display alias (text after |) */
  alias?: string;
  /** True for ![[...]] transclusions */
  embed: boolean;
  kind: LinkKind;
  position: {
    start: number;
    end: number;
    /** 0-indexed line number */
    line: number;
  };
}

/**
 * Outbound link of a note, already resolved to a vault-relative path
 */
export interface NoteLink {
  /** Normalized vault-relative target path (always ends in .md) */
  target: string;
  kind: LinkKind;
  /** Anchor text when the link pointed into a section or block */
  anchor?: string;
}

/**
 * Note entry handed to the analysis engine.
 * An immutable snapshot of one note for a single analysis run.
 */
export interface NoteEntry {
  /** Vault-relative path, unique key (".md" is appended when missing) */
  path: string;
  title: string;
  tags: readonly string[];
  /** Outbound links in document order */
  links: readonly NoteLink[];
  /** Last-modified (or content) timestamp; undated notes leave it out */
  modified?: Date;
  /** Parsed frontmatter, kept for context reports */
  frontmatter?: Readonly<Record<string, unknown>>;
}

/**
 * Analyzed graph node
 */
export interface GraphNode {
  readonly path: string;
  readonly title: string;
  readonly tags: readonly string[];
  /** Deduplicated outbound neighbors in first-seen order */
  readonly neighbors: readonly string[];
  readonly inbound: number;
  readonly outbound: number;
  readonly hub: number;
  readonly authority: number;
  /** Community ID, null only when the node was not labelled */
  readonly community: string | null;
  /** Strong component ID (scc1, scc2, ...) */
  readonly strongComponent: string;
  /** Weak component ID (weak1, weak2, ...) */
  readonly weakComponent: string;
  readonly modified: Date | null;
  /** Timestamp after recency propagation */
  readonly effectiveModified: Date | null;
}

/**
 * Writable view used while the phases fill the node in
 */
export type MutableGraphNode = { -readonly [K in keyof GraphNode]: GraphNode[K] };

/**
 * Directed graph produced by the builder.
 * `outgoing` and `incoming` always mirror each other.
 */
export interface DirectedGraph {
  /** Node paths in ascending order */
  readonly paths: readonly string[];
  readonly nodes: Map<string, MutableGraphNode>;
  readonly outgoing: Map<string, Set<string>>;
  readonly incoming: Map<string, Set<string>>;
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface AuthorityScore {
  path: string;
  authority: number;
  hub: number;
}

/**
 * Authority distribution inside a community
 */
export interface AuthorityStats {
  count: number;
  mean: number;
  p50: number;
  p75: number;
  p90: number;
  p95: number;
  p99: number;
  max: number;
}

export interface AuthorityBucket {
  from: number;
  to: number;
  count: number;
}

/**
 * Recency of a community
 */
export interface CommunityRecency {
  /** Most recently touched member */
  latestPath: string;
  /** Age of latestPath in days */
  latestAgeDays: number;
  /** Members touched within the window */
  recentCount: number;
  windowDays: number;
}

export interface CommunitySummary {
  /** Short display ID (c1, c2, ...) */
  id: string;
  /** Member paths in ascending order */
  members: string[];
  /** Highest-authority member */
  anchor: string;
  /** internalEdges / (size * (size - 1)) */
  density: number;
  internalEdges: number;
  topTags: TagCount[];
  topAuthority: AuthorityScore[];
  authorityStats: AuthorityStats;
  authorityBuckets: AuthorityBucket[];
  recency: CommunityRecency | null;
  /** Members with an edge into another community */
  bridges: string[];
}

export interface GraphStatsSummary {
  nodeCount: number;
  edgeCount: number;
}

/**
 * Per-phase wall-clock durations in milliseconds
 */
export interface GraphTimings {
  load: number;
  build: number;
  hits: number;
  label: number;
  recency: number;
  total: number;
}

/**
 * Notes that were dropped before analysis, for lookup diagnostics
 */
export interface ExcludedNotes {
  /** Dropped by include/exclude patterns */
  byPattern: string[];
  /** Dropped by minimum-degree pruning */
  byMinDegree: string[];
}

/**
 * Façade states, in order
 */
export type AnalysisPhase =
  | "idle"
  | "loaded"
  | "built"
  | "scored"
  | "partitioned"
  | "detected"
  | "done";

/**
 * Result of one analysis run.
 * Frozen before it is returned.
 */
export interface GraphAnalysis {
  readonly nodes: ReadonlyMap<string, GraphNode>;
  readonly communities: readonly CommunitySummary[];
  readonly weakComponents: readonly (readonly string[])[];
  readonly strongComponents: readonly (readonly string[])[];
  readonly orphans: readonly string[];
  readonly stats: GraphStatsSummary;
  readonly excluded: ExcludedNotes;
  readonly hits: { iterations: number; converged: boolean };
  readonly labelPropagation: { rounds: number; converged: boolean };
  readonly timings: GraphTimings;
  /** Reference time used for ages */
  readonly analyzedAt: Date;
}
