/**
 * Graph analysis façade
 *
 * Runs the phases in a fixed order (idle → loaded → built → scored →
 * partitioned → detected → done) and returns one frozen result. Every run
 * starts from scratch; nothing is cached between runs.
 */

import { performance } from "node:perf_hooks";
import { ErrorCode, ValidationError, VaultGraphError } from "../errors.js";
import { getLogger } from "../logger.js";
import { loadVaultSettings } from "../config.js";
import { buildGraph } from "./builder.js";
import { computeHits } from "./hits.js";
import {
  assignComponentIds,
  findStrongComponents,
  findWeakComponents,
} from "./components.js";
import { groupCommunities, propagateLabels, summarizeCommunities } from "./communities.js";
import type { CommunityGroup } from "./communities.js";
import { computeEffectiveTimes } from "./recency.js";
import { computeGraphStats, findOrphans, PhaseTimer } from "./stats.js";
import { loadVaultNotes } from "./loader.js";
import {
  deepFreeze,
  isRecencyCascadeEnabled,
  resolveAnalysisOptions,
} from "./options.js";
import type { GraphAnalysisOptions, GraphAnalysisOptionsInput } from "./options.js";
import { normalizeNotePath } from "./wikilinks.js";
import type {
  AnalysisPhase,
  CommunitySummary,
  DirectedGraph,
  ExcludedNotes,
  GraphAnalysis,
  GraphNode,
  NoteEntry,
} from "./types.js";

export interface AnalyzeRunOptions {
  /** Reference time for ages and clamping; defaults to the current time */
  now?: Date;
  /** Loading time measured by the caller, merged into the timings */
  loadMs?: number;
}

/**
 * One analysis run.
 * Each step may only follow the one before it.
 */
export class GraphAnalysisRun {
  private phase: AnalysisPhase = "idle";
  private readonly timer = new PhaseTimer();
  private readonly logger = getLogger();

  private entries: readonly NoteEntry[] = [];
  private graph: DirectedGraph | null = null;
  private excluded: ExcludedNotes = { byPattern: [], byMinDegree: [] };
  private hits = { iterations: 0, converged: true };
  private labelPropagation = { rounds: 0, converged: true };
  private groups: CommunityGroup[] = [];
  private weakComponents: string[][] = [];
  private strongComponents: string[][] = [];
  private communities: CommunitySummary[] = [];

  constructor(
    private readonly options: GraphAnalysisOptions,
    private readonly now: Date = new Date()
  ) {}

  get currentPhase(): AnalysisPhase {
    return this.phase;
  }

  private advance(from: AnalysisPhase, to: AnalysisPhase): void {
    if (this.phase !== from) {
      throw new VaultGraphError(
        ErrorCode.GRAPH_INVALID_PHASE,
        `Cannot move to "${to}" while in "${this.phase}" (expected "${from}")`
      );
    }
    this.phase = to;
  }

  private requireGraph(): DirectedGraph {
    if (!this.graph) {
      throw new VaultGraphError(ErrorCode.GRAPH_INVALID_PHASE, "Graph has not been built");
    }
    return this.graph;
  }

  /**
   * Accept note entries
   *
   * @throws {ValidationError} when an entry has an empty path
   */
  load(entries: readonly NoteEntry[], loadMs = 0): this {
    this.advance("idle", "loaded");
    entries.forEach((entry, index) => {
      if (typeof entry.path !== "string" || normalizeNotePath(entry.path) === "") {
        throw new ValidationError(
          ErrorCode.VALIDATION_REQUIRED_FIELD,
          `Note entry at index ${index} has an empty path`,
          { field: "path", value: entry.path }
        );
      }
    });
    this.entries = entries;
    this.timer.record("load", loadMs);
    return this;
  }

  build(): this {
    this.advance("loaded", "built");
    const { graph, excluded } = this.timer.measure("build", () =>
      buildGraph(this.entries, this.options)
    );
    this.graph = graph;
    this.excluded = excluded;
    return this;
  }

  score(): this {
    this.advance("built", "scored");
    const graph = this.requireGraph();
    const result = this.timer.measure("hits", () => computeHits(graph, this.options.hits));
    for (const [path, node] of graph.nodes) {
      node.hub = result.hubs.get(path) ?? 0;
      node.authority = result.authorities.get(path) ?? 0;
    }
    this.hits = { iterations: result.iterations, converged: result.converged };
    this.logger.debug(`[analyzer] HITS finished`, this.hits);
    return this;
  }

  partition(): this {
    this.advance("scored", "partitioned");
    const graph = this.requireGraph();

    this.weakComponents = findWeakComponents(graph);
    this.strongComponents = findStrongComponents(graph);
    const weakIds = assignComponentIds(this.weakComponents, "weak");
    const strongIds = assignComponentIds(this.strongComponents, "scc");

    const result = this.timer.measure("label", () =>
      propagateLabels(graph, this.options.labelPropagation)
    );
    this.groups = groupCommunities(result.labels);
    this.labelPropagation = { rounds: result.rounds, converged: result.converged };

    const communityIds = new Map<string, string>();
    for (const group of this.groups) {
      for (const member of group.members) {
        communityIds.set(member, group.id);
      }
    }
    for (const [path, node] of graph.nodes) {
      node.weakComponent = weakIds.get(path) ?? "";
      node.strongComponent = strongIds.get(path) ?? "";
      node.community = communityIds.get(path) ?? null;
    }

    this.logger.debug(`[analyzer] Label propagation finished`, {
      ...this.labelPropagation,
      communities: this.groups.length,
    });
    return this;
  }

  detect(): this {
    this.advance("partitioned", "detected");
    const graph = this.requireGraph();
    const recency = this.options.recency;

    const effective = this.timer.measure("recency", () => {
      const modified = new Map<string, Date | null>();
      for (const [path, node] of graph.nodes) {
        modified.set(path, node.modified);
      }
      return computeEffectiveTimes(
        graph,
        modified,
        this.now,
        recency,
        isRecencyCascadeEnabled(this.options.recencyCascade)
      );
    });
    for (const [path, node] of graph.nodes) {
      node.effectiveModified = effective.get(path) ?? null;
    }

    this.communities = summarizeCommunities(graph, graph.nodes, this.groups, effective, this.now, {
      includeTags: this.options.includeTags,
      includeSingletonCommunities: this.options.includeSingletonCommunities,
      topTagsLimit: this.options.topTagsLimit,
      topAuthorityLimit: this.options.topAuthorityLimit,
      bridgeLimit: this.options.bridgeLimit,
      recencyWindowDays: recency.windowDays,
    });
    return this;
  }

  /**
   * Assemble and freeze the result
   */
  finish(): GraphAnalysis {
    this.advance("detected", "done");
    const graph = this.requireGraph();

    const nodes = new Map<string, GraphNode>();
    for (const path of graph.paths) {
      const node = graph.nodes.get(path);
      if (node) {
        nodes.set(path, deepFreeze({ ...node, tags: [...node.tags], neighbors: [...node.neighbors] }));
      }
    }

    const timings = this.timer.finish();
    const stats = computeGraphStats(graph);
    this.logger.debug(`[analyzer] Analysis complete`, { ...stats, timings });

    return deepFreeze({
      nodes,
      communities: this.communities,
      weakComponents: this.weakComponents,
      strongComponents: this.strongComponents,
      orphans: findOrphans(graph),
      stats,
      excluded: this.excluded,
      hits: this.hits,
      labelPropagation: this.labelPropagation,
      timings,
      analyzedAt: this.now,
    });
  }
}

/**
 * Analyze in-memory note entries
 *
 * @throws {ValidationError} for invalid options or entries
 *
 * @example
 * const analysis = analyzeGraph(entries, { minDegree: 0 });
 * analysis.nodes.get("a.md")?.authority;
 */
export function analyzeGraph(
  entries: readonly NoteEntry[],
  options: GraphAnalysisOptionsInput = {},
  run: AnalyzeRunOptions = {}
): GraphAnalysis {
  const resolved = resolveAnalysisOptions(options);
  return new GraphAnalysisRun(resolved, run.now ?? new Date())
    .load(entries, run.loadMs)
    .build()
    .score()
    .partition()
    .detect()
    .finish();
}

/**
 * Load a vault from disk and analyze it.
 * The vault's graphIgnore patterns are added to the exclude patterns.
 *
 * @throws {FileSystemError} when the vault cannot be read
 */
export async function analyzeVault(
  vaultPath: string,
  options: GraphAnalysisOptionsInput = {},
  run: Pick<AnalyzeRunOptions, "now"> = {}
): Promise<GraphAnalysis> {
  const now = run.now ?? new Date();
  // Validate before touching the disk
  resolveAnalysisOptions(options);

  const start = performance.now();
  const entries = await loadVaultNotes(vaultPath, { now });
  const loadMs = performance.now() - start;
  const settings = await loadVaultSettings(vaultPath);

  return analyzeGraph(
    entries,
    {
      ...options,
      excludePatterns: [...(options.excludePatterns ?? []), ...settings.graphIgnore],
    },
    { now, loadMs }
  );
}
