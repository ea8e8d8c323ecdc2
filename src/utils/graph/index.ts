/**
 * Vault graph analytics
 * Public API
 */

// Types
export type {
  LinkKind,
  ParsedWikilink,
  NoteLink,
  NoteEntry,
  GraphNode,
  DirectedGraph,
  TagCount,
  AuthorityScore,
  AuthorityStats,
  AuthorityBucket,
  CommunityRecency,
  CommunitySummary,
  GraphStatsSummary,
  GraphTimings,
  ExcludedNotes,
  AnalysisPhase,
  GraphAnalysis,
} from "./types.js";

// Options
export {
  resolveAnalysisOptions,
  isRecencyCascadeEnabled,
  GraphAnalysisOptionsSchema,
} from "./options.js";
export type {
  GraphAnalysisOptions,
  GraphAnalysisOptionsInput,
  RecencyCascade,
} from "./options.js";

// Wikilinks and note selection
export { parseWikilinks, normalizeNotePath, NotePathIndex } from "./wikilinks.js";
export { matchesPattern, matchesAnyPattern, isPathSelected } from "./patterns.js";

// Loading
export { loadVaultNotes, collectMarkdownFiles } from "./loader.js";

// Engine
export { buildGraph, countEdges } from "./builder.js";
export { computeHits, runHitsIteration } from "./hits.js";
export { findWeakComponents, findStrongComponents } from "./components.js";
export { propagateLabels, communityMembershipLookup } from "./communities.js";
export { computeEffectiveTimes } from "./recency.js";
export { findOrphans, formatTimings, toDisplayMillis } from "./stats.js";
export { collectBacklinks } from "./backlinks.js";
export type { Backlink } from "./backlinks.js";
export { analyzeGraph, analyzeVault, GraphAnalysisRun } from "./analyzer.js";
