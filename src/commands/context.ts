import { performance } from "node:perf_hooks";
import { loadVaultSettings } from "../utils/config.js";
import type { ResolvedVault } from "../utils/config.js";
import { analyzeGraph } from "../utils/graph/analyzer.js";
import { loadVaultNotes } from "../utils/graph/loader.js";
import type { GraphAnalysisOptionsInput } from "../utils/graph/options.js";
import type { GraphAnalysis, NoteEntry } from "../utils/graph/types.js";
import { CommandFlags } from "./flags.js";
import type { CommandContext, DisplayOptions } from "./types.js";

export interface CreateContextOptions {
  vault: ResolvedVault;
  analysisOptions?: GraphAnalysisOptionsInput;
  display?: Partial<DisplayOptions>;
  flags?: CommandFlags;
  /** Note source; defaults to reading the vault directory */
  source?: () => Promise<NoteEntry[]>;
  /** Reference time for recency */
  now?: Date;
}

export const DEFAULT_DISPLAY: DisplayOptions = {
  limit: 100,
  showAll: false,
  color: true,
  timings: false,
};

/**
 * Build the context handed to commands.
 * Notes are loaded at most once; each analyze() call is a fresh run.
 */
export function createCommandContext(options: CreateContextOptions): CommandContext {
  const { vault } = options;
  const analysisOptions = options.analysisOptions ?? {};
  const source = options.source ?? (() => loadVaultNotes(vault.path, { now: options.now }));

  let loading: Promise<{ notes: NoteEntry[]; loadMs: number }> | null = null;
  const load = (): Promise<{ notes: NoteEntry[]; loadMs: number }> => {
    if (!loading) {
      const start = performance.now();
      loading = source().then((notes) => ({ notes, loadMs: performance.now() - start }));
    }
    return loading;
  };

  return {
    vault,
    analysisOptions,
    display: { ...DEFAULT_DISPLAY, ...options.display },
    flags: options.flags ?? new CommandFlags(),

    async loadNotes(): Promise<NoteEntry[]> {
      const { notes } = await load();
      return notes;
    },

    async analyze(overrides: GraphAnalysisOptionsInput = {}): Promise<GraphAnalysis> {
      const { notes, loadMs } = await load();
      const settings = await loadVaultSettings(vault.path);
      const merged: GraphAnalysisOptionsInput = { ...analysisOptions, ...overrides };
      return analyzeGraph(
        notes,
        {
          ...merged,
          excludePatterns: [...(merged.excludePatterns ?? []), ...settings.graphIgnore],
        },
        { now: options.now, loadMs }
      );
    },
  };
}
