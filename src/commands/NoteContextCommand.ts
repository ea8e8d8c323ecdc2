/**
 * NoteContextCommand - graph and community context for notes, as JSON
 */

import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult, OptionSpec } from "./types.js";
import { toVaultRelativePath } from "./CommunityCommand.js";
import type { Backlink } from "../utils/graph/backlinks.js";
import { collectBacklinks } from "../utils/graph/backlinks.js";
import { communityMembershipLookup } from "../utils/graph/communities.js";
import { compareStrings } from "../utils/graph/components.js";
import { resolveAnalysisOptions } from "../utils/graph/options.js";
import { formatTimings } from "../utils/graph/stats.js";
import type {
  CommunityRecency,
  CommunitySummary,
  GraphAnalysis,
  GraphNode,
  TagCount,
} from "../utils/graph/types.js";
import { ErrorCode, ValidationError } from "../utils/errors.js";
import { t } from "../i18n/index.js";

export interface NoteContext {
  path: string;
  error?: string;
  title?: string;
  tags?: readonly string[];
  frontmatter?: Readonly<Record<string, unknown>>;
  graph?: { inbound: number; outbound: number; hub: number; authority: number };
  community?: {
    id: string;
    size: number;
    fractionOfVault: number;
    anchor: string;
    density: number;
    recency: CommunityRecency | null;
    topTags?: TagCount[];
  };
  neighbors?: { linksOut: string[]; linksIn: string[] };
  backlinks?: Backlink[];
}

/**
 * Sorted inbound neighbours of every node
 */
export function reverseNeighbors(nodes: ReadonlyMap<string, GraphNode>): Map<string, string[]> {
  const reverse = new Map<string, string[]>();
  for (const path of nodes.keys()) {
    reverse.set(path, []);
  }
  for (const node of nodes.values()) {
    for (const target of node.neighbors) {
      reverse.get(target)?.push(node.path);
    }
  }
  for (const sources of reverse.values()) {
    sources.sort(compareStrings);
  }
  return reverse;
}

function take<T>(items: readonly T[], limit: number): T[] {
  return limit > 0 ? items.slice(0, limit) : [...items];
}

export class NoteContextCommand extends BaseCommand {
  readonly name = "note-context";
  get description(): string {
    return t("commands:note_context.description");
  }
  readonly usage =
    "vault-graph note-context --files <a,b> [--no-backlinks] [--no-neighbors] [--no-tags] [--frontmatter]";
  readonly category = "graph" as const;
  get options(): OptionSpec[] {
    return [
      { name: "files", takesValue: true, description: t("commands:note_context.option_files") },
      { name: "backlinks", takesValue: false, description: t("commands:note_context.option_backlinks") },
      { name: "neighbors", takesValue: false, description: t("commands:note_context.option_neighbors") },
      { name: "frontmatter", takesValue: false, description: t("commands:note_context.option_frontmatter") },
      { name: "tags", takesValue: false, description: t("commands:note_context.option_tags") },
      { name: "neighbor-limit", takesValue: true, description: t("commands:note_context.option_neighbor_limit") },
      { name: "backlinks-limit", takesValue: true, description: t("commands:note_context.option_backlinks_limit") },
    ];
  }

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    const { flags } = context;
    const files = flags.getList("files");
    if (files.length === 0) {
      throw new ValidationError(
        ErrorCode.VALIDATION_REQUIRED_FIELD,
        t("commands:note_context.files_required"),
        { field: "files" }
      );
    }

    const includeTags = flags.getBoolean("tags", true);
    const includeNeighbors = flags.getBoolean("neighbors", true);
    const includeBacklinks = flags.getBoolean("backlinks", true);
    const includeFrontmatter = flags.getBoolean("frontmatter", false);
    const neighborLimit = flags.getNumber("neighbor-limit", 50);
    const backlinksLimit = flags.getNumber("backlinks-limit", 50);

    const analysis = await context.analyze({ includeTags });
    const notes = await context.loadNotes();
    const targets = files.map((file) => toVaultRelativePath(file, context.vault.path));

    const backlinks = includeBacklinks
      ? collectBacklinks(notes, targets, resolveAnalysisOptions(context.analysisOptions))
      : new Map<string, Backlink[]>();
    const frontmatterByPath = new Map(notes.map((note) => [note.path, note.frontmatter ?? {}]));
    const reverse = includeNeighbors ? reverseNeighbors(analysis.nodes) : new Map<string, string[]>();
    const communityOf = communityMembershipLookup(analysis.communities);

    const contexts = targets.map((target): NoteContext => {
      const node = analysis.nodes.get(target);
      if (!node) {
        return { path: target, error: t("commands:note_context.not_in_graph") };
      }

      const noteContext: NoteContext = { path: target, title: node.title };
      if (includeTags) {
        noteContext.tags = node.tags;
      }
      if (includeFrontmatter) {
        noteContext.frontmatter = frontmatterByPath.get(target) ?? {};
      }
      noteContext.graph = {
        inbound: node.inbound,
        outbound: node.outbound,
        hub: node.hub,
        authority: node.authority,
      };
      const community = communityOf.get(target);
      if (community) {
        noteContext.community = this.communityContext(community, analysis, includeTags);
      }
      if (includeNeighbors) {
        noteContext.neighbors = {
          linksOut: take(node.neighbors, neighborLimit),
          linksIn: take(reverse.get(target) ?? [], neighborLimit),
        };
      }
      if (includeBacklinks) {
        noteContext.backlinks = take(backlinks.get(target) ?? [], backlinksLimit);
      }
      return noteContext;
    });

    return this.json({
      contexts,
      count: contexts.length,
      ...(context.display.timings ? { timings: formatTimings(analysis.timings) } : {}),
    });
  }

  private communityContext(
    community: CommunitySummary,
    analysis: GraphAnalysis,
    includeTags: boolean
  ): NonNullable<NoteContext["community"]> {
    return {
      id: community.id,
      size: community.members.length,
      fractionOfVault: community.members.length / analysis.stats.nodeCount,
      anchor: community.anchor,
      density: community.density,
      recency: community.recency,
      ...(includeTags ? { topTags: community.topTags } : {}),
    };
  }
}

// Export singleton instance
export const noteContextCommand = new NoteContextCommand();
