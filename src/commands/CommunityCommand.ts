/**
 * CommunityCommand - detail for one community, by ID or by member note
 */

import path from "node:path";
import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult, OptionSpec } from "./types.js";
import { formatTagCounts } from "./CommunitiesCommand.js";
import type { CommunitySummary, GraphAnalysis, GraphNode } from "../utils/graph/types.js";
import { communityMembershipLookup } from "../utils/graph/communities.js";
import { compareStrings } from "../utils/graph/components.js";
import { resolveAnalysisOptions } from "../utils/graph/options.js";
import { normalizeNotePath } from "../utils/graph/wikilinks.js";
import { ErrorCode, GraphLookupError } from "../utils/errors.js";
import { t } from "../i18n/index.js";

/**
 * Vault-relative note path for a CLI argument (relative or absolute, ".md" optional)
 */
export function toVaultRelativePath(arg: string, vaultPath: string): string {
  if (path.isAbsolute(arg)) {
    const relative = path.relative(vaultPath, arg);
    if (!relative.startsWith("..") && !path.isAbsolute(relative)) {
      return normalizeNotePath(relative);
    }
  }
  return normalizeNotePath(arg);
}

/**
 * Find a community by ID, or the community of a note.
 *
 * @throws {GraphLookupError} naming the filter that most likely hid the note
 */
export function findCommunity(
  query: string,
  analysis: GraphAnalysis,
  vaultPath: string,
  minDegree: number
): CommunitySummary {
  const byId = analysis.communities.find((community) => community.id === query);
  if (byId) {
    return byId;
  }

  const notePath = toVaultRelativePath(query, vaultPath);
  if (!analysis.nodes.has(notePath)) {
    if (analysis.excluded.byMinDegree.includes(notePath)) {
      throw new GraphLookupError(
        ErrorCode.GRAPH_NOTE_NOT_IN_GRAPH,
        query,
        t("errors:lookup.pruned_by_min_degree", { query, minDegree })
      );
    }
    if (analysis.excluded.byPattern.includes(notePath)) {
      throw new GraphLookupError(
        ErrorCode.GRAPH_NOTE_NOT_IN_GRAPH,
        query,
        t("errors:lookup.excluded_by_pattern", { query })
      );
    }
    throw new GraphLookupError(
      ErrorCode.GRAPH_COMMUNITY_NOT_FOUND,
      query,
      t("errors:lookup.community_not_found", { query })
    );
  }

  const community = communityMembershipLookup(analysis.communities).get(notePath);
  if (!community) {
    throw new GraphLookupError(
      ErrorCode.GRAPH_NOTE_WITHOUT_COMMUNITY,
      query,
      t("errors:lookup.no_community", { query })
    );
  }
  return community;
}

export class CommunityCommand extends BaseCommand {
  readonly name = "community";
  get description(): string {
    return t("commands:community.description");
  }
  readonly usage = "vault-graph community <id|path> [--neighbors] [--tags]";
  readonly requiresArgs = true;
  readonly category = "graph" as const;
  get options(): OptionSpec[] {
    return [
      { name: "neighbors", takesValue: false, description: t("commands:community.option_neighbors") },
      { name: "tags", takesValue: false, description: t("commands:community.option_tags") },
    ];
  }

  async execute(args: string[], context: CommandContext): Promise<CommandResult> {
    const query = args.join(" ").trim();
    const analysis = await context.analyze({ includeTags: true });
    const { minDegree } = resolveAnalysisOptions(context.analysisOptions);
    const community = findCommunity(query, analysis, context.vault.path, minDegree);

    const lines = this.detailLines(community, analysis, context);
    if (context.display.timings) {
      lines.push("", ...this.timingLines(analysis));
    }
    return this.success(lines);
  }

  private detailLines(
    community: CommunitySummary,
    analysis: GraphAnalysis,
    context: CommandContext
  ): string[] {
    const { display, flags } = context;
    const showNeighbors = flags.getBoolean("neighbors", false);
    const showTags = flags.getBoolean("tags", false);

    const lines = [
      t("commands:community.header", {
        id: this.colorCommunity(community.id, display),
        size: community.members.length,
        vault: context.vault.name,
      }),
    ];
    if (community.anchor) {
      lines.push(t("commands:community.anchor", { anchor: community.anchor }));
    }
    if (community.density > 0) {
      lines.push(t("commands:community.density", { density: community.density.toFixed(3) }));
    }
    lines.push(t("commands:community.edges", { edges: community.internalEdges }));
    if (community.topTags.length > 0) {
      lines.push(t("commands:community.tags", { tags: formatTagCounts(community.topTags).join(", ") }));
    }
    if (community.bridges.length > 0) {
      lines.push(t("commands:community.bridges", { bridges: community.bridges.join(", ") }));
    }

    const members: GraphNode[] = [];
    for (const member of community.members) {
      const node = analysis.nodes.get(member);
      if (node) members.push(node);
    }
    members.sort((a, b) => b.authority - a.authority || compareStrings(a.path, b.path));

    const shown = this.visibleCount(members.length, display);
    lines.push("", t("commands:community.members"));
    members.slice(0, shown).forEach((node, i) => {
      const tags = showTags ? this.formatTags(node) : "";
      lines.push(
        `  ${i + 1}) ${node.path} auth=${this.formatScore(node.authority)} hub=${this.formatScore(node.hub)} in=${node.inbound} out=${node.outbound}${tags}`
      );
      if (showNeighbors) {
        lines.push(t("commands:community.neighbors", { neighbors: node.neighbors.join(", ") }));
      }
    });
    lines.push(...this.moreLine(members.length, shown, "  "));
    return lines;
  }
}

// Export singleton instance
export const communityCommand = new CommunityCommand();
