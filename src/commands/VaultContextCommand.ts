/**
 * VaultContextCommand - vault-wide stats and top communities, as JSON
 */

import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult, OptionSpec } from "./types.js";
import { formatTimings } from "../utils/graph/stats.js";
import type {
  AuthorityScore,
  AuthorityStats,
  CommunityRecency,
  CommunitySummary,
  TagCount,
} from "../utils/graph/types.js";
import { t } from "../i18n/index.js";

export interface VaultCommunityContext {
  id: string;
  size: number;
  fractionOfVault: number;
  anchor: string;
  density: number;
  topTags: TagCount[];
  topAuthority: AuthorityScore[];
  authorityStats: AuthorityStats;
  recency: CommunityRecency | null;
}

export class VaultContextCommand extends BaseCommand {
  readonly name = "vault-context";
  get description(): string {
    return t("commands:vault_context.description");
  }
  readonly usage =
    "vault-graph vault-context [--max-communities N] [--community-top-notes N] [--community-top-tags N]";
  readonly category = "graph" as const;
  get options(): OptionSpec[] {
    return [
      { name: "max-communities", takesValue: true, description: t("commands:vault_context.option_max_communities") },
      { name: "community-top-notes", takesValue: true, description: t("commands:vault_context.option_top_notes") },
      { name: "community-top-tags", takesValue: true, description: t("commands:vault_context.option_top_tags") },
    ];
  }

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    const { flags } = context;
    const maxCommunities = flags.getNumber("max-communities", 25);
    // 0 falls back to the default for the per-community lists
    const topNotes = flags.getNumber("community-top-notes", 5) || 5;
    const topTags = flags.getNumber("community-top-tags", 5) || 5;

    // Summaries must carry enough entries for the requested slices
    const analysis = await context.analyze({
      includeTags: true,
      topAuthorityLimit: Math.max(topNotes, 5),
      topTagsLimit: Math.max(topTags, 5),
    });
    const nodeCount = analysis.stats.nodeCount;

    const listed =
      maxCommunities > 0 ? analysis.communities.slice(0, maxCommunities) : analysis.communities;
    const communities = listed.map(
      (community: CommunitySummary): VaultCommunityContext => ({
        id: community.id,
        size: community.members.length,
        fractionOfVault: community.members.length / nodeCount,
        anchor: community.anchor,
        density: community.density,
        topTags: community.topTags.slice(0, topTags),
        topAuthority: community.topAuthority.slice(0, topNotes),
        authorityStats: community.authorityStats,
        recency: community.recency,
      })
    );

    return this.json({
      stats: analysis.stats,
      orphanCount: analysis.orphans.length,
      orphans: analysis.orphans,
      components: analysis.weakComponents,
      communities,
      ...(context.display.timings ? { timings: formatTimings(analysis.timings) } : {}),
    });
  }
}

// Export singleton instance
export const vaultContextCommand = new VaultContextCommand();
