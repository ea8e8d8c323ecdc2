/**
 * CommunitiesCommand - list label-propagation communities
 */

import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import type { CommunitySummary, GraphAnalysis, TagCount } from "../utils/graph/types.js";
import { t } from "../i18n/index.js";

export function formatTagCounts(tags: readonly TagCount[]): string[] {
  return tags.map((tag) => `${tag.tag}(${tag.count})`);
}

export class CommunitiesCommand extends BaseCommand {
  readonly name = "communities";
  get description(): string {
    return t("commands:communities.description");
  }
  readonly usage = "vault-graph communities [--limit N] [--all]";
  readonly category = "graph" as const;

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    const analysis = await context.analyze({ includeTags: true });
    const { vault, display } = context;
    const communities = analysis.communities;

    const lines = [t("commands:communities.header", { vault: vault.name, path: vault.path })];
    if (communities.length === 0) {
      lines.push(t("common:report.none"));
    } else {
      const shown = this.visibleCount(communities.length, display);
      if (shown < communities.length) {
        lines.push(t("commands:communities.showing", { n: shown, total: communities.length }));
      }
      communities.slice(0, shown).forEach((community, i) => {
        if (i > 0) {
          lines.push(t("common:report.separator"));
        }
        lines.push("", ...this.communityLines(community, analysis, context), "");
      });
    }

    if (display.timings) {
      lines.push(...this.timingLines(analysis));
    }
    return this.success(lines);
  }

  private communityLines(
    community: CommunitySummary,
    analysis: GraphAnalysis,
    context: CommandContext
  ): string[] {
    const { display } = context;
    const lines = [
      t("commands:communities.title", {
        id: this.colorCommunity(community.id, display),
        size: community.members.length,
      }),
    ];

    if (community.anchor) {
      lines.push(t("commands:communities.anchor", { anchor: community.anchor }));
    }
    if (community.density > 0) {
      lines.push(t("commands:communities.density", { density: community.density.toFixed(3) }));
    }
    if (community.recency) {
      lines.push(
        t("commands:communities.recency", {
          age: community.recency.latestAgeDays.toFixed(1),
          recent: community.recency.recentCount,
          window: community.recency.windowDays,
        })
      );
    }
    if (community.topTags.length > 0) {
      const tagCount = this.visibleCount(community.topTags.length, display);
      const tags = formatTagCounts(community.topTags.slice(0, tagCount));
      if (tagCount < community.topTags.length) {
        tags.push("...");
      }
      lines.push(t("commands:communities.tags", { tags: tags.join(", ") }));
    }

    const noteCount = this.visibleCount(community.topAuthority.length, display);
    if (noteCount > 0) {
      lines.push(t("commands:communities.top_notes"));
      community.topAuthority.slice(0, noteCount).forEach((score, i) => {
        const node = analysis.nodes.get(score.path);
        const degree = node ? ` in=${node.inbound} out=${node.outbound}${this.formatTags(node)}` : "";
        lines.push(
          `      ${i + 1}) ${score.path} auth=${this.formatScore(score.authority)} hub=${this.formatScore(score.hub)}${degree}`
        );
      });
      lines.push(...this.moreLine(community.topAuthority.length, noteCount, "      "));
    }

    if (community.bridges.length > 0) {
      lines.push(t("commands:communities.bridges", { bridges: community.bridges.join(", ") }));
    }
    return lines;
  }
}

// Export singleton instance
export const communitiesCommand = new CommunitiesCommand();
