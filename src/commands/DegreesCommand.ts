/**
 * DegreesCommand - top notes by authority, hub and link counts
 */

import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import type { GraphAnalysis, GraphNode } from "../utils/graph/types.js";
import { compareStrings } from "../utils/graph/components.js";
import { t } from "../i18n/index.js";

type NodeMetric = "authority" | "hub" | "inbound" | "outbound";

function rankBy(nodes: GraphNode[], metric: NodeMetric): GraphNode[] {
  return [...nodes].sort((a, b) => b[metric] - a[metric] || compareStrings(a.path, b.path));
}

export class DegreesCommand extends BaseCommand {
  readonly name = "degrees";
  readonly aliases = ["stats"];
  get description(): string {
    return t("commands:degrees.description");
  }
  readonly usage = "vault-graph degrees [--limit N] [--all]";
  readonly category = "graph" as const;

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    const analysis = await context.analyze();
    const { vault, display } = context;

    const lines = [
      t("commands:degrees.header", { vault: vault.name, path: vault.path }),
      t("commands:degrees.totals", {
        nodes: analysis.stats.nodeCount,
        edges: analysis.stats.edgeCount,
        orphans: analysis.orphans.length,
        communities: analysis.communities.length,
      }),
      "",
      ...this.rankingLines(analysis, context),
    ];

    if (display.timings) {
      lines.push("", ...this.timingLines(analysis));
    }
    return this.success(lines);
  }

  private rankingLines(analysis: GraphAnalysis, context: CommandContext): string[] {
    const nodes = [...analysis.nodes.values()];
    if (nodes.length === 0) {
      return [t("common:report.none")];
    }
    const shown = this.visibleCount(nodes.length, context.display);
    const community = (node: GraphNode): string => node.community ?? "";
    const lines: string[] = [];

    const section = (
      titleKey: string,
      metric: NodeMetric,
      format: (node: GraphNode) => string
    ): void => {
      if (lines.length > 0) {
        lines.push("");
      }
      lines.push(t(titleKey, { n: shown }));
      rankBy(nodes, metric)
        .slice(0, shown)
        .forEach((node, i) => lines.push(`  ${i + 1}) ${node.path} ${format(node)}`));
      lines.push(...this.moreLine(nodes.length, shown, "  "));
    };

    section(
      "commands:degrees.top_authority",
      "authority",
      (n) =>
        `auth=${this.formatScore(n.authority)} hub=${this.formatScore(n.hub)} in=${n.inbound} out=${n.outbound} community=${community(n)}${this.formatTags(n)}`
    );
    section(
      "commands:degrees.top_hub",
      "hub",
      (n) =>
        `hub=${this.formatScore(n.hub)} auth=${this.formatScore(n.authority)} in=${n.inbound} out=${n.outbound} community=${community(n)}${this.formatTags(n)}`
    );
    section(
      "commands:degrees.top_inbound",
      "inbound",
      (n) =>
        `in=${n.inbound} out=${n.outbound} auth=${this.formatScore(n.authority)} hub=${this.formatScore(n.hub)} community=${community(n)}`
    );
    section(
      "commands:degrees.top_outbound",
      "outbound",
      (n) =>
        `out=${n.outbound} in=${n.inbound} auth=${this.formatScore(n.authority)} hub=${this.formatScore(n.hub)} community=${community(n)}`
    );
    return lines;
  }
}

// Export singleton instance
export const degreesCommand = new DegreesCommand();
