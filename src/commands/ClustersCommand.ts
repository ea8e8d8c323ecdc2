/**
 * ClustersCommand - mutual-link clusters (strongly connected components)
 */

import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

export class ClustersCommand extends BaseCommand {
  readonly name = "clusters";
  readonly aliases = ["scc"];
  get description(): string {
    return t("commands:clusters.description");
  }
  readonly usage = "vault-graph clusters [--limit N] [--all]";
  readonly category = "graph" as const;

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    const analysis = await context.analyze();
    const { vault, display } = context;
    // Singletons are not clusters
    const clusters = analysis.strongComponents.filter((component) => component.length > 1);

    const lines = [t("commands:clusters.header", { vault: vault.name, path: vault.path })];
    if (clusters.length === 0) {
      lines.push(t("common:report.none"));
    } else {
      const shown = this.visibleCount(clusters.length, display);
      if (shown < clusters.length) {
        lines.push(t("commands:clusters.showing", { n: shown, total: clusters.length }));
      }
      for (const cluster of clusters.slice(0, shown)) {
        lines.push(`  size ${cluster.length}: ${cluster.join(", ")}`);
      }
      lines.push(...this.moreLine(clusters.length, shown, "  "));
    }

    if (display.timings) {
      lines.push("", ...this.timingLines(analysis));
    }
    return this.success(lines);
  }
}

// Export singleton instance
export const clustersCommand = new ClustersCommand();
