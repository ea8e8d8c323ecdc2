/**
 * OrphansCommand - notes with no links in either direction
 */

import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { t } from "../i18n/index.js";

export class OrphansCommand extends BaseCommand {
  readonly name = "orphans";
  get description(): string {
    return t("commands:orphans.description");
  }
  readonly usage = "vault-graph orphans [--limit N] [--all]";
  readonly category = "graph" as const;

  async execute(_args: string[], context: CommandContext): Promise<CommandResult> {
    const analysis = await context.analyze();
    const { vault, display } = context;
    const orphans = analysis.orphans;

    const lines = [t("commands:orphans.header", { vault: vault.name, path: vault.path })];
    if (orphans.length === 0) {
      lines.push(t("common:report.none"));
    } else {
      const shown = this.visibleCount(orphans.length, display);
      lines.push(...orphans.slice(0, shown).map((orphan) => `  ${orphan}`));
      lines.push(...this.moreLine(orphans.length, shown, "  "));
    }

    if (display.timings) {
      lines.push("", ...this.timingLines(analysis));
    }
    return this.success(lines);
  }
}

// Export singleton instance
export const orphansCommand = new OrphansCommand();
