import type { Command, CommandContext, CommandResult, DisplayOptions, OptionSpec } from "./types.js";
import type { GraphAnalysis, GraphNode } from "../utils/graph/types.js";
import { formatTimings } from "../utils/graph/stats.js";
import { t } from "../i18n/index.js";

// Re-export types for convenience so other command files can import from BaseCommand
export type { CommandContext, CommandResult } from "./types.js";

/**
 * BaseCommand provides a foundation for implementing commands with common utilities.
 * Extend this class to create new commands with shared functionality.
 */
export abstract class BaseCommand implements Command {
  abstract name: string;
  abstract description: string;
  abstract usage: string;

  aliases?: string[];
  requiresArgs?: boolean;
  category?: Command["category"];

  /**
   * Command-specific options. Override with a getter so descriptions
   * are translated after i18n is ready.
   */
  get options(): OptionSpec[] {
    return [];
  }

  /**
   * Check if this command can handle the given command name.
   * Matches against both the primary name and any aliases.
   */
  canHandle(commandName: string): boolean {
    const normalizedName = commandName.toLowerCase();
    if (this.name.toLowerCase() === normalizedName) {
      return true;
    }
    if (this.aliases?.some((alias) => alias.toLowerCase() === normalizedName)) {
      return true;
    }
    return false;
  }

  /**
   * Execute the command. Must be implemented by subclasses.
   */
  abstract execute(args: string[], context: CommandContext): Promise<CommandResult>;

  // ==================== Helper Methods ====================

  /**
   * Create a success result with the lines to print.
   */
  protected success(lines?: string[] | string): CommandResult {
    if (lines === undefined) {
      return { handled: true };
    }
    return {
      handled: true,
      output: Array.isArray(lines) ? lines.join("\n") : lines,
    };
  }

  /**
   * Create an error result with a message.
   */
  protected error(message: string): CommandResult {
    return { handled: true, error: message };
  }

  /**
   * Number of items to show from a listing of `total`
   */
  protected visibleCount(total: number, display: DisplayOptions): number {
    if (display.showAll || display.limit <= 0 || display.limit > total) {
      return total;
    }
    return display.limit;
  }

  /**
   * "... (K more)" trailer, or nothing when everything was shown
   */
  protected moreLine(total: number, shown: number, indent: string): string[] {
    return total > shown ? [`${indent}${t("common:report.more", { n: total - shown })}`] : [];
  }

  protected colorCommunity(id: string, display: DisplayOptions): string {
    return display.color ? `\x1b[36m${id}\x1b[0m` : id;
  }

  protected formatScore(value: number): string {
    return value.toFixed(4);
  }

  protected formatTags(node: GraphNode): string {
    return node.tags.length > 0 ? ` tags:${node.tags.join(",")}` : "";
  }

  /**
   * Timings block in whole milliseconds
   */
  protected timingLines(analysis: GraphAnalysis): string[] {
    const ms = formatTimings(analysis.timings);
    return [
      t("common:report.timings"),
      `  load:    ${ms.load} ms`,
      `  build:   ${ms.build} ms`,
      `  hits:    ${ms.hits} ms`,
      `  label:   ${ms.label} ms`,
      `  recency: ${ms.recency} ms`,
      `  total:   ${ms.total} ms`,
    ];
  }

  /**
   * Serialize a JSON report
   */
  protected json(payload: unknown): CommandResult {
    return this.success(JSON.stringify(payload, null, 2));
  }
}
