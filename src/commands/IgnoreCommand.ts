/**
 * IgnoreCommand - store the vault's graph ignore patterns
 */

import { BaseCommand } from "./BaseCommand.js";
import type { CommandContext, CommandResult } from "./types.js";
import { loadVaultSettings, saveVaultSettings } from "../utils/config.js";
import { getLogger } from "../utils/logger.js";
import { t } from "../i18n/index.js";

export class IgnoreCommand extends BaseCommand {
  readonly name = "ignore";
  get description(): string {
    return t("commands:ignore.description");
  }
  readonly usage = "vault-graph ignore <pattern> [pattern...]";
  readonly requiresArgs = true;
  readonly category = "config" as const;

  async execute(args: string[], context: CommandContext): Promise<CommandResult> {
    const { vault } = context;
    const patterns = args
      .flatMap((arg) => arg.split(","))
      .map((pattern) => pattern.trim())
      .filter((pattern) => pattern.length > 0);

    const settings = await loadVaultSettings(vault.path);
    await saveVaultSettings(vault.path, { ...settings, graphIgnore: patterns });
    getLogger().debug("[ignore] Saved graph ignore patterns", { vault: vault.path, patterns });

    return this.success(
      t("commands:ignore.saved", { vault: vault.name, path: vault.path, patterns: patterns.join(", ") })
    );
  }
}

// Export singleton instance
export const ignoreCommand = new IgnoreCommand();
