import type { Command, CommandContext, CommandResult } from "./types.js";
import { ErrorCode, ValidationError } from "../utils/errors.js";
import { t } from "../i18n/index.js";
import { degreesCommand } from "./DegreesCommand.js";
import { communitiesCommand } from "./CommunitiesCommand.js";
import { communityCommand } from "./CommunityCommand.js";
import { clustersCommand } from "./ClustersCommand.js";
import { orphansCommand } from "./OrphansCommand.js";
import { noteContextCommand } from "./NoteContextCommand.js";
import { vaultContextCommand } from "./VaultContextCommand.js";
import { ignoreCommand } from "./IgnoreCommand.js";

// Re-export types
export type {
  Command,
  CommandContext,
  CommandResult,
  DisplayOptions,
  OptionSpec,
} from "./types.js";

// Re-export base class
export { BaseCommand } from "./BaseCommand.js";
export { createCommandContext, DEFAULT_DISPLAY } from "./context.js";
export { CommandFlags, parseArgs } from "./flags.js";

// Export command implementations
export { DegreesCommand, degreesCommand } from "./DegreesCommand.js";
export { CommunitiesCommand, communitiesCommand } from "./CommunitiesCommand.js";
export { CommunityCommand, communityCommand } from "./CommunityCommand.js";
export { ClustersCommand, clustersCommand } from "./ClustersCommand.js";
export { OrphansCommand, orphansCommand } from "./OrphansCommand.js";
export { NoteContextCommand, noteContextCommand } from "./NoteContextCommand.js";
export { VaultContextCommand, vaultContextCommand } from "./VaultContextCommand.js";
export { IgnoreCommand, ignoreCommand } from "./IgnoreCommand.js";

/**
 * CommandRegistry manages all registered commands and routes execution.
 */
export class CommandRegistry {
  private commands: Map<string, Command> = new Map();
  private aliasMap: Map<string, string> = new Map();

  /**
   * Register a command with the registry.
   */
  register(command: Command): void {
    this.commands.set(command.name.toLowerCase(), command);

    if (command.aliases) {
      for (const alias of command.aliases) {
        this.aliasMap.set(alias.toLowerCase(), command.name.toLowerCase());
      }
    }
  }

  registerAll(commands: Command[]): void {
    for (const command of commands) {
      this.register(command);
    }
  }

  /**
   * Get a command by name or alias.
   */
  get(name: string): Command | undefined {
    const normalizedName = name.toLowerCase();

    const directCommand = this.commands.get(normalizedName);
    if (directCommand) {
      return directCommand;
    }

    const aliasTarget = this.aliasMap.get(normalizedName);
    if (aliasTarget) {
      return this.commands.get(aliasTarget);
    }

    return undefined;
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Find commands by prefix matching.
   * Returns the exact match if there is one, otherwise every command whose
   * name or alias starts with the prefix (primary names only).
   */
  findByPrefix(prefix: string): string[] {
    const normalizedPrefix = prefix.toLowerCase();

    const exact = this.get(normalizedPrefix);
    if (exact) {
      return [exact.name];
    }

    const matches = new Set<string>();
    for (const name of this.commands.keys()) {
      if (name.startsWith(normalizedPrefix)) {
        matches.add(name);
      }
    }
    for (const [alias, primaryName] of this.aliasMap.entries()) {
      if (alias.startsWith(normalizedPrefix)) {
        matches.add(primaryName);
      }
    }

    return Array.from(matches).sort();
  }

  /**
   * Execute a command by name.
   * @returns CommandResult or null if command not found
   * @throws {ValidationError} when the command needs arguments and got none
   */
  async execute(
    commandName: string,
    args: string[],
    context: CommandContext
  ): Promise<CommandResult | null> {
    const command = this.get(commandName);

    if (!command) {
      return null;
    }

    if (command.requiresArgs && args.length === 0) {
      throw new ValidationError(
        ErrorCode.VALIDATION_REQUIRED_FIELD,
        t("common:cli.missing_args", { usage: command.usage })
      );
    }

    return command.execute(args, context);
  }

  getAll(): Command[] {
    return Array.from(this.commands.values());
  }

  /**
   * Get all command names (including aliases).
   */
  getAllNames(): string[] {
    const names = Array.from(this.commands.keys());
    const aliases = Array.from(this.aliasMap.keys());
    return [...names, ...aliases];
  }

  /**
   * Get commands grouped by category.
   */
  getByCategory(): Map<string, Command[]> {
    const byCategory = new Map<string, Command[]>();

    for (const command of this.commands.values()) {
      const category = command.category || "graph";
      const existing = byCategory.get(category) || [];
      existing.push(command);
      byCategory.set(category, existing);
    }

    return byCategory;
  }

  /**
   * Generate help text for all commands, grouped by category.
   */
  getHelpText(options?: { includeAliases?: boolean; includeOptions?: boolean }): string {
    const { includeAliases = true, includeOptions = true } = options || {};
    const lines: string[] = [t("common:help.title")];

    for (const [category, categoryCommands] of this.getByCategory()) {
      lines.push("", t(`common:help.category_${category}`));

      for (const command of categoryCommands) {
        let line = `  ${command.name}`;

        if (includeAliases && command.aliases && command.aliases.length > 0) {
          line += ` (${command.aliases.join(", ")})`;
        }

        line += ` - ${command.description}`;
        lines.push(line);

        if (includeOptions) {
          for (const option of command.options ?? []) {
            const flag = option.takesValue ? `--${option.name} <value>` : `--${option.name}`;
            lines.push(`      ${flag}  ${option.description}`);
          }
        }
      }
    }

    return lines.join("\n");
  }

  /**
   * Every value-taking option declared by a command
   */
  getValueOptions(): Set<string> {
    const names = new Set<string>();
    for (const command of this.commands.values()) {
      for (const option of command.options ?? []) {
        if (option.takesValue) {
          names.add(option.name);
        }
      }
    }
    return names;
  }

  clear(): void {
    this.commands.clear();
    this.aliasMap.clear();
  }

  get size(): number {
    return this.commands.size;
  }
}

/**
 * Create a registry with every report command.
 */
export function createCommandRegistry(): CommandRegistry {
  const registry = new CommandRegistry();
  registry.registerAll([
    degreesCommand,
    communitiesCommand,
    communityCommand,
    clustersCommand,
    orphansCommand,
    noteContextCommand,
    vaultContextCommand,
    ignoreCommand,
  ]);
  return registry;
}

/**
 * Default global command registry instance.
 */
export const commandRegistry = createCommandRegistry();
