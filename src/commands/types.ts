import type { ResolvedVault } from "../utils/config.js";
import type { GraphAnalysisOptionsInput } from "../utils/graph/options.js";
import type { GraphAnalysis, NoteEntry } from "../utils/graph/types.js";
import type { CommandFlags } from "./flags.js";

/**
 * How much of each listing to print
 */
export interface DisplayOptions {
  /** Max items per listing (--limit) */
  limit: number;
  /** Print full listings (--all) */
  showAll: boolean;
  /** ANSI colors for community IDs */
  color: boolean;
  /** Append the timings block (--timings) */
  timings: boolean;
}

/**
 * CommandContext provides everything a command needs to execute.
 * This is the single source of truth for command handlers.
 */
export interface CommandContext {
  vault: ResolvedVault;

  /** Analysis options from the global flags */
  analysisOptions: GraphAnalysisOptionsInput;

  display: DisplayOptions;

  /** Every parsed flag, including command-specific ones */
  flags: CommandFlags;

  /** Notes of the vault, loaded once per context */
  loadNotes(): Promise<NoteEntry[]>;

  /**
   * Run the analysis over the vault notes
   * @param overrides - options layered over `analysisOptions`
   */
  analyze(overrides?: GraphAnalysisOptionsInput): Promise<GraphAnalysis>;
}

/**
 * CommandResult indicates the outcome of command execution.
 */
export interface CommandResult {
  /** Whether the command was handled */
  handled: boolean;

  /** Text for stdout */
  output?: string;

  /** Optional error message if command failed */
  error?: string;
}

/**
 * Option accepted by a command beyond the global ones
 */
export interface OptionSpec {
  /** Long name without dashes */
  name: string;
  /** Whether the option takes a value (otherwise it is a switch, --no-<name> negates) */
  takesValue: boolean;
  description: string;
}

/**
 * Command interface defines the contract for all commands in the system.
 */
export interface Command {
  /** Primary command name (e.g., "degrees") */
  name: string;

  /** Alternative names for this command (e.g., ["stats"]) */
  aliases?: string[];

  /** Human-readable description for help text */
  description: string;

  /** Usage example (e.g., "vault-graph community <id|path>") */
  usage: string;

  /** Whether this command requires positional arguments */
  requiresArgs?: boolean;

  /** Category for grouping in help text */
  category?: "graph" | "config";

  /** Command-specific options */
  options?: OptionSpec[];

  /**
   * Execute the command with given arguments and context.
   * @param args - Positional arguments after the command name
   */
  execute(args: string[], context: CommandContext): Promise<CommandResult>;

  /**
   * Check if this command can handle the given command name.
   */
  canHandle(commandName: string): boolean;
}
