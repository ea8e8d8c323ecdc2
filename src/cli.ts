/**
 * vault-graph CLI
 *
 * Usage:
 *   vault-graph <command> [options]
 *
 * Exit codes:
 *   0 - Success
 *   1 - Usage error (unknown command or option, bad value)
 *   2 - Runtime error (vault missing, unreadable note, lookup failure)
 */

import { createCommandContext, CommandFlags, commandRegistry, parseArgs } from "./commands/index.js";
import type { CommandRegistry, DisplayOptions } from "./commands/index.js";
import { loadConfig, resolveVault } from "./utils/config.js";
import { ErrorCode, ValidationError, formatErrorForUser } from "./utils/errors.js";
import type { GraphAnalysisOptionsInput, RecencyCascade } from "./utils/graph/options.js";
import { getLogger, trackError } from "./utils/logger.js";
import { t } from "./i18n/index.js";

// Exit codes
export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 1;
export const EXIT_RUNTIME = 2;

/** Global options that take a value */
export const GLOBAL_VALUE_FLAGS: readonly string[] = [
  "vault",
  "limit",
  "exclude",
  "include",
  "min-degree",
];

/** Global switches */
export const GLOBAL_SWITCHES: readonly string[] = [
  "all",
  "color",
  "mutual-only",
  "recency-cascade",
  "timings",
  "skip-anchors",
  "skip-embeds",
  "debug",
  "help",
];

/**
 * Where the CLI writes; tests capture it
 */
export interface CliOutput {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processOutput: CliOutput = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

export function usageText(registry: CommandRegistry = commandRegistry): string {
  return `
vault-graph - link-graph analytics for markdown vaults

Usage:
  vault-graph <command> [options]

Global Options:
  -v, --vault <name|path>  Registered vault name or vault directory
  --limit <n>              Items per listing (default: 100, 0 = all)
  --all                    Print full listings
  --no-color               Disable ANSI colors
  --exclude <p,...>        Exclude notes matching patterns (repeatable)
  --include <p,...>        Only keep notes matching patterns (repeatable)
  --min-degree <n>         Drop notes with fewer links (default: 2)
  --mutual-only            Keep only reciprocated links
  --recency-cascade        Let fresh neighbors refresh a note (default: on)
  --no-recency-cascade     Use each note's own timestamp
  --timings                Print phase timings
  --skip-anchors           Ignore links into headings or blocks
  --skip-embeds            Ignore ![[embeds]]
  --debug                  Debug logging on stderr
  -h, --help               Show this help message

${registry.getHelpText()}

Exit Codes:
  ${EXIT_SUCCESS} - Success
  ${EXIT_USAGE} - Usage error
  ${EXIT_RUNTIME} - Runtime error
`.trim();
}

function usageError(key: string, params: Record<string, string>): ValidationError {
  return new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, t(key, params));
}

function toRecencyCascade(value: boolean | undefined): RecencyCascade {
  if (value === undefined) return "unset";
  return value ? "on" : "off";
}

/**
 * Run one CLI invocation.
 *
 * @returns the process exit code
 */
export async function runCli(
  argv: readonly string[],
  output: CliOutput = processOutput,
  registry: CommandRegistry = commandRegistry
): Promise<number> {
  let debug = false;
  try {
    const parsed = parseArgs(argv, new Set([...GLOBAL_VALUE_FLAGS, ...registry.getValueOptions()]));
    const flags = CommandFlags.fromParsed(parsed);
    debug = flags.getBoolean("debug", false);

    const [commandName, ...args] = parsed.positionals;
    if (flags.getBoolean("help", false) || commandName === undefined) {
      output.stdout(usageText(registry));
      return EXIT_SUCCESS;
    }

    const matches = registry.findByPrefix(commandName);
    if (matches.length === 0) {
      throw usageError("common:cli.unknown_command", { name: commandName });
    }
    if (matches.length > 1) {
      throw usageError("common:cli.ambiguous_command", {
        name: commandName,
        matches: matches.join(", "),
      });
    }
    const command = registry.get(matches[0]);
    if (!command) {
      throw usageError("common:cli.unknown_command", { name: commandName });
    }

    const allowed = new Set([
      ...GLOBAL_VALUE_FLAGS,
      ...GLOBAL_SWITCHES,
      ...(command.options ?? []).map((option) => option.name),
    ]);
    const unknown = flags.names().find((name) => !allowed.has(name));
    if (unknown !== undefined) {
      throw usageError("common:cli.unknown_option", { option: `--${unknown}` });
    }

    const logger = getLogger();
    logger.setDebugMode(debug);
    const color = flags.getBoolean("color", true);
    logger.setColor(color);

    const config = await loadConfig();
    const vault = await resolveVault(flags.getString("vault"), config);

    const analysisOptions: GraphAnalysisOptionsInput = {
      skipAnchors: flags.getBoolean("skip-anchors", false),
      skipEmbeds: flags.getBoolean("skip-embeds", false),
      minDegree: flags.getNumber("min-degree", config.graph.minDegree ?? 2),
      mutualOnly: flags.getBoolean("mutual-only", false),
      recencyCascade: toRecencyCascade(flags.getOptionalBoolean("recency-cascade")),
      excludePatterns: flags.getList("exclude"),
      includePatterns: flags.getList("include"),
    };
    const display: DisplayOptions = {
      limit: flags.getNumber("limit", config.graph.limit ?? 100),
      showAll: flags.getBoolean("all", false),
      color,
      timings: flags.getBoolean("timings", false),
    };
    logger.debug("[cli] Running command", { command: command.name, vault: vault.path });

    const context = createCommandContext({ vault, analysisOptions, display, flags });
    const result = await registry.execute(command.name, args, context);
    if (result?.output !== undefined) {
      output.stdout(result.output);
    }
    if (result?.error !== undefined) {
      output.stderr(result.error);
      return EXIT_RUNTIME;
    }
    return EXIT_SUCCESS;
  } catch (error) {
    if (debug && error instanceof Error) {
      trackError(error, { component: "cli", metadata: { argv } });
    }
    output.stderr(formatErrorForUser(error, debug ? "detailed" : "medium"));
    return error instanceof ValidationError ? EXIT_USAGE : EXIT_RUNTIME;
  }
}
