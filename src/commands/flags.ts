/**
 * Command-line flag parsing
 *
 * Supports `--name value`, `--name=value`, boolean `--name` and `--no-name`,
 * `-v <vault>` and `-h`. Value flags may repeat; comma-separated values are
 * split by `getList`.
 */

import { t } from "../i18n/index.js";
import { ErrorCode, ValidationError } from "../utils/errors.js";

export interface ParsedArgs {
  positionals: string[];
  values: Map<string, string[]>;
  switches: Map<string, boolean>;
}

const SHORT_FLAGS = new Map<string, string>([
  ["-h", "help"],
  ["-v", "vault"],
]);

function usageError(key: string, params: Record<string, string>): ValidationError {
  return new ValidationError(ErrorCode.VALIDATION_INVALID_FORMAT, t(key, params));
}

/**
 * Split argv into positionals, value flags and switches
 *
 * @param valueFlags - names of flags that take a value
 * @throws {ValidationError} when a value flag has no value
 *
 * @example
 * parseArgs(["degrees", "--limit", "5", "--no-color"], new Set(["limit"]));
 * // positionals ["degrees"], values { limit: ["5"] }, switches { color: false }
 */
export function parseArgs(argv: readonly string[], valueFlags: ReadonlySet<string>): ParsedArgs {
  const positionals: string[] = [];
  const values = new Map<string, string[]>();
  const switches = new Map<string, boolean>();

  const addValue = (name: string, value: string): void => {
    const existing = values.get(name);
    if (existing) {
      existing.push(value);
    } else {
      values.set(name, [value]);
    }
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    const short = SHORT_FLAGS.get(arg);
    const isLong = arg.startsWith("--") && arg.length > 2;
    if (short === undefined && !isLong) {
      positionals.push(arg);
      i++;
      continue;
    }

    let name = short ?? arg.slice(2);
    let inlineValue: string | undefined;
    const eq = name.indexOf("=");
    if (eq >= 0) {
      inlineValue = name.slice(eq + 1);
      name = name.slice(0, eq);
    }

    if (valueFlags.has(name)) {
      const value = inlineValue ?? argv[i + 1];
      if (value === undefined || (inlineValue === undefined && value.startsWith("--"))) {
        throw usageError("common:cli.missing_value", { option: `--${name}` });
      }
      addValue(name, value);
      i += inlineValue === undefined ? 2 : 1;
      continue;
    }

    if (inlineValue !== undefined) {
      switches.set(name, inlineValue !== "false");
    } else if (name.startsWith("no-")) {
      switches.set(name.slice(3), false);
    } else {
      switches.set(name, true);
    }
    i++;
  }

  return { positionals, values, switches };
}

/**
 * Typed access to parsed flags
 */
export class CommandFlags {
  constructor(
    private readonly values: ReadonlyMap<string, readonly string[]> = new Map(),
    private readonly switches: ReadonlyMap<string, boolean> = new Map()
  ) {}

  static fromParsed(parsed: ParsedArgs): CommandFlags {
    return new CommandFlags(parsed.values, parsed.switches);
  }

  /** Every flag name given on the command line */
  names(): string[] {
    return [...this.values.keys(), ...this.switches.keys()];
  }

  has(name: string): boolean {
    return this.values.has(name) || this.switches.has(name);
  }

  /** Last value of a value flag */
  getString(name: string): string | undefined {
    const all = this.values.get(name);
    return all && all.length > 0 ? all[all.length - 1] : undefined;
  }

  /** All values, comma-separated entries split, blanks dropped */
  getList(name: string): string[] {
    return (this.values.get(name) ?? [])
      .flatMap((value) => value.split(","))
      .map((value) => value.trim())
      .filter((value) => value.length > 0);
  }

  getBoolean(name: string, fallback: boolean): boolean {
    return this.switches.get(name) ?? fallback;
  }

  /** undefined when the switch was not given at all */
  getOptionalBoolean(name: string): boolean | undefined {
    return this.switches.get(name);
  }

  /**
   * Non-negative integer flag
   * @throws {ValidationError} for anything else
   */
  getNumber(name: string, fallback: number): number {
    const raw = this.getString(name);
    if (raw === undefined) {
      return fallback;
    }
    if (!/^\d+$/.test(raw.trim())) {
      throw usageError("common:cli.invalid_number", { flag: `--${name}`, value: raw });
    }
    return parseInt(raw, 10);
  }
}
