import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { z } from "zod";
import { ConfigError, ErrorCode, FileSystemError } from "./errors.js";

/**
 * Expand tilde (~) to home directory in a path.
 * Also handles Windows %USERPROFILE% environment variable.
 *
 * @param inputPath - The path to expand
 * @returns The expanded absolute path
 *
 * @example
 * expandPath("~/notes"); // "/Users/username/notes" on macOS
 * expandPath("%USERPROFILE%/notes"); // "C:\\Users\\username\\notes" on Windows
 */
export function expandPath(inputPath: string): string {
  if (!inputPath) return inputPath;

  // Handle Unix-style tilde expansion
  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === "~") {
    return os.homedir();
  }

  // Handle Windows %USERPROFILE% expansion
  if (process.platform === "win32" && inputPath.includes("%USERPROFILE%")) {
    return inputPath.replace(/%USERPROFILE%/gi, os.homedir());
  }

  return path.resolve(inputPath);
}

// ============================================================================
// Global configuration
// ============================================================================

const GraphDefaultsSchema = z.object({
  minDegree: z.number().int().nonnegative().optional(),
  limit: z.number().int().nonnegative().optional(),
});

export const VaultGraphConfigSchema = z.object({
  /** Registered vaults: name → directory */
  vaults: z.record(z.string()).default({}),
  defaultVault: z.string().optional(),
  graph: GraphDefaultsSchema.default({}),
});

export type VaultGraphConfig = z.infer<typeof VaultGraphConfigSchema>;

export const DEFAULT_CONFIG: VaultGraphConfig = {
  vaults: {},
  defaultVault: undefined,
  graph: {},
};

/**
 * Get the configuration directory path.
 * VAULT_GRAPH_CONFIG_DIR overrides ~/.vault-graph (tests use it to avoid
 * touching real user config).
 */
export function getConfigDir(): string {
  if (process.env.VAULT_GRAPH_CONFIG_DIR) {
    return process.env.VAULT_GRAPH_CONFIG_DIR;
  }
  return path.join(os.homedir(), ".vault-graph");
}

/**
 * Get the path to the configuration file.
 *
 * @returns The absolute path to config.yaml
 */
export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.yaml");
}

function isErrno(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Read a YAML file, or undefined when it does not exist
 */
async function readYamlFile(filePath: string, configKey: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrno(error) && error.code === "ENOENT") {
      return undefined;
    }
    if (isErrno(error)) {
      throw FileSystemError.fromNodeError(error, filePath, "read");
    }
    throw error;
  }

  try {
    // An empty document parses to null
    return parseYaml(content) ?? undefined;
  } catch (error) {
    throw new ConfigError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Malformed YAML in ${filePath}`,
      { configKey, cause: error instanceof Error ? error : undefined }
    );
  }
}

function validateConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, filePath: string): T {
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path.join(".") : "";
    throw new ConfigError(
      ErrorCode.CONFIG_INVALID_VALUE,
      `Invalid value for "${key}" in ${filePath}: ${issue?.message ?? "unknown issue"}`,
      { configKey: key }
    );
  }
  return parsed.data;
}

/**
 * Load the global configuration from disk.
 *
 * A missing file yields the defaults.
 *
 * @throws {ConfigError} If the file is malformed YAML or holds invalid values
 *
 * @example
 * const config = await loadConfig();
 * config.vaults; // { notes: "/home/me/notes" }
 */
export async function loadConfig(): Promise<VaultGraphConfig> {
  const configPath = getConfigPath();
  const raw = await readYamlFile(configPath, "config");
  if (raw === undefined) {
    return { ...DEFAULT_CONFIG, vaults: {}, graph: {} };
  }
  return validateConfig(VaultGraphConfigSchema, raw, configPath);
}

/**
 * Save the configuration to disk.
 *
 * @throws {FileSystemError} If unable to write the config file
 */
export async function saveConfig(config: VaultGraphConfig): Promise<void> {
  const configPath = getConfigPath();
  await writeYamlFile(configPath, config);
}

async function writeYamlFile(filePath: string, value: object): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, stringifyYaml(value), "utf-8");
  } catch (error) {
    if (isErrno(error)) {
      throw FileSystemError.fromNodeError(error, filePath, "write");
    }
    throw error;
  }
}

// ============================================================================
// Vault resolution
// ============================================================================

export interface ResolvedVault {
  /** Registered name, or the directory name for ad-hoc paths */
  name: string;
  /** Absolute directory */
  path: string;
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(dirPath);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Resolve `--vault`: a registered name first, then an existing directory,
 * then the configured default vault.
 *
 * @throws {ConfigError} When nothing resolves
 */
export async function resolveVault(
  nameOrPath: string | undefined,
  config: VaultGraphConfig
): Promise<ResolvedVault> {
  const requested = nameOrPath?.trim() || config.defaultVault;
  if (!requested) {
    throw new ConfigError(ErrorCode.CONFIG_NO_DEFAULT_VAULT, undefined, {
      configKey: "defaultVault",
    });
  }

  const registered = config.vaults[requested];
  if (registered !== undefined) {
    return { name: requested, path: expandPath(registered) };
  }

  const directory = expandPath(requested);
  if (await isDirectory(directory)) {
    return { name: path.basename(directory), path: directory };
  }

  throw new ConfigError(
    ErrorCode.CONFIG_VAULT_NOT_FOUND,
    `Vault "${requested}" is neither registered nor an existing directory`,
    { configKey: "vaults" }
  );
}

// ============================================================================
// Per-vault configuration
// ============================================================================

export const VaultSettingsSchema = z.object({
  /** Patterns always excluded from graph analysis */
  graphIgnore: z.array(z.string()).default([]),
});

export type VaultSettings = z.infer<typeof VaultSettingsSchema>;

export function getVaultSettingsPath(vaultPath: string): string {
  return path.join(vaultPath, ".vault-graph", "config.yaml");
}

/**
 * Load `<vault>/.vault-graph/config.yaml`; missing file means no settings
 *
 * @throws {ConfigError} If the file is malformed
 */
export async function loadVaultSettings(vaultPath: string): Promise<VaultSettings> {
  const settingsPath = getVaultSettingsPath(vaultPath);
  const raw = await readYamlFile(settingsPath, "graphIgnore");
  if (raw === undefined) {
    return { graphIgnore: [] };
  }
  return validateConfig(VaultSettingsSchema, raw, settingsPath);
}

export async function saveVaultSettings(vaultPath: string, settings: VaultSettings): Promise<void> {
  await writeYamlFile(getVaultSettingsPath(vaultPath), settings);
}
