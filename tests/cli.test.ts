/**
 * Tests for the command-line entry point
 */

import { describe, it, expect, jest, beforeAll, afterAll, beforeEach, afterEach } from "@jest/globals";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { runCli, usageText, EXIT_RUNTIME, EXIT_SUCCESS, EXIT_USAGE } from "../src/cli.js";
import type { CliOutput } from "../src/cli.js";
import { getLogger } from "../src/utils/logger.js";

let rootDir: string;
let vaultPath: string;
const originalConfigDir = process.env.VAULT_GRAPH_CONFIG_DIR;

beforeAll(async () => {
  rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "vault-graph-cli-"));
  vaultPath = path.join(rootDir, "notes");
  await fs.mkdir(vaultPath, { recursive: true });
  await fs.writeFile(path.join(vaultPath, "a.md"), "[[b]]\n");
  await fs.writeFile(path.join(vaultPath, "b.md"), "# B\n");
  await fs.writeFile(path.join(vaultPath, "c.md"), "alone\n");
  process.env.VAULT_GRAPH_CONFIG_DIR = path.join(rootDir, "config");
});

afterAll(async () => {
  if (originalConfigDir === undefined) {
    delete process.env.VAULT_GRAPH_CONFIG_DIR;
  } else {
    process.env.VAULT_GRAPH_CONFIG_DIR = originalConfigDir;
  }
  await fs.rm(rootDir, { recursive: true, force: true });
});

interface Captured extends CliOutput {
  out: string[];
  err: string[];
}

function capture(): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

describe("runCli", () => {
  let consoleErrorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    consoleErrorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    consoleErrorSpy.mockRestore();
    getLogger().setDebugMode(false);
    await fs.rm(path.join(rootDir, "config"), { recursive: true, force: true });
  });

  it("should print usage without a command", async () => {
    const output = capture();

    await expect(runCli([], output)).resolves.toBe(EXIT_SUCCESS);
    expect(output.out).toEqual([usageText()]);
    expect(output.out[0].startsWith("vault-graph - link-graph analytics for markdown vaults")).toBe(
      true
    );
  });

  it("should print usage for --help even with a command", async () => {
    const output = capture();

    await expect(runCli(["degrees", "-h"], output)).resolves.toBe(EXIT_SUCCESS);
    expect(output.out[0]).toContain("Exit Codes:");
  });

  it("should run a command on a vault directory", async () => {
    const output = capture();

    const code = await runCli(["orphans", "--vault", vaultPath, "--min-degree", "0"], output);

    expect(code).toBe(EXIT_SUCCESS);
    expect(output.out).toEqual([
      `Orphans (no inbound or outbound wikilinks) in "notes" (${vaultPath}):\n  c.md`,
    ]);
    expect(output.err).toEqual([]);
  });

  it("should accept unique command prefixes", async () => {
    const output = capture();

    await expect(runCli(["orph", "-v", vaultPath, "--min-degree=0"], output)).resolves.toBe(
      EXIT_SUCCESS
    );
    expect(output.out[0].endsWith("\n  c.md")).toBe(true);
  });

  it("should take defaults from the config file", async () => {
    await fs.mkdir(path.join(rootDir, "config"), { recursive: true });
    await fs.writeFile(
      path.join(rootDir, "config", "config.yaml"),
      `vaults:\n  main: ${JSON.stringify(vaultPath)}\ndefaultVault: main\ngraph:\n  minDegree: 0\n`
    );
    const output = capture();

    await expect(runCli(["orphans"], output)).resolves.toBe(EXIT_SUCCESS);
    expect(output.out).toEqual([
      `Orphans (no inbound or outbound wikilinks) in "main" (${vaultPath}):\n  c.md`,
    ]);
  });

  it("should print JSON reports", async () => {
    const output = capture();

    const code = await runCli(
      ["note-context", "--vault", vaultPath, "--min-degree", "0", "--files", "a.md"],
      output
    );

    expect(code).toBe(EXIT_SUCCESS);
    expect(JSON.parse(output.out[0])).toMatchObject({
      count: 1,
      contexts: [{ path: "a.md", neighbors: { linksOut: ["b.md"], linksIn: [] } }],
    });
  });

  it("should reject unknown commands", async () => {
    const output = capture();

    await expect(runCli(["bogus"], output)).resolves.toBe(EXIT_USAGE);
    expect(output.err).toEqual([
      'Unknown command "bogus". Run vault-graph --help for the list of commands.',
    ]);
  });

  it("should reject ambiguous prefixes", async () => {
    const output = capture();

    await expect(runCli(["comm"], output)).resolves.toBe(EXIT_USAGE);
    expect(output.err).toEqual(['Ambiguous command "comm": communities, community']);
  });

  it("should reject options the command does not take", async () => {
    const output = capture();

    await expect(runCli(["orphans", "--bogus"], output)).resolves.toBe(EXIT_USAGE);
    expect(output.err).toEqual(["Unknown option: --bogus"]);

    const second = capture();
    await expect(runCli(["orphans", "--files", "a.md"], second)).resolves.toBe(EXIT_USAGE);
    expect(second.err).toEqual(["Unknown option: --files"]);
  });

  it("should reject malformed values", async () => {
    const missing = capture();
    await expect(runCli(["degrees", "--limit"], missing)).resolves.toBe(EXIT_USAGE);
    expect(missing.err).toEqual(["Option --limit needs a value"]);

    const invalid = capture();
    await expect(runCli(["degrees", "--vault", vaultPath, "--limit", "abc"], invalid)).resolves.toBe(
      EXIT_USAGE
    );
    expect(invalid.err).toEqual([
      'Invalid value for --limit: "abc" (expected a non-negative integer)',
    ]);
  });

  it("should reject a missing argument", async () => {
    const output = capture();

    await expect(runCli(["community", "--vault", vaultPath], output)).resolves.toBe(EXIT_USAGE);
    expect(output.err).toEqual([
      "Missing arguments. Usage: vault-graph community <id|path> [--neighbors] [--tags]",
    ]);
  });

  it("should exit with a runtime error for an unknown vault", async () => {
    const output = capture();
    const missing = path.join(rootDir, "missing");

    await expect(runCli(["orphans", "--vault", missing], output)).resolves.toBe(EXIT_RUNTIME);
    expect(output.err).toEqual([
      `Vault "${missing}" is neither registered nor an existing directory\n\nHint: Register the vault under "vaults" in config.yaml or pass a directory path.`,
    ]);
  });

  it("should exit with a runtime error without any vault", async () => {
    const output = capture();

    await expect(runCli(["orphans"], output)).resolves.toBe(EXIT_RUNTIME);
    expect(output.err[0].startsWith("No vault was given and no default vault is configured.")).toBe(
      true
    );
  });

  it("should exit with a runtime error for a failed lookup", async () => {
    const output = capture();

    await expect(
      runCli(["community", "zzz", "--vault", vaultPath, "--min-degree", "0"], output)
    ).resolves.toBe(EXIT_RUNTIME);
    expect(output.err).toEqual([
      "community zzz not found and file zzz not in graph (use vault-relative paths, ensure it exists, and check include/exclude filters)",
    ]);
  });

  it("should print detailed errors in debug mode", async () => {
    const output = capture();

    await expect(runCli(["bogus", "--debug"], output)).resolves.toBe(EXIT_USAGE);
    expect(output.err).toEqual([
      "A value has an invalid format. Check the command usage.\n\n[Error code: 3001]",
    ]);
    expect(consoleErrorSpy).toHaveBeenCalled();
  });
});
