/**
 * Tests for the vault note loader
 */

import { describe, it, expect, jest, beforeAll, afterAll, afterEach } from "@jest/globals";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  loadVaultNotes,
  collectMarkdownFiles,
  getIOConcurrency,
} from "../../../src/utils/graph/loader.js";
import { ErrorCode, FileSystemError } from "../../../src/utils/errors.js";
import { NOW } from "../../setup.js";

let vaultPath: string;

async function writeNote(relPath: string, content: string): Promise<void> {
  const absolute = path.join(vaultPath, relPath);
  await fs.mkdir(path.dirname(absolute), { recursive: true });
  await fs.writeFile(absolute, content, "utf-8");
}

beforeAll(async () => {
  vaultPath = await fs.mkdtemp(path.join(os.tmpdir(), "vault-graph-loader-"));
  await writeNote(
    "a.md",
    "---\ntitle: Alpha\ntags: [x]\nupdated: 2024-05-01\n---\nSee [[b]] and [[sub/c#Intro]] and ![[b]] and [[missing]] and [[a]].\n"
  );
  await writeNote("b.md", "Links to [[c|the c note]]\n");
  await writeNote("sub/c.md", "No links\n");
  await writeNote(".hidden/h.md", "[[a]]\n");
  await writeNote("readme.txt", "[[a]]\n");
});

afterAll(async () => {
  await fs.rm(vaultPath, { recursive: true, force: true });
});

describe("collectMarkdownFiles", () => {
  it("should list visible markdown files in sorted order", async () => {
    await expect(collectMarkdownFiles(vaultPath)).resolves.toEqual(["a.md", "b.md", "sub/c.md"]);
  });
});

describe("loadVaultNotes", () => {
  it("should parse notes and resolve their links", async () => {
    const notes = await loadVaultNotes(vaultPath, { now: NOW, concurrency: 2 });

    expect(notes.map((entry) => entry.path)).toEqual(["a.md", "b.md", "sub/c.md"]);

    const [alpha, beta, gamma] = notes;
    expect(alpha.title).toBe("Alpha");
    expect(alpha.tags).toEqual(["x"]);
    expect(alpha.links).toEqual([
      { target: "b.md", kind: "basic" },
      { target: "sub/c.md", kind: "heading", anchor: "Intro" },
      { target: "b.md", kind: "embed" },
    ]);
    expect(alpha.modified).toEqual(new Date(Date.UTC(2024, 4, 1)));

    expect(beta.title).toBe("b");
    expect(beta.links).toEqual([{ target: "sub/c.md", kind: "alias" }]);

    expect(gamma.links).toEqual([]);
    expect(gamma.modified).toBeInstanceOf(Date);
  });

  it("should fail with a FileSystemError for a missing vault", async () => {
    const missing = path.join(vaultPath, "does-not-exist");

    await expect(loadVaultNotes(missing)).rejects.toMatchObject({
      code: ErrorCode.FS_DIRECTORY_NOT_FOUND,
    });
  });

  it("should reject a file given as the vault", async () => {
    await expect(loadVaultNotes(path.join(vaultPath, "a.md"))).rejects.toBeInstanceOf(
      FileSystemError
    );
  });
});

describe("loadVaultNotes with broken frontmatter", () => {
  let brokenVault: string;

  beforeAll(async () => {
    brokenVault = await fs.mkdtemp(path.join(os.tmpdir(), "vault-graph-broken-"));
    await fs.writeFile(path.join(brokenVault, "a.md"), "[[b]]\n", "utf-8");
    await fs.writeFile(path.join(brokenVault, "b.md"), "[[a]]\n", "utf-8");
    await fs.writeFile(
      path.join(brokenVault, "bad.md"),
      "---\ntitle: [unclosed\n---\n[[a]] #draft\n",
      "utf-8"
    );
  });

  afterAll(async () => {
    await fs.rm(brokenVault, { recursive: true, force: true });
  });

  it("should index the body of a note whose frontmatter does not parse", async () => {
    const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const notes = await loadVaultNotes(brokenVault, { now: NOW });

      expect(notes.map((entry) => entry.path)).toEqual(["a.md", "b.md", "bad.md"]);
      const bad = notes[2];
      expect(bad.title).toBe("bad");
      expect(bad.tags).toEqual(["draft"]);
      expect(bad.links).toEqual([{ target: "a.md", kind: "basic" }]);
      expect(bad.frontmatter).toEqual({});
      expect(bad.modified).toBeInstanceOf(Date);

      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(String(warnSpy.mock.calls[0]?.[0])).toContain(
        "[loader] Unreadable frontmatter, indexing body only: bad.md"
      );
    } finally {
      warnSpy.mockRestore();
    }
  });
});

describe("getIOConcurrency", () => {
  const original = process.env.VAULT_GRAPH_IO_CONCURRENCY;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.VAULT_GRAPH_IO_CONCURRENCY;
    } else {
      process.env.VAULT_GRAPH_IO_CONCURRENCY = original;
    }
  });

  it("should read the environment and fall back to 16", () => {
    process.env.VAULT_GRAPH_IO_CONCURRENCY = "4";
    expect(getIOConcurrency()).toBe(4);

    process.env.VAULT_GRAPH_IO_CONCURRENCY = "zero";
    expect(getIOConcurrency()).toBe(16);
  });
});
