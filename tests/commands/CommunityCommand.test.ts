/**
 * Tests for CommunityCommand and community lookup
 */

import { describe, it, expect, beforeAll, afterAll } from "@jest/globals";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import {
  communityCommand,
  findCommunity,
  toVaultRelativePath,
} from "../../src/commands/CommunityCommand.js";
import { analyzeGraph } from "../../src/utils/graph/analyzer.js";
import { ErrorCode, GraphLookupError } from "../../src/utils/errors.js";
import { NOW, note } from "../setup.js";
import { SINGLE_LINK_OPTIONS, singleLinkVault, testContext } from "./helpers.js";

let vaultPath: string;

beforeAll(async () => {
  vaultPath = await fs.mkdtemp(path.join(os.tmpdir(), "vault-graph-community-"));
});

afterAll(async () => {
  await fs.rm(vaultPath, { recursive: true, force: true });
});

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("toVaultRelativePath", () => {
  it("should strip the vault directory from absolute paths", () => {
    expect(toVaultRelativePath(path.join(vaultPath, "notes", "a.md"), vaultPath)).toBe(
      "notes/a.md"
    );
  });

  it("should normalize relative paths", () => {
    expect(toVaultRelativePath("./notes/a", vaultPath)).toBe("notes/a.md");
  });

  it("should leave absolute paths outside the vault alone", () => {
    expect(toVaultRelativePath("/elsewhere/a.md", vaultPath)).toBe("elsewhere/a.md");
  });
});

describe("findCommunity", () => {
  const analysis = analyzeGraph(singleLinkVault(), SINGLE_LINK_OPTIONS, { now: NOW });

  it("should find a community by ID", () => {
    expect(findCommunity("c1", analysis, vaultPath, 1).members).toEqual(["a.md", "b.md"]);
  });

  it("should find the community of a note", () => {
    expect(findCommunity("a", analysis, vaultPath, 1).id).toBe("c1");
    expect(findCommunity(path.join(vaultPath, "b.md"), analysis, vaultPath, 1).id).toBe("c1");
  });

  it("should explain a note pruned by min degree", () => {
    const error = thrownBy(() => findCommunity("e.md", analysis, vaultPath, 1));

    expect(error).toBeInstanceOf(GraphLookupError);
    expect(error).toMatchObject({
      code: ErrorCode.GRAPH_NOTE_NOT_IN_GRAPH,
      message: "file e.md was pruned by --min-degree 1",
    });
  });

  it("should explain a note excluded by patterns", () => {
    expect(thrownBy(() => findCommunity("archive/x.md", analysis, vaultPath, 1))).toMatchObject({
      code: ErrorCode.GRAPH_NOTE_NOT_IN_GRAPH,
      message: "file archive/x.md is excluded by include/exclude patterns",
    });
  });

  it("should report unknown queries", () => {
    expect(thrownBy(() => findCommunity("zzz", analysis, vaultPath, 1))).toMatchObject({
      code: ErrorCode.GRAPH_COMMUNITY_NOT_FOUND,
      query: "zzz",
    });
  });

  it("should report notes without a listed community", () => {
    const withoutSingletons = analyzeGraph(
      [note("a.md", ["b.md"]), note("b.md"), note("e.md")],
      { minDegree: 0, includeSingletonCommunities: false },
      { now: NOW }
    );

    expect(thrownBy(() => findCommunity("e", withoutSingletons, vaultPath, 0))).toMatchObject({
      code: ErrorCode.GRAPH_NOTE_WITHOUT_COMMUNITY,
      message: "file e is not assigned to a community under current filters",
    });
  });
});

describe("CommunityCommand", () => {
  it("should print the community and its members", async () => {
    const result = await communityCommand.execute(
      ["b.md"],
      testContext(vaultPath, singleLinkVault(), { analysisOptions: SINGLE_LINK_OPTIONS })
    );

    expect(result.output?.split("\n")).toEqual([
      'Community c1 (size 2) in vault "test"',
      "  anchor: b.md",
      "  density: 0.500",
      "  edges (internal): 1",
      "  tags: ml(2), cooking(1)",
      "",
      "Members (sorted by authority):",
      "  1) b.md auth=1.0000 hub=0.0000 in=1 out=0",
      "  2) a.md auth=0.0000 hub=1.0000 in=0 out=1",
    ]);
  });

  it("should add tags and neighbors on request", async () => {
    const result = await communityCommand.execute(
      ["c1"],
      testContext(vaultPath, singleLinkVault(), {
        analysisOptions: SINGLE_LINK_OPTIONS,
        argv: ["--tags", "--neighbors"],
      })
    );

    expect(result.output?.split("\n").slice(7)).toEqual([
      "  1) b.md auth=1.0000 hub=0.0000 in=1 out=0 tags:ml,cooking",
      "      neighbors: ",
      "  2) a.md auth=0.0000 hub=1.0000 in=0 out=1 tags:ML",
      "      neighbors: b.md",
    ]);
  });

  it("should reject a pruned note", async () => {
    await expect(
      communityCommand.execute(
        ["e.md"],
        testContext(vaultPath, singleLinkVault(), { analysisOptions: SINGLE_LINK_OPTIONS })
      )
    ).rejects.toMatchObject({ code: ErrorCode.GRAPH_NOTE_NOT_IN_GRAPH });
  });
});
