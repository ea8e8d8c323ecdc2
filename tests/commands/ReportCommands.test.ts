/**
 * Tests for the text report commands
 */

import { describe, it, expect, beforeAll, afterAll } from "@jest/globals";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { degreesCommand } from "../../src/commands/DegreesCommand.js";
import { communitiesCommand } from "../../src/commands/CommunitiesCommand.js";
import { clustersCommand } from "../../src/commands/ClustersCommand.js";
import { orphansCommand } from "../../src/commands/OrphansCommand.js";
import type { CommandResult } from "../../src/commands/types.js";
import { note } from "../setup.js";
import { SINGLE_LINK_OPTIONS, mixedVault, singleLinkVault, testContext } from "./helpers.js";

let vaultPath: string;

beforeAll(async () => {
  vaultPath = await fs.mkdtemp(path.join(os.tmpdir(), "vault-graph-reports-"));
});

afterAll(async () => {
  await fs.rm(vaultPath, { recursive: true, force: true });
});

function lines(result: CommandResult): string[] {
  return (result.output ?? "").split("\n");
}

describe("DegreesCommand", () => {
  it("should rank notes by every metric", async () => {
    const result = await degreesCommand.execute(
      [],
      testContext(vaultPath, singleLinkVault(), { analysisOptions: SINGLE_LINK_OPTIONS })
    );

    expect(result.handled).toBe(true);
    expect(lines(result)).toEqual([
      `Graph for vault "test" (${vaultPath})`,
      "Nodes: 2  Edges: 1  Orphans: 0  Communities: 1",
      "",
      "Top 2 by authority (cornerstone concepts):",
      "  1) b.md auth=1.0000 hub=0.0000 in=1 out=0 community=c1 tags:ml,cooking",
      "  2) a.md auth=0.0000 hub=1.0000 in=0 out=1 community=c1 tags:ML",
      "",
      "Top 2 by hub (index/MOC notes):",
      "  1) a.md hub=1.0000 auth=0.0000 in=0 out=1 community=c1 tags:ML",
      "  2) b.md hub=0.0000 auth=1.0000 in=1 out=0 community=c1 tags:ml,cooking",
      "",
      "Top 2 by inbound links:",
      "  1) b.md in=1 out=0 auth=1.0000 hub=0.0000 community=c1",
      "  2) a.md in=0 out=1 auth=0.0000 hub=1.0000 community=c1",
      "",
      "Top 2 by outbound links:",
      "  1) a.md out=1 in=0 auth=0.0000 hub=1.0000 community=c1",
      "  2) b.md out=0 in=1 auth=1.0000 hub=0.0000 community=c1",
    ]);
  });

  it("should cut listings at the limit", async () => {
    const result = await degreesCommand.execute(
      [],
      testContext(vaultPath, singleLinkVault(), {
        analysisOptions: SINGLE_LINK_OPTIONS,
        display: { limit: 1 },
      })
    );

    expect(lines(result).slice(3, 6)).toEqual([
      "Top 1 by authority (cornerstone concepts):",
      "  1) b.md auth=1.0000 hub=0.0000 in=1 out=0 community=c1 tags:ml,cooking",
      "  ... (1 more)",
    ]);
  });

  it("should append timings on request", async () => {
    const result = await degreesCommand.execute(
      [],
      testContext(vaultPath, singleLinkVault(), {
        analysisOptions: SINGLE_LINK_OPTIONS,
        display: { timings: true },
      })
    );
    const output = lines(result);

    expect(output.slice(-8, -6)).toEqual(["", "Timings:"]);
    expect(output[output.length - 1]).toMatch(/^ {2}total: {3}\d+ ms$/);
  });

  it("should report an empty graph", async () => {
    const result = await degreesCommand.execute([], testContext(vaultPath, []));

    expect(lines(result).slice(1)).toEqual([
      "Nodes: 0  Edges: 0  Orphans: 0  Communities: 0",
      "",
      "  (none)",
    ]);
  });
});

describe("CommunitiesCommand", () => {
  it("should describe each community", async () => {
    const result = await communitiesCommand.execute(
      [],
      testContext(vaultPath, singleLinkVault(), { analysisOptions: SINGLE_LINK_OPTIONS })
    );

    expect(lines(result)).toEqual([
      `Communities for vault "test" (${vaultPath})`,
      "",
      "  community c1 (size 2)",
      "    anchor: b.md",
      "    density: 0.500",
      "    recency: 3.0 days ago (1 in last 30d)",
      "    tags: ml(2), cooking(1)",
      "    top notes (by authority):",
      "      1) b.md auth=1.0000 hub=0.0000 in=1 out=0 tags:ml,cooking",
      "      2) a.md auth=0.0000 hub=1.0000 in=0 out=1 tags:ML",
      "",
    ]);
  });

  it("should shorten tags and notes at the limit", async () => {
    const result = await communitiesCommand.execute(
      [],
      testContext(vaultPath, singleLinkVault(), {
        analysisOptions: SINGLE_LINK_OPTIONS,
        display: { limit: 1 },
      })
    );

    expect(lines(result).slice(6, 10)).toEqual([
      "    tags: ml(2), ...",
      "    top notes (by authority):",
      "      1) b.md auth=1.0000 hub=0.0000 in=1 out=0 tags:ml,cooking",
      "      ... (1 more)",
    ]);
  });

  it("should separate communities and note hidden ones", async () => {
    const result = await communitiesCommand.execute(
      [],
      testContext(vaultPath, mixedVault(), { display: { limit: 2 } })
    );
    const output = lines(result);

    expect(output[1]).toBe("Showing top 2 of 3 communities:");
    expect(output).toContain("----------------------------------------");
    expect(output.filter((line) => line.startsWith("  community "))).toEqual([
      "  community c1 (size 2)",
      "  community c2 (size 2)",
    ]);
  });

  it("should color community IDs when colors are on", async () => {
    const result = await communitiesCommand.execute(
      [],
      testContext(vaultPath, singleLinkVault(), {
        analysisOptions: SINGLE_LINK_OPTIONS,
        display: { color: true },
      })
    );

    expect(lines(result)[2]).toBe("  community \x1b[36mc1\x1b[0m (size 2)");
  });
});

describe("ClustersCommand", () => {
  it("should list mutual-link clusters only", async () => {
    const result = await clustersCommand.execute([], testContext(vaultPath, mixedVault()));

    expect(lines(result)).toEqual([
      `Mutual-link clusters for vault "test" (${vaultPath})`,
      "  size 2: c.md, d.md",
    ]);
  });

  it("should print none without clusters", async () => {
    const result = await clustersCommand.execute(
      [],
      testContext(vaultPath, [note("a.md", ["b.md"]), note("b.md")])
    );

    expect(lines(result)[1]).toBe("  (none)");
  });

  it("should answer to its alias", () => {
    expect(clustersCommand.canHandle("SCC")).toBe(true);
  });
});

describe("OrphansCommand", () => {
  it("should list notes without links", async () => {
    const result = await orphansCommand.execute([], testContext(vaultPath, mixedVault()));

    expect(lines(result)).toEqual([
      `Orphans (no inbound or outbound wikilinks) in "test" (${vaultPath}):`,
      "  e.md",
    ]);
  });

  it("should cut the list at the limit", async () => {
    const result = await orphansCommand.execute(
      [],
      testContext(vaultPath, [note("a.md"), note("b.md"), note("c.md")], { display: { limit: 2 } })
    );

    expect(lines(result).slice(1)).toEqual(["  a.md", "  b.md", "  ... (1 more)"]);
  });

  it("should print none when every note is linked", async () => {
    const result = await orphansCommand.execute(
      [],
      testContext(vaultPath, [note("a.md", ["b.md"]), note("b.md", ["a.md"])])
    );

    expect(lines(result)[1]).toBe("  (none)");
  });
});
