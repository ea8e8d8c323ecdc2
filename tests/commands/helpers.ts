/**
 * Command test fixtures
 */

import { createCommandContext } from "../../src/commands/context.js";
import { CommandFlags, parseArgs } from "../../src/commands/flags.js";
import type { CommandContext, DisplayOptions } from "../../src/commands/types.js";
import type { GraphAnalysisOptionsInput } from "../../src/utils/graph/options.js";
import type { NoteEntry } from "../../src/utils/graph/types.js";
import { NOW, daysAgo, note } from "../setup.js";

const VALUE_FLAGS = new Set([
  "files",
  "neighbor-limit",
  "backlinks-limit",
  "max-communities",
  "community-top-notes",
  "community-top-tags",
]);

export interface TestContextOptions {
  analysisOptions?: GraphAnalysisOptionsInput;
  display?: Partial<DisplayOptions>;
  argv?: string[];
}

export function testContext(
  vaultPath: string,
  entries: NoteEntry[],
  options: TestContextOptions = {}
): CommandContext {
  return createCommandContext({
    vault: { name: "test", path: vaultPath },
    analysisOptions: options.analysisOptions ?? { minDegree: 0, recencyCascade: "off" },
    display: { color: false, ...options.display },
    flags: CommandFlags.fromParsed(parseArgs(options.argv ?? [], VALUE_FLAGS)),
    source: async () => entries,
    now: NOW,
  });
}

/**
 * a -> b with tags; e is isolated, archive/x.md links to a
 */
export const singleLinkVault = (): NoteEntry[] => [
  note("a.md", ["b.md", { target: "b.md", kind: "embed" }], {
    tags: ["ML"],
    modified: daysAgo(3),
    frontmatter: { status: "draft" },
  }),
  note("b.md", [], { tags: ["ml", "cooking"] }),
  note("archive/x.md", [{ target: "a.md", kind: "heading", anchor: "Top" }]),
  note("e.md"),
];

/** min degree 1 prunes e, the pattern drops archive/ */
export const SINGLE_LINK_OPTIONS: GraphAnalysisOptionsInput = {
  minDegree: 1,
  excludePatterns: ["archive/"],
  recencyCascade: "off",
};

/**
 * a -> b, c <-> d, e isolated
 */
export const mixedVault = (): NoteEntry[] => [
  note("a.md", ["b.md"]),
  note("b.md"),
  note("c.md", ["d.md"]),
  note("d.md", ["c.md"]),
  note("e.md"),
];
