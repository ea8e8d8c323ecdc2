/**
 * Tests for wikilink parsing and note path resolution
 */

import { describe, it, expect } from "@jest/globals";
import {
  parseWikilinks,
  normalizeNotePath,
  NotePathIndex,
} from "../../../src/utils/graph/wikilinks.js";

describe("parseWikilinks", () => {
  it("should classify each link kind", () => {
    const links = parseWikilinks(
      "[[Note]] ![[image.png]] [[Note#Heading]] [[Note#^block1]] [[Note|Alias]] [[Note#Heading|Both]]"
    );

    expect(links.map((link) => link.kind)).toEqual([
      "basic",
      "embed",
      "heading",
      "block",
      "alias",
      "alias",
    ]);
    expect(links[2].section).toBe("Heading");
    expect(links[3].section).toBe("^block1");
    expect(links[4].alias).toBe("Alias");
    expect(links[1].embed).toBe(true);
  });

  it("should skip same-note anchors", () => {
    const links = parseWikilinks("Jump to [[#Summary]] or [[Other]]");

    expect(links).toHaveLength(1);
    expect(links[0].target).toBe("Other");
  });

  it("should trim targets and convert backslashes", () => {
    const [link] = parseWikilinks("[[  folder\\Note  ]]");

    expect(link.target).toBe("folder/Note");
  });

  it("should record absolute positions and line numbers", () => {
    const links = parseWikilinks("See [[A]]\nand ![[B]]");

    expect(links[0].position).toEqual({ start: 4, end: 9, line: 0 });
    expect(links[1].raw).toBe("![[B]]");
    expect(links[1].position).toEqual({ start: 14, end: 20, line: 1 });
  });

  it("should return nothing for plain text", () => {
    expect(parseWikilinks("no links here [not one]")).toEqual([]);
  });
});

describe("normalizeNotePath", () => {
  it("should use forward slashes and add the extension", () => {
    expect(normalizeNotePath("./Projects\\Alpha")).toBe("Projects/Alpha.md");
  });

  it("should collapse repeated slashes and strip leading ones", () => {
    expect(normalizeNotePath("/a//b.md")).toBe("a/b.md");
  });

  it("should keep an empty path empty", () => {
    expect(normalizeNotePath("  ")).toBe("");
  });
});

describe("NotePathIndex", () => {
  const index = new NotePathIndex([
    "Projects/Alpha.md",
    "Alpha.md",
    "deep/nested/Beta.md",
    "other/Beta.md",
  ]);

  it("should prefer a full path over a basename", () => {
    expect(index.resolve("Alpha")).toBe("Alpha.md");
    expect(index.resolve("Projects/Alpha")).toBe("Projects/Alpha.md");
  });

  it("should resolve basenames to the shortest path", () => {
    expect(index.resolve("Beta")).toBe("other/Beta.md");
  });

  it("should tolerate anchors and extensions", () => {
    expect(index.resolve("Beta#Intro")).toBe("other/Beta.md");
    expect(index.resolve("Beta.md")).toBe("other/Beta.md");
  });

  it("should fall back to the basename of an unknown folder path", () => {
    expect(index.resolve("missing/Beta")).toBe("other/Beta.md");
  });

  it("should return undefined for unknown notes", () => {
    expect(index.resolve("Gamma")).toBeUndefined();
  });

  it("should count full paths and basename keys", () => {
    expect(index.size).toBe(5);
  });
});
