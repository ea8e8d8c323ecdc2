/**
 * Tests for the graph builder
 */

import { describe, it, expect } from "@jest/globals";
import { buildGraph, countEdges, keepsLink } from "../../../src/utils/graph/builder.js";
import { resolveAnalysisOptions } from "../../../src/utils/graph/options.js";
import { note } from "../../setup.js";

describe("buildGraph", () => {
  it("should drop self-links, dangling links and duplicates, keeping first-seen order", () => {
    const { graph } = buildGraph(
      [note("a.md", ["c", "b", "b.md", "a", "missing"]), note("b.md"), note("c.md")],
      resolveAnalysisOptions({ minDegree: 0 })
    );

    expect(graph.paths).toEqual(["a.md", "b.md", "c.md"]);
    expect(graph.nodes.get("a.md")?.neighbors).toEqual(["c.md", "b.md"]);
    expect(graph.nodes.get("a.md")?.outbound).toBe(2);
    expect(graph.nodes.get("b.md")?.inbound).toBe(1);
    expect([...(graph.incoming.get("c.md") ?? [])]).toEqual(["a.md"]);
    expect(countEdges(graph)).toBe(2);
  });

  it("should normalize paths and ignore repeated entries", () => {
    const { graph } = buildGraph(
      [note("./notes\\a", ["notes/b"]), note("notes/a.md", ["elsewhere"]), note("notes/b.md")],
      resolveAnalysisOptions({ minDegree: 0 })
    );

    expect(graph.paths).toEqual(["notes/a.md", "notes/b.md"]);
    expect(graph.nodes.get("notes/a.md")?.neighbors).toEqual(["notes/b.md"]);
  });

  it("should record notes removed by patterns and drop links to them", () => {
    const { graph, excluded } = buildGraph(
      [note("a.md", ["archive/old"]), note("archive/old.md", ["a"]), note("b.md", ["a"])],
      resolveAnalysisOptions({ minDegree: 0, excludePatterns: ["archive/"] })
    );

    expect(graph.paths).toEqual(["a.md", "b.md"]);
    expect(graph.nodes.get("a.md")?.neighbors).toEqual([]);
    expect(excluded.byPattern).toEqual(["archive/old.md"]);
    expect(excluded.byMinDegree).toEqual([]);
  });

  it("should keep only matching notes when include patterns are given", () => {
    const { graph, excluded } = buildGraph(
      [note("projects/alpha.md"), note("journal/day.md"), note("projects/beta.md")],
      resolveAnalysisOptions({ minDegree: 0, includePatterns: ["projects/"] })
    );

    expect(graph.paths).toEqual(["projects/alpha.md", "projects/beta.md"]);
    expect(excluded.byPattern).toEqual(["journal/day.md"]);
  });

  it("should keep only reciprocated links in mutual-only mode", () => {
    const { graph } = buildGraph(
      [note("a.md", ["b", "c"]), note("b.md", ["a"]), note("c.md")],
      resolveAnalysisOptions({ minDegree: 0, mutualOnly: true })
    );

    expect(graph.nodes.get("a.md")?.neighbors).toEqual(["b.md"]);
    expect(graph.nodes.get("b.md")?.neighbors).toEqual(["a.md"]);
    expect(graph.nodes.get("c.md")?.inbound).toBe(0);
    expect(countEdges(graph)).toBe(2);
  });

  it("should prune low-degree notes in a single pass", () => {
    const { graph, excluded } = buildGraph(
      [note("hub.md", ["x", "y", "z"]), note("x.md"), note("y.md"), note("z.md")],
      resolveAnalysisOptions({ minDegree: 2 })
    );

    // The hub had degree 3 before pruning, so it survives with no edges left
    expect(graph.paths).toEqual(["hub.md"]);
    expect(graph.nodes.get("hub.md")?.neighbors).toEqual([]);
    expect(graph.nodes.get("hub.md")?.outbound).toBe(0);
    expect(excluded.byMinDegree).toEqual(["x.md", "y.md", "z.md"]);
  });

  it("should apply the link-type filters", () => {
    const entries = [
      note("a.md", [
        { target: "b.md", kind: "embed" },
        { target: "c.md", kind: "heading", anchor: "Intro" },
        { target: "d.md", kind: "alias" },
      ]),
      note("b.md"),
      note("c.md"),
      note("d.md"),
    ];

    const embedsSkipped = buildGraph(entries, resolveAnalysisOptions({ minDegree: 0, skipEmbeds: true }));
    expect(embedsSkipped.graph.nodes.get("a.md")?.neighbors).toEqual(["c.md", "d.md"]);

    const anchorsSkipped = buildGraph(entries, resolveAnalysisOptions({ minDegree: 0, skipAnchors: true }));
    expect(anchorsSkipped.graph.nodes.get("a.md")?.neighbors).toEqual(["b.md", "d.md"]);
  });

  it("should start every node unscored", () => {
    const { graph } = buildGraph([note("a.md", ["b"]), note("b.md")], resolveAnalysisOptions({ minDegree: 0 }));
    const node = graph.nodes.get("a.md");

    expect(node?.hub).toBe(0);
    expect(node?.authority).toBe(0);
    expect(node?.community).toBeNull();
    expect(node?.modified).toBeNull();
  });
});

describe("keepsLink", () => {
  it("should keep everything when no filter is set", () => {
    expect(keepsLink({ target: "a.md", kind: "embed" }, { skipAnchors: false, skipEmbeds: false })).toBe(true);
  });

  it("should drop block links when anchors are skipped", () => {
    expect(
      keepsLink({ target: "a.md", kind: "block", anchor: "^id" }, { skipAnchors: true, skipEmbeds: false })
    ).toBe(false);
  });
});
