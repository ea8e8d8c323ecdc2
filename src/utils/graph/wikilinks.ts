/**
 * Wikilink parser
 * Extracts wikilinks and embeds from markdown and resolves them to note paths
 */

import path from "node:path";
import type { LinkKind, ParsedWikilink } from "./types.js";

/**
 * Wikilink pattern
 * Format: ![[target#section|alias]]
 * - !: optional, marks an embed
 * - target: note name or vault-relative path
 * - #section: optional heading or ^block anchor
 * - |alias: optional display text
 */
const WIKILINK_REGEX = /(!?)\[\[([^\]|#]*)(?:#([^\]|]*))?(?:\|([^\]]*))?\]\]/g;

function classifyLink(embed: boolean, section?: string, alias?: string): LinkKind {
  if (embed) return "embed";
  if (alias !== undefined) return "alias";
  if (section !== undefined && section.startsWith("^")) return "block";
  if (section !== undefined) return "heading";
  return "basic";
}

/**
 * Parse every wikilink in the content, with positions.
 * Same-note anchors such as [[#Heading]] are skipped.
 */
export function parseWikilinks(content: string): ParsedWikilink[] {
  const results: ParsedWikilink[] = [];
  const lines = content.split("\n");

  let currentIndex = 0;
  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    const line = lines[lineNum];
    const lineRegex = new RegExp(WIKILINK_REGEX.source, "g");

    let match: RegExpExecArray | null;
    while ((match = lineRegex.exec(line)) !== null) {
      const [raw, bang, rawTarget] = match;
      // Optional groups are undefined when they did not participate
      const rawSection: string | undefined = match[3];
      const rawAlias: string | undefined = match[4];
      const target = rawTarget.trim().replace(/\\/g, "/");
      if (target === "") {
        continue;
      }

      const embed = bang === "!";
      const section = rawSection?.trim();
      const alias = rawAlias?.trim();
      const absoluteStart = currentIndex + match.index;

      results.push({
        raw,
        target,
        section,
        alias,
        embed,
        kind: classifyLink(embed, section, alias),
        position: {
          start: absoluteStart,
          end: absoluteStart + raw.length,
          line: lineNum,
        },
      });
    }

    currentIndex += line.length + 1;
  }

  return results;
}

/**
 * Normalize a vault-relative note path: forward slashes, no leading "./" or "/",
 * ".md" suffix.
 *
 * @example
 * normalizeNotePath("./Projects\\Alpha"); // "Projects/Alpha.md"
 */
export function normalizeNotePath(notePath: string): string {
  let normalized = notePath.trim().replace(/\\/g, "/").replace(/\/{2,}/g, "/");
  while (normalized.startsWith("./")) {
    normalized = normalized.slice(2);
  }
  normalized = normalized.replace(/^\/+/, "");
  if (normalized === "") {
    return normalized;
  }
  return normalized.endsWith(".md") ? normalized : `${normalized}.md`;
}

function stripMdSuffix(notePath: string): string {
  return notePath.endsWith(".md") ? notePath.slice(0, -3) : notePath;
}

/**
 * Lookup table from link text to note path.
 * Full paths win over basenames; among equal basenames the shortest path wins.
 */
export class NotePathIndex {
  private readonly byKey = new Map<string, string>();

  constructor(notePaths: Iterable<string>) {
    const fullKeys = new Set<string>();
    const sorted = [...notePaths].map(normalizeNotePath).sort();

    for (const notePath of sorted) {
      const key = stripMdSuffix(notePath);
      this.byKey.set(key, notePath);
      fullKeys.add(key);
    }

    for (const notePath of sorted) {
      const baseName = path.posix.basename(stripMdSuffix(notePath));
      if (fullKeys.has(baseName)) {
        continue;
      }
      const existing = this.byKey.get(baseName);
      if (existing === undefined || notePath.length < existing.length) {
        this.byKey.set(baseName, notePath);
      }
    }
  }

  /**
   * Resolve a link target (anchor and extension tolerated)
   *
   * @returns the note path, or undefined when the note does not exist
   */
  resolve(link: string): string | undefined {
    let target = link;
    const hash = target.indexOf("#");
    if (hash >= 0) {
      target = target.slice(0, hash);
    }
    target = target.trim().replace(/\\/g, "/");
    target = stripMdSuffix(target);

    const exact = this.byKey.get(target);
    if (exact !== undefined) {
      return exact;
    }

    if (target.includes("/")) {
      return this.byKey.get(path.posix.basename(target));
    }
    return undefined;
  }

  get size(): number {
    return this.byKey.size;
  }
}
