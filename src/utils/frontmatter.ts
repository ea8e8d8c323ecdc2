import matter from "gray-matter";

/**
 * Parsed note structure
 */
export interface ParsedNote {
  title?: string;
  /** Frontmatter tags followed by inline #tags, first spelling kept */
  tags: string[];
  /** Body without the frontmatter block */
  content: string;
  /** Raw frontmatter data */
  rawFrontmatter: Record<string, unknown>;
}

// Frontmatter keys checked for a content date, most specific first
const DATE_KEYS = ["updated", "modified", "date", "created"] as const;

const ISO_DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?/;
const FILENAME_DATE_REGEX = /(\d{4})-(\d{2})-(\d{2})/;
const INLINE_TAG_REGEX = /(?:^|[\s(,])#([\p{L}\p{N}_\-/]+)/gu;

const MIN_YEAR = 1900;
const MAX_FUTURE_MS = 365 * 24 * 60 * 60 * 1000;

/**
 * Parse a markdown note with frontmatter
 */
export function parseNote(raw: string): ParsedNote {
  const { data, content } = matter(raw);
  const frontmatter: Record<string, unknown> = { ...data };

  const title = typeof frontmatter.title === "string" ? frontmatter.title.trim() : undefined;
  const tags = mergeTags(normalizeFrontmatterTags(frontmatter.tags), extractInlineTags(content));

  return {
    title: title || undefined,
    tags,
    content,
    rawFrontmatter: frontmatter,
  };
}

/**
 * Fallback for a note whose frontmatter block does not parse:
 * the whole file is body, tags come from inline #tags only
 */
export function parseNoteBody(raw: string): ParsedNote {
  return {
    tags: mergeTags(extractInlineTags(raw)),
    content: raw,
    rawFrontmatter: {},
  };
}

/**
 * Frontmatter `tags` may be a list or a comma/space separated string
 */
export function normalizeFrontmatterTags(value: unknown): string[] {
  let candidates: unknown[] = [];
  if (Array.isArray(value)) {
    candidates = value;
  } else if (typeof value === "string") {
    candidates = value.split(/[,\s]+/);
  }

  const tags: string[] = [];
  for (const candidate of candidates) {
    if (typeof candidate !== "string" && typeof candidate !== "number") {
      continue;
    }
    const tag = String(candidate).trim().replace(/^#/, "");
    if (tag) {
      tags.push(tag);
    }
  }
  return tags;
}

/**
 * Inline #tags outside code. Markdown headings ("# Title") never match
 * because a tag needs a character right after the hash.
 */
export function extractInlineTags(body: string): string[] {
  const withoutCode = body.replace(/```[\s\S]*?```/g, "").replace(/`[^`\n]*`/g, "");
  const tags: string[] = [];
  for (const match of withoutCode.matchAll(INLINE_TAG_REGEX)) {
    const tag = match[1].replace(/\/+$/, "");
    // Pure numbers are issue references, not tags
    if (tag && !/^\d+$/.test(tag)) {
      tags.push(tag);
    }
  }
  return tags;
}

function mergeTags(...lists: string[][]): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const list of lists) {
    for (const tag of list) {
      const key = tag.toLowerCase();
      if (!seen.has(key)) {
        seen.add(key);
        merged.push(tag);
      }
    }
  }
  return merged;
}

function buildDate(match: RegExpMatchArray): Date | undefined {
  const [, year, month, day] = match;
  const hours: string | undefined = match[4];
  const minutes: string | undefined = match[5];
  const seconds: string | undefined = match[6];

  const date = new Date(
    Date.UTC(
      Number(year),
      Number(month) - 1,
      Number(day),
      Number(hours ?? 0),
      Number(minutes ?? 0),
      Number(seconds ?? 0)
    )
  );
  // Reject rollovers such as 2024-02-31
  if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
    return undefined;
  }
  return date;
}

function isPlausible(date: Date, now: Date): boolean {
  return (
    !Number.isNaN(date.getTime()) &&
    date.getUTCFullYear() >= MIN_YEAR &&
    date.getTime() - now.getTime() <= MAX_FUTURE_MS
  );
}

/**
 * Parse an ISO-like date value from frontmatter (string or YAML date)
 */
export function parseDateValue(value: unknown, now: Date = new Date()): Date | undefined {
  let date: Date | undefined;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === "string") {
    const match = value.trim().match(ISO_DATE_REGEX);
    date = match ? buildDate(match) : undefined;
  }
  return date && isPlausible(date, now) ? date : undefined;
}

/**
 * Content timestamp of a note: frontmatter date keys first, then a date in
 * the file name.
 */
export function resolveContentDate(
  frontmatter: Record<string, unknown>,
  fileName: string,
  now: Date = new Date()
): Date | undefined {
  for (const key of DATE_KEYS) {
    const date = parseDateValue(frontmatter[key], now);
    if (date) {
      return date;
    }
  }

  const match = fileName.match(FILENAME_DATE_REGEX);
  if (match) {
    const date = buildDate(match);
    if (date && isPlausible(date, now)) {
      return date;
    }
  }
  return undefined;
}
