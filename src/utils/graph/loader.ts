/**
 * Vault note loader
 * Reads every markdown note of a vault into NoteEntry snapshots
 */

import fs from "node:fs/promises";
import path from "node:path";
import { glob } from "glob";
import pLimit from "p-limit";
import { parseNote, parseNoteBody, resolveContentDate } from "../frontmatter.js";
import type { ParsedNote } from "../frontmatter.js";
import { FileSystemError, ErrorCode } from "../errors.js";
import { getLogger } from "../logger.js";
import { NotePathIndex, normalizeNotePath, parseWikilinks } from "./wikilinks.js";
import type { NoteEntry, NoteLink } from "./types.js";

export interface LoadVaultOptions {
  /** Parallel file reads; defaults to VAULT_GRAPH_IO_CONCURRENCY or 16 */
  concurrency?: number;
  /** Reference time for rejecting far-future dates */
  now?: Date;
}

/**
 * Get IO concurrency from environment variable
 */
export function getIOConcurrency(): number {
  const parsed = parseInt(process.env.VAULT_GRAPH_IO_CONCURRENCY || "16", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 16;
}

function isErrno(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function assertVaultDirectory(vaultPath: string): Promise<void> {
  const stat = await fs.stat(vaultPath).catch((error: unknown) => {
    throw isErrno(error) ? FileSystemError.fromNodeError(error, vaultPath, "scan") : error;
  });
  if (!stat.isDirectory()) {
    throw new FileSystemError(
      ErrorCode.FS_DIRECTORY_NOT_FOUND,
      `Vault path is not a directory: ${vaultPath}`,
      { path: vaultPath, operation: "scan" }
    );
  }
}

/**
 * List vault-relative markdown paths, hidden files and folders excluded
 */
export async function collectMarkdownFiles(vaultPath: string): Promise<string[]> {
  const files = await glob("**/*.md", {
    cwd: vaultPath,
    nodir: true,
    dot: false,
    absolute: false,
    posix: true,
  });
  return files.map(normalizeNotePath).sort();
}

interface RawNote {
  relPath: string;
  content: string;
  mtime: Date;
}

/**
 * Load every note of a vault.
 *
 * Links are resolved against the full note list, unresolved targets and
 * self-links are dropped. Any read failure aborts the whole load.
 *
 * @throws {FileSystemError} when the vault is missing or a note cannot be read
 */
export async function loadVaultNotes(
  vaultPath: string,
  options: LoadVaultOptions = {}
): Promise<NoteEntry[]> {
  const logger = getLogger();
  const now = options.now ?? new Date();

  await assertVaultDirectory(vaultPath);
  const files = await collectMarkdownFiles(vaultPath);
  logger.debug(`[loader] Found ${files.length} markdown files`, { vaultPath });

  const limit = pLimit(options.concurrency ?? getIOConcurrency());
  const rawNotes = await Promise.all(
    files.map((relPath) =>
      limit(async (): Promise<RawNote> => {
        const absolute = path.join(vaultPath, relPath);
        try {
          const [content, stat] = await Promise.all([
            fs.readFile(absolute, "utf-8"),
            fs.stat(absolute),
          ]);
          return { relPath, content, mtime: stat.mtime };
        } catch (error) {
          if (isErrno(error)) {
            throw FileSystemError.fromNodeError(error, absolute, "read");
          }
          throw error;
        }
      })
    )
  );

  const index = new NotePathIndex(files);

  return rawNotes.map(({ relPath, content, mtime }) => {
    let parsed: ParsedNote;
    try {
      parsed = parseNote(content);
    } catch (error) {
      logger.warn(`[loader] Unreadable frontmatter, indexing body only: ${relPath}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
      parsed = parseNoteBody(content);
    }
    const fileName = path.posix.basename(relPath, ".md");

    const links: NoteLink[] = [];
    for (const link of parseWikilinks(parsed.content)) {
      const target = index.resolve(link.target);
      if (target === undefined || target === relPath) {
        continue;
      }
      links.push(
        link.section !== undefined
          ? { target, kind: link.kind, anchor: link.section }
          : { target, kind: link.kind }
      );
    }

    return {
      path: relPath,
      title: parsed.title ?? fileName,
      tags: parsed.tags,
      links,
      modified: resolveContentDate(parsed.rawFrontmatter, fileName, now) ?? mtime,
      frontmatter: parsed.rawFrontmatter,
    };
  });
}
