/**
 * Backlink collection for note context reports
 */

import { keepsLink } from "./builder.js";
import { compareStrings } from "./components.js";
import { normalizeNotePath } from "./wikilinks.js";
import type { GraphAnalysisOptions } from "./options.js";
import type { LinkKind, NoteEntry } from "./types.js";

export interface Backlink {
  referrer: string;
  /** Kind of the first link from the referrer to the target */
  linkType: LinkKind;
}

/**
 * Collect the notes linking to each target.
 *
 * Every note of the vault counts as a referrer, whether or not the graph
 * filters kept it. A referrer appears once per target, with the kind of
 * its first matching link. Lists are sorted by referrer.
 */
export function collectBacklinks(
  entries: readonly NoteEntry[],
  targets: readonly string[],
  options: Pick<GraphAnalysisOptions, "skipAnchors" | "skipEmbeds">
): Map<string, Backlink[]> {
  const found = new Map<string, Map<string, LinkKind>>();
  for (const target of targets) {
    found.set(normalizeNotePath(target), new Map());
  }

  for (const entry of entries) {
    const referrer = normalizeNotePath(entry.path);
    for (const link of entry.links) {
      if (!keepsLink(link, options)) continue;
      const referrers = found.get(link.target);
      if (referrers && !referrers.has(referrer)) {
        referrers.set(referrer, link.kind);
      }
    }
  }

  const result = new Map<string, Backlink[]>();
  for (const [target, referrers] of found) {
    result.set(
      target,
      [...referrers]
        .map(([referrer, linkType]) => ({ referrer, linkType }))
        .sort((a, b) => compareStrings(a.referrer, b.referrer))
    );
  }
  return result;
}
