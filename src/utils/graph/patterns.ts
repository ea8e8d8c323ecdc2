/**
 * Note-selection patterns
 *
 * Case-insensitive matching shared by --include, --exclude and graphIgnore:
 *
 * - `dir/words`  first path segment must be `dir` (one character = prefix),
 *                then `words` must appear in the rest of the path
 * - `name.md`    dotted patterns are matched against each path segment
 * - `words`      every word must appear, in order, at a word boundary
 * - `*` and `?`  shell-style wildcards in any part
 */

const DELIMITERS = new Set(["/", "-", "_", " ", ".", ",", "(", ")"]);

function containsWildcards(pattern: string): boolean {
  return pattern.includes("*") || pattern.includes("?");
}

function wildcardToRegExp(pattern: string, anchored: boolean): RegExp {
  let source = "";
  for (const ch of pattern) {
    if (ch === "*") {
      source += ".*";
    } else if (ch === "?") {
      source += ".";
    } else {
      source += ch.replace(/[.+()|[\]{}^$\\]/g, "\\$&");
    }
  }
  return new RegExp(anchored ? `^${source}$` : source);
}

/**
 * Split on whitespace, hyphens, underscores and dots
 */
export function splitWords(text: string): string[] {
  return text.split(/[\s\-_.]+/).filter((word) => word.length > 0);
}

function isWordBoundary(text: string, index: number): boolean {
  if (index === 0) return true;
  if (index >= text.length) return false;
  return DELIMITERS.has(text[index - 1]);
}

/**
 * Every word must occur in order, each starting on a word boundary
 */
function matchesWordsInOrder(words: string[], text: string): boolean {
  let rest = text;
  for (const word of words) {
    let found = false;
    while (!found) {
      const index = rest.indexOf(word);
      if (index === -1) {
        return false;
      }
      if (isWordBoundary(rest, index)) {
        rest = rest.slice(index + word.length);
        found = true;
      } else {
        rest = rest.slice(index + 1);
      }
    }
  }
  return true;
}

function matchesDirectory(dirPattern: string, path: string): boolean {
  const firstSegment = path.split("/")[0];

  if (containsWildcards(dirPattern)) {
    return wildcardToRegExp(dirPattern, true).test(firstSegment);
  }
  if (dirPattern.length === 1) {
    return firstSegment.startsWith(dirPattern);
  }
  return firstSegment === dirPattern;
}

function matchesContent(contentPattern: string, content: string): boolean {
  if (containsWildcards(contentPattern)) {
    return wildcardToRegExp(contentPattern, true).test(content);
  }
  return matchesWordsInOrder(splitWords(contentPattern), content);
}

function matchesContentOnly(pattern: string, path: string): boolean {
  if (containsWildcards(pattern)) {
    return wildcardToRegExp(pattern, false).test(path);
  }
  return matchesWordsInOrder(splitWords(pattern), path);
}

/**
 * Test one pattern against a vault-relative path
 *
 * @example
 * matchesPattern("projects/alpha", "Projects/alpha-plan.md"); // true
 * matchesPattern("p/plan", "projects/alpha-plan.md");         // true
 * matchesPattern("plan.md", "projects/alpha-plan.md");        // true
 * matchesPattern("a/b/c", "a/b/c.md");                        // false
 */
export function matchesPattern(pattern: string, path: string): boolean {
  if (pattern === "" || path === "") {
    return false;
  }

  const slashCount = pattern.split("/").length - 1;
  if (slashCount > 1) {
    return false;
  }

  const patternLower = pattern.toLowerCase();
  const pathLower = path.toLowerCase();

  if (slashCount === 1) {
    const slash = patternLower.indexOf("/");
    const dirPattern = patternLower.slice(0, slash);
    const contentPattern = patternLower.slice(slash + 1);

    if (!matchesDirectory(dirPattern, pathLower)) {
      return false;
    }
    if (contentPattern === "") {
      return true;
    }

    const pathSlash = pathLower.indexOf("/");
    if (pathSlash === -1) {
      return false;
    }
    return matchesContent(contentPattern, pathLower.slice(pathSlash + 1));
  }

  if (patternLower.includes(".")) {
    return pathLower.split("/").some((segment) => matchesContentOnly(patternLower, segment));
  }
  return matchesContentOnly(patternLower, pathLower);
}

export function matchesAnyPattern(patterns: readonly string[], path: string): boolean {
  return patterns.some((pattern) => matchesPattern(pattern, path));
}

/**
 * Include/exclude decision for one path.
 * Excludes win; with no include patterns everything not excluded is kept.
 */
export function isPathSelected(
  path: string,
  includePatterns: readonly string[],
  excludePatterns: readonly string[]
): boolean {
  if (matchesAnyPattern(excludePatterns, path)) {
    return false;
  }
  if (includePatterns.length > 0 && !matchesAnyPattern(includePatterns, path)) {
    return false;
  }
  return true;
}
