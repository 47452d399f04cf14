import { Minimatch } from "minimatch";

/** Never copied, whatever the configured patterns say. */
const ALWAYS_EXCLUDE = [".git"];

export type ExcludeMatcher = (relativePath: string) => boolean;

/**
 * Builds a matcher over relative paths using `/` separators. A pattern matches
 * when it matches any single path component or the whole relative path.
 * A leading `!` or `#` is part of the name, not negation or a comment.
 */
export function createExcludeMatcher(patterns: readonly string[]): ExcludeMatcher {
  const compiled = patterns
    .filter(p => p.trim().length > 0)
    .map(p => new Minimatch(p.replace(/\/+$/, ""), { dot: true, nonegate: true, nocomment: true }));

  return (relativePath: string): boolean => {
    const parts = relativePath.split("/");
    if (parts.some(part => ALWAYS_EXCLUDE.includes(part))) {
      return true;
    }
    for (const matcher of compiled) {
      if (parts.some(part => matcher.match(part))) return true;
      if (matcher.match(relativePath)) return true;
    }
    return false;
  };
}
