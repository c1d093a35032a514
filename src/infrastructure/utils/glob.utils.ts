/**
 * Shell-style exclude patterns.
 *
 * `*` matches any run of characters including `/`, so `*.tmp` excludes
 * `2024/scratch.tmp` as well as `scratch.tmp`. `?` matches exactly one
 * character; `[seq]` and `[!seq]` match one character of (or not of) seq.
 * Patterns are anchored against the whole relative key.
 */

import { ConfigurationError } from "../../core/domain/errors.js";

const REGEX_SPECIALS = ".+^${}()|\\/";

export function globToRegExp(pattern: string): RegExp {
  if (pattern.length === 0) {
    throw new ConfigurationError("Exclude pattern must not be empty.");
  }
  let result = "^";
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === "*") {
      // Collapse runs of `*`
      while (pattern[i + 1] === "*") i++;
      result += "[\\s\\S]*";
    } else if (ch === "?") {
      result += "[\\s\\S]";
    } else if (ch === "[") {
      let j = i + 1;
      let negate = false;
      if (pattern[j] === "!") {
        negate = true;
        j++;
      }
      const end = pattern.indexOf("]", j);
      if (end < 0 || end === j) {
        throw new ConfigurationError(
          `Invalid exclude pattern "${pattern}": unterminated character class.`,
        );
      }
      const chars = pattern.slice(j, end).replace(/[\\\]^]/g, "\\$&");
      result += negate ? `[^${chars}]` : `[${chars}]`;
      i = end;
    } else if (REGEX_SPECIALS.includes(ch)) {
      result += "\\" + ch;
    } else {
      result += ch;
    }
    i++;
  }
  result += "$";
  return new RegExp(result);
}

export function globMatch(pattern: string, key: string): boolean {
  return globToRegExp(pattern).test(key);
}
