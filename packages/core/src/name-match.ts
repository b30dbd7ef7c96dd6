/**
 * Pattern navigation: a path segment is compiled as an anchored regular
 * expression and the first server-reported name it matches is accepted.
 * First match wins, not exact match: `cd adm.*` succeeds when `admin`
 * exists, and the session keeps the raw segment.
 *
 * Matching runs synchronously on the event loop, so a segment whose group
 * repeats an inner repetition (`(a+)+`, `(x*){2,}`) is rejected before it is
 * compiled. Overlapping alternatives under a quantifier (`(a|aa)+`) are not
 * detected.
 */

import { getErrorMessage, InvalidNamePatternError } from "@dbnav/errors";

const REPETITION = new Set(["*", "+", "{"]);

export function compileNamePattern(segment: string): RegExp {
  if (hasNestedRepetition(segment)) {
    throw new InvalidNamePatternError(segment, "nested quantifiers are not supported");
  }
  try {
    return new RegExp(`^${segment}$`);
  } catch (error) {
    throw new InvalidNamePatternError(
      segment,
      getErrorMessage(error),
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * @param segment - A raw path segment, or a pattern from {@link compileNamePattern}
 * @returns The first name, in the order given, matched by the segment's pattern.
 */
export function findMatchingName(
  names: readonly string[],
  segment: string | RegExp,
): string | undefined {
  const pattern = typeof segment === "string" ? compileNamePattern(segment) : segment;
  return names.find((name) => pattern.test(name));
}

/**
 * True when a group that contains `*`, `+` or `{` is itself followed by one
 * of them. Escapes and character classes are skipped.
 */
function hasNestedRepetition(source: string): boolean {
  const enclosing: boolean[] = [];
  let repeats = false;

  for (let i = 0; i < source.length; i++) {
    const char = source.charAt(i);
    if (char === "\\") {
      i++;
    } else if (char === "[") {
      i = skipClass(source, i);
    } else if (char === "(") {
      enclosing.push(repeats);
      repeats = false;
    } else if (char === ")") {
      const inner: boolean = repeats;
      if (inner && REPETITION.has(source.charAt(i + 1))) {
        return true;
      }
      repeats = (enclosing.pop() ?? false) || inner;
    } else if (REPETITION.has(char)) {
      repeats = true;
    }
  }
  return false;
}

/** Index of the `]` closing the class opened at `start`, or the last index. */
function skipClass(source: string, start: number): number {
  for (let i = start + 1; i < source.length; i++) {
    const char = source.charAt(i);
    if (char === "\\") {
      i++;
    } else if (char === "]") {
      return i;
    }
  }
  return source.length - 1;
}
