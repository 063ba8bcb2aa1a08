import type { BucketMatch, BucketTable, KeywordPattern, MatchResult, TokenSpan } from "../types";

/**
 * Extends a match that starts at `start` through the remaining pattern words.
 * The frontier holds every position the previous word could have matched at,
 * so a later occurrence can still reach the next word when an earlier one
 * cannot. Returns the exclusive end of the shortest span, or null.
 */
function extendMatch(tokens: readonly string[], words: readonly string[], maxGap: number, start: number): number | null {
  let frontier = [start];

  for (let wordIndex = 1; wordIndex < words.length; wordIndex += 1) {
    const word = words[wordIndex];
    const first = frontier[0] ?? start;
    const last = frontier[frontier.length - 1] ?? start;
    const upper = Math.min(tokens.length - 1, last + 1 + maxGap);
    const next: number[] = [];
    let reach = 0;

    for (let position = first + 1; position <= upper; position += 1) {
      while (reach < frontier.length && (frontier[reach] ?? 0) + 1 + maxGap < position) {
        reach += 1;
      }

      const anchor = frontier[reach];
      if (anchor !== undefined && anchor < position && tokens[position] === word) {
        next.push(position);
      }
    }

    if (next.length === 0) {
      return null;
    }

    frontier = next;
  }

  return (frontier[0] ?? start) + 1;
}

export function findPattern(
  tokens: readonly string[],
  pattern: Pick<KeywordPattern, "words" | "maxGap">,
  from = 0,
): TokenSpan | null {
  const [head] = pattern.words;
  if (head === undefined) {
    return null;
  }

  for (let start = Math.max(0, from); start < tokens.length; start += 1) {
    if (tokens[start] !== head) {
      continue;
    }

    const end = extendMatch(tokens, pattern.words, pattern.maxGap, start);
    if (end !== null) {
      return { start, end };
    }
  }

  return null;
}

export function match(tokens: readonly string[], table: BucketTable): MatchResult {
  const result: MatchResult = [];

  for (const bucket of table) {
    const spans: TokenSpan[] = [];
    const patterns: string[] = [];
    let occurrences = 0;

    for (const pattern of bucket.patterns) {
      let cursor = 0;
      let matched = false;

      while (cursor < tokens.length) {
        const span = findPattern(tokens, pattern, cursor);
        if (!span) {
          break;
        }

        spans.push(span);
        occurrences += 1;
        matched = true;
        cursor = span.end;
      }

      if (matched) {
        patterns.push(pattern.phrase);
      }
    }

    if (patterns.length > 0) {
      const entry: BucketMatch = {
        bucket: bucket.name,
        risk: bucket.risk,
        weight: bucket.weight,
        hard: bucket.hard,
        hits: patterns.length,
        patterns,
        occurrences,
        spans: spans.sort((a, b) => a.start - b.start || a.end - b.end),
      };
      result.push(entry);
    }
  }

  return result;
}
