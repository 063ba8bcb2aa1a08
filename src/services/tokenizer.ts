const MIN_MERGE_RUN = 2

function flushRun(run: string[], out: string[]): void {
  if (run.length >= MIN_MERGE_RUN) {
    out.push(run.join(""))
  } else {
    out.push(...run)
  }
  run.length = 0
}

/**
 * Splits normalized text into word tokens, then glues runs of single-letter
 * tokens back together so spaced-out words ("i g n o r e") become one token.
 */
export function tokenize(normalized: string): string[] {
  const raw = normalized.split(/\s+/).filter((token) => token.length > 0)
  const out: string[] = []
  const run: string[] = []

  for (const token of raw) {
    if (token.length === 1) {
      run.push(token)
      continue
    }

    flushRun(run, out)
    out.push(token)
  }

  flushRun(run, out)
  return out
}
