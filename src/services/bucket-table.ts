import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Bucket, BucketTable, KeywordPattern, RiskLevel } from "../types";
import { normalize } from "./obfuscation-normalizer";
import { tokenize } from "./tokenizer";

export const DEFAULT_BUCKETS_PATH = fileURLToPath(new URL("../../config/buckets.json", import.meta.url));

export class BucketConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "BucketConfigError";
  }
}

const GapSchema = z.number().int().nonnegative();

const PatternSchema = z.union([
  z.string(),
  z.object({
    phrase: z.string(),
    maxGap: GapSchema.optional(),
  }),
]);

const BucketSchema = z.object({
  name: z.string().trim().min(1),
  risk: z.enum(["low", "medium", "high", "critical"]),
  weight: z.number().finite().nonnegative(),
  hard: z.boolean().optional(),
  maxGap: GapSchema.optional(),
  keywords: z.array(PatternSchema).min(1),
});

export const BucketTableSchema = z.object({
  buckets: z.array(BucketSchema).min(1),
});

export type BucketTableInput = z.input<typeof BucketTableSchema>;

const HARD_RISKS = new Set<RiskLevel>(["high", "critical"]);

function defaultGap(wordCount: number): number {
  if (wordCount >= 3) {
    return 2;
  }

  return wordCount === 2 ? 1 : 0;
}

function formatIssuePath(path: Array<string | number>): string {
  return path.length > 0 ? path.join(".") : "(root)";
}

/**
 * Validates a raw table document and compiles every keyword phrase through
 * the same normalizer and tokenizer the classifier runs on prompts, so
 * "role-play" in the table lines up with "role play" in the input.
 */
export function buildBucketTable(input: unknown): BucketTable {
  const parsed = BucketTableSchema.safeParse(input);
  if (!parsed.success) {
    throw new BucketConfigError(
      "Invalid bucket table",
      parsed.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`),
    );
  }

  const issues: string[] = [];
  const seenNames = new Set<string>();
  const buckets: Bucket[] = [];

  for (const [bucketIndex, raw] of parsed.data.buckets.entries()) {
    if (seenNames.has(raw.name)) {
      issues.push(`buckets.${bucketIndex}.name: duplicate bucket name '${raw.name}'`);
      continue;
    }
    seenNames.add(raw.name);

    const patterns: KeywordPattern[] = [];
    const seenPhrases = new Set<string>();

    for (const [keywordIndex, keyword] of raw.keywords.entries()) {
      const phrase = typeof keyword === "string" ? keyword : keyword.phrase;
      const words = tokenize(normalize(phrase));
      const location = `buckets.${bucketIndex}.keywords.${keywordIndex}`;

      if (words.length === 0) {
        issues.push(`${location}: keyword '${phrase}' has no matchable words`);
        continue;
      }

      const key = words.join(" ");
      if (seenPhrases.has(key)) {
        issues.push(`${location}: keyword '${phrase}' repeats '${key}' in bucket '${raw.name}'`);
        continue;
      }
      seenPhrases.add(key);

      const patternGap = typeof keyword === "string" ? undefined : keyword.maxGap;
      patterns.push(
        Object.freeze({
          phrase,
          words: Object.freeze(words),
          maxGap: patternGap ?? raw.maxGap ?? defaultGap(words.length),
        }),
      );
    }

    buckets.push(
      Object.freeze({
        name: raw.name,
        risk: raw.risk,
        weight: raw.weight,
        hard: raw.hard ?? HARD_RISKS.has(raw.risk),
        patterns: Object.freeze(patterns),
      }),
    );
  }

  if (issues.length > 0) {
    throw new BucketConfigError("Invalid bucket table", issues);
  }

  return Object.freeze(buckets);
}

export function loadBucketTable(path: string = DEFAULT_BUCKETS_PATH): BucketTable {
  let contents: string;
  try {
    contents = readFileSync(path, "utf8");
  } catch (error) {
    throw new BucketConfigError(`Cannot read bucket table at ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let document: unknown;
  try {
    document = JSON.parse(contents);
  } catch (error) {
    throw new BucketConfigError(`Bucket table at ${path} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return buildBucketTable(document);
}
