import { loadConfig } from "./config";
import { loadBucketTable } from "./services/bucket-table";
import { PromptFilter, createPromptFilter } from "./services/prompt-filter";
import type { Action } from "./types";

export { loadConfig, profilePolicy, type AppConfig, type ProfileName } from "./config";
export { createLoggers, type Loggers } from "./logger";
export { normalize, normalizeForMatching, type NormalizationResult } from "./services/obfuscation-normalizer";
export { tokenize } from "./services/tokenizer";
export { findPattern, match } from "./services/bucket-matcher";
export { decide, scoreMatches } from "./services/policy";
export {
  BucketConfigError,
  BucketTableSchema,
  DEFAULT_BUCKETS_PATH,
  buildBucketTable,
  loadBucketTable,
  type BucketTableInput,
} from "./services/bucket-table";
export { PromptFilter, createPromptFilter, type PromptFilterOptions } from "./services/prompt-filter";
export type * from "./types";

let defaultFilter: PromptFilter | null = null;

export function getDefaultFilter(): PromptFilter {
  if (!defaultFilter) {
    const config = loadConfig();
    defaultFilter = createPromptFilter({
      table: loadBucketTable(config.bucketsPath ?? undefined),
      policy: config.policy,
    });
  }

  return defaultFilter;
}

export function classify(text: string): { action: Action; buckets_hit: Record<string, number> } {
  const decision = getDefaultFilter().classify(text);
  return { action: decision.action, buckets_hit: decision.buckets_hit };
}
