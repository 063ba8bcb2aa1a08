import type pino from "pino";
import type { BucketTable, Decision, DecisionPolicy } from "../types";
import { match } from "./bucket-matcher";
import { normalizeForMatching } from "./obfuscation-normalizer";
import { decide } from "./policy";
import { tokenize } from "./tokenizer";

export interface PromptFilterOptions {
  table: BucketTable;
  policy: DecisionPolicy;
  logger?: pino.Logger;
}

export class PromptFilter {
  private readonly policy: DecisionPolicy;

  constructor(
    private readonly table: BucketTable,
    policy: DecisionPolicy,
    private readonly logger: pino.Logger | null = null,
  ) {
    this.policy = Object.freeze({ ...policy });
  }

  classify(text: string): Decision {
    const normalized = normalizeForMatching(text);
    const tokens = tokenize(normalized.normalizedText);
    const decision = decide(match(tokens, this.table), this.policy);

    if (this.logger) {
      const entry = {
        action: decision.action,
        score: decision.score,
        bucketsHit: decision.buckets_hit,
        reason: decision.reason,
        promptLength: text.length,
        tokenCount: tokens.length,
        transformations: normalized.transformations,
        signals: normalized.signalFlags,
      };

      if (decision.action === "ALLOW") {
        this.logger.debug(entry, "prompt allowed");
      } else {
        this.logger.warn(entry, `prompt ${decision.action === "BLOCK" ? "blocked" : "restricted"}`);
      }
    }

    return decision;
  }
}

export function createPromptFilter(options: PromptFilterOptions): PromptFilter {
  return new PromptFilter(options.table, options.policy, options.logger ?? null);
}
