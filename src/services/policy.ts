import type { Decision, DecisionPolicy, MatchResult } from "../types";

export function scoreMatches(matches: MatchResult): number {
  return matches.reduce((total, entry) => total + entry.weight * entry.hits, 0);
}

export function decide(matches: MatchResult, policy: DecisionPolicy): Decision {
  const score = scoreMatches(matches);
  const bucketsHit = Object.fromEntries(matches.map((entry) => [entry.bucket, entry.hits]));
  const hardHit = matches.find((entry) => entry.hard);

  if (hardHit) {
    return {
      action: "BLOCK",
      score,
      reason: `Hard bucket '${hardHit.bucket}' matched (${hardHit.patterns.join(", ")})`,
      buckets_hit: bucketsHit,
      matches,
    };
  }

  if (score > 0 && score >= policy.blockThreshold) {
    return {
      action: "BLOCK",
      score,
      reason: `Score ${score} >= block threshold ${policy.blockThreshold}`,
      buckets_hit: bucketsHit,
      matches,
    };
  }

  if (score > 0 && score >= policy.restrictThreshold) {
    return {
      action: "RESTRICT",
      score,
      reason: `Score ${score} >= restrict threshold ${policy.restrictThreshold}`,
      buckets_hit: bucketsHit,
      matches,
    };
  }

  let reason = "No keyword buckets matched";
  if (score > 0) {
    reason = `Score ${score} below restrict threshold ${policy.restrictThreshold}`;
  } else if (matches.length > 0) {
    reason = "Matched buckets carry no weight";
  }

  return {
    action: "ALLOW",
    score,
    reason,
    buckets_hit: bucketsHit,
    matches,
  };
}
