import { z } from "zod"
import type { DecisionPolicy } from "./types"

export type ProfileName = "lenient" | "standard" | "strict"

export interface AppConfig {
  profile: ProfileName
  policy: DecisionPolicy
  bucketsPath: string | null
  logDir: string
  logLevel: string
}

const profiles: Record<ProfileName, DecisionPolicy> = {
  lenient: {
    restrictThreshold: 3,
    blockThreshold: 8,
  },
  standard: {
    restrictThreshold: 0,
    blockThreshold: 6,
  },
  strict: {
    restrictThreshold: 0,
    blockThreshold: 4,
  },
}

const EnvSchema = z.object({
  PROMPTSIEVE_PROFILE: z.enum(["lenient", "standard", "strict"]).default("standard"),
  PROMPTSIEVE_BLOCK_THRESHOLD: z.string().optional(),
  PROMPTSIEVE_RESTRICT_THRESHOLD: z.string().optional(),
  PROMPTSIEVE_BUCKETS_PATH: z.string().optional(),
  PROMPTSIEVE_LOG_DIR: z.string().default("./data/logs"),
  PROMPTSIEVE_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
})

function toThreshold(input: string | undefined, defaultValue: number, name: string): number {
  if (input === undefined || input.trim() === "") {
    return defaultValue
  }

  const parsed = Number(input.trim())
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative number, got '${input}'`)
  }

  return parsed
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.parse(env)
  const profilePolicy = profiles[parsed.PROMPTSIEVE_PROFILE]
  const policy: DecisionPolicy = {
    restrictThreshold: toThreshold(
      parsed.PROMPTSIEVE_RESTRICT_THRESHOLD,
      profilePolicy.restrictThreshold,
      "PROMPTSIEVE_RESTRICT_THRESHOLD",
    ),
    blockThreshold: toThreshold(
      parsed.PROMPTSIEVE_BLOCK_THRESHOLD,
      profilePolicy.blockThreshold,
      "PROMPTSIEVE_BLOCK_THRESHOLD",
    ),
  }

  if (policy.blockThreshold <= policy.restrictThreshold) {
    throw new Error(
      `Block threshold ${policy.blockThreshold} must be greater than restrict threshold ${policy.restrictThreshold}`,
    )
  }

  const bucketsPath = parsed.PROMPTSIEVE_BUCKETS_PATH?.trim()

  return {
    profile: parsed.PROMPTSIEVE_PROFILE,
    policy,
    bucketsPath: bucketsPath ? bucketsPath : null,
    logDir: parsed.PROMPTSIEVE_LOG_DIR,
    logLevel: parsed.PROMPTSIEVE_LOG_LEVEL,
  }
}

export function profilePolicy(profile: ProfileName): DecisionPolicy {
  return { ...profiles[profile] }
}
