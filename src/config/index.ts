/**
 * Configuration for taskchat
 *
 * Environment-based with defaults. Only ANTHROPIC_API_KEY is required, and
 * only once a real model is built (see Provider.getModel).
 */

import {z} from 'zod'
import {Log} from '../util/log'

export namespace Config {
  const int = (min: number, max?: number) => {
    const base = z.coerce.number().int().min(min)
    return max === undefined ? base : base.max(max)
  }

  export const Schema = z.object({
    /** Anthropic model id for both completion passes */
    model: z.string().min(1).default('claude-sonnet-4-5-20250929'),
    temperature: z.coerce.number().min(0).max(2).default(0.7),
    maxOutputTokens: int(1).default(1024),
    /** Retries are handled by the ai SDK client; exhausted retries degrade the turn */
    maxRetries: int(0, 10).default(2),
    db: z.string().min(1).default('./taskchat.db'),
    /** Authenticated user for CLI and MCP entry points */
    userId: z.string().min(1).default('local'),
    history: z.object({
      /** Most recent messages fetched before token accounting */
      maxMessages: int(1, 500).default(20),
      /** Token budget for history included in a completion request */
      maxContextTokens: int(1).default(4000),
    }),
    rateLimit: z.object({
      perMinute: int(1).default(20),
      perHour: int(1).default(100),
    }),
    logLevel: Log.Level.default('WARN'),
  })

  export type Config = z.infer<typeof Schema>

  let cached: Config | null = null

  /**
   * Get the current configuration, parsed once from the environment.
   */
  export function get(env: NodeJS.ProcessEnv = process.env): Config {
    if (cached) return cached

    cached = Schema.parse({
      model: env.TASKCHAT_MODEL,
      temperature: env.TASKCHAT_TEMPERATURE,
      maxOutputTokens: env.TASKCHAT_MAX_TOKENS,
      maxRetries: env.TASKCHAT_MAX_RETRIES,
      db: env.TASKCHAT_DB,
      userId: env.TASKCHAT_USER,
      history: {
        maxMessages: env.TASKCHAT_HISTORY_MESSAGES,
        maxContextTokens: env.TASKCHAT_CONTEXT_TOKENS,
      },
      rateLimit: {
        perMinute: env.TASKCHAT_RATE_PER_MINUTE,
        perHour: env.TASKCHAT_RATE_PER_HOUR,
      },
      logLevel: env.TASKCHAT_LOG_LEVEL?.toUpperCase(),
    })

    return cached
  }

  /**
   * Reset cached config (for testing).
   */
  export function reset(): void {
    cached = null
  }
}
