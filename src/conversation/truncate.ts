import type {TokenCounter} from '../tokens'
import {Log} from '../util/log'

const log = Log.create({service: 'conversation'})

export interface HistoryMessage {
  role: 'user' | 'assistant'
  content: string
}

/**
 * Longest tail of `items` whose summed size fits in `budget`.
 *
 * Walks newest to oldest and stops at the first item that would overflow,
 * even when an older one would still fit, so the result is always a
 * contiguous suffix in original order.
 */
export function keepNewest<T>(items: readonly T[], budget: number, sizes: readonly number[]): T[] {
  let used = 0
  let start = items.length
  while (start > 0 && used + sizes[start - 1] <= budget) {
    start--
    used += sizes[start]
  }
  return items.slice(start)
}

/**
 * Trim oldest-first history to a token budget. Input that already fits is
 * returned as is.
 */
export function truncateHistoryByTokens<T extends {content: string}>(
  messages: readonly T[],
  budget: number,
  count: TokenCounter,
): T[] {
  const estimates = messages.map((message) => count(message.content))
  const total = estimates.reduce((sum, n) => sum + n, 0)

  if (total <= budget) {
    log.info('history within token budget', {tokens: total, budget})
    return [...messages]
  }

  log.warn('history exceeds token budget, truncating', {tokens: total, budget})
  const kept = keepNewest(messages, budget, estimates)
  log.info('history truncated', {kept: kept.length, dropped: messages.length - kept.length})
  return kept
}
