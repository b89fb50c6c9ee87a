/**
 * Token estimation for history budgeting.
 *
 * Counts with the cl100k_base encoder when it loads; otherwise ~4 chars per
 * token. Either way the result is a non-negative integer and never throws.
 */

import {getEncoding, type Tiktoken} from 'js-tiktoken'
import {Log} from '../util/log'

const log = Log.create({service: 'tokens'})

export type TokenCounter = (text: string) => number

export namespace Tokens {
  let encoder: Tiktoken | null = null
  let unavailable = false

  function load(): Tiktoken | null {
    if (encoder || unavailable) return encoder
    try {
      encoder = getEncoding('cl100k_base')
    } catch (error) {
      unavailable = true
      log.warn('tokenizer unavailable, falling back to character estimate', {error})
    }
    return encoder
  }

  /** Rough estimate: one token per four characters. */
  export function approximate(text: string): number {
    return Math.floor(text.length / 4)
  }

  export function count(text: string): number {
    if (text.length === 0) return 0
    const enc = load()
    return enc ? enc.encode(text).length : approximate(text)
  }

  /**
   * Build a counter for injection. `exact: false` skips the encoder, which
   * keeps budgets predictable in tests.
   */
  export function create(options: {exact?: boolean} = {}): TokenCounter {
    return options.exact === false ? approximate : count
  }
}
