/**
 * Provider failure classification.
 *
 * Every failure from a completion call maps to one of a fixed set of types,
 * each with an apology the user can be shown verbatim.
 */

import {AISDKError, APICallError, LoadAPIKeyError, RetryError} from 'ai'
import {Log} from '../util/log'

const log = Log.create({service: 'provider'})

export type ProviderErrorType =
  | 'RateLimitError'
  | 'AuthenticationError'
  | 'ConnectionError'
  | 'ServiceUnavailable'
  | 'APIError'
  | 'UnexpectedError'

export interface ProviderError {
  type: ProviderErrorType
  /** Internal description, for logs and diagnostics */
  message: string
  /** Safe to show the end user */
  userMessage: string
}

export const USER_MESSAGES: Record<ProviderErrorType, string> = {
  RateLimitError: "I'm experiencing high demand right now. Please try again in a moment.",
  AuthenticationError: "I'm temporarily unavailable due to a configuration issue. Please contact support.",
  ConnectionError: "I'm having trouble connecting to my AI services. Please try again in a moment.",
  ServiceUnavailable: "I'm temporarily unavailable. Please try again shortly.",
  APIError: 'I encountered an error processing your request. Please try again or rephrase your message.',
  UnexpectedError: 'I encountered an unexpected error. Please try again.',
}

function typeOf(error: unknown): ProviderErrorType {
  if (LoadAPIKeyError.isInstance(error)) return 'AuthenticationError'

  if (APICallError.isInstance(error)) {
    const status = error.statusCode
    if (status === undefined) return 'ConnectionError'
    if (status === 429) return 'RateLimitError'
    if (status === 401 || status === 403) return 'AuthenticationError'
    if (status === 503 || status === 529) return 'ServiceUnavailable'
    return 'APIError'
  }

  // fetch() rejects with a bare TypeError when the network is unreachable
  if (error instanceof TypeError && /fetch|network/i.test(error.message)) return 'ConnectionError'

  if (AISDKError.isInstance(error)) return 'APIError'
  return 'UnexpectedError'
}

/**
 * Classify a failed completion call. A RetryError is judged by the last
 * attempt's error.
 */
export function classifyError(error: unknown): ProviderError {
  const cause = RetryError.isInstance(error) ? error.lastError : error
  const type = typeOf(cause)
  const message = cause instanceof Error ? cause.message : String(cause)

  switch (type) {
    case 'AuthenticationError':
      log.error('model provider rejected credentials; check ANTHROPIC_API_KEY', {error: message})
      break
    case 'UnexpectedError':
      log.error('unexpected completion failure', {error: cause})
      break
    default:
      log.warn('completion failed', {type, error: message})
  }

  return {type, message, userMessage: USER_MESSAGES[type]}
}
