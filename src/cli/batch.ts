/**
 * Batch mode: run one chat turn and print the reply.
 */

import type {TurnError, TurnResponse} from '../agent'
import type {ToolOutcome} from '../tool'
import {Result} from '../util/result'
import type {App} from './app'
import type {OutputFormat} from './output'

export interface BatchOptions {
  prompt: string
  userId: string
  conversationId?: number
  format: OutputFormat
}

function describeOutcome(outcome: ToolOutcome): string {
  if ('error' in outcome) return `${outcome.tool}: ${outcome.error}`
  const {result} = outcome
  return `${outcome.tool}: ${result.success ? 'ok' : `${result.error} (${result.message})`}`
}

/**
 * Render a turn. Text mode prints the reply, then one bracketed line per
 * tool that ran.
 */
export function renderTurn(response: TurnResponse, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(
      {
        conversation_id: response.conversationId,
        response: response.response,
        tool_calls: response.toolCalls ?? [],
        created_at: response.createdAt,
      },
      null,
      2,
    )
  }

  const lines = [response.response]
  for (const outcome of response.toolCalls ?? []) {
    lines.push(`[${describeOutcome(outcome)}]`)
  }
  lines.push('', `(conversation ${response.conversationId})`)
  return lines.join('\n')
}

export async function runBatch(app: App, options: BatchOptions): Promise<Result<string, TurnError>> {
  const result = await app.turns.handleTurn({
    userId: options.userId,
    message: options.prompt,
    conversationId: options.conversationId,
  })
  return Result.map(result, (response) => renderTurn(response, options.format))
}
