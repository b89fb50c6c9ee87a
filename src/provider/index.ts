/**
 * AI Provider integration for taskchat
 *
 * Anthropic via @ai-sdk/anthropic. The rest of the system talks to a
 * CompletionEngine, so tests can script completions without a model.
 */

import {createAnthropic} from '@ai-sdk/anthropic'
import {generateText, type CoreMessage, type CoreTool, type LanguageModel} from 'ai'
import type {ToolCallRequest} from '../tool'
import {Log} from '../util/log'
import {classifyError, type ProviderError} from './errors'

export namespace Provider {
  const log = Log.create({service: 'provider'})

  export type Failure = ProviderError
  export const classify = classifyError

  /**
   * Get a language model for a given model ID. The API key is read from
   * ANTHROPIC_API_KEY on first use, so a missing key surfaces as an
   * AuthenticationError on the turn rather than at startup.
   */
  export function getModel(modelId: string): LanguageModel {
    const anthropic = createAnthropic()
    return anthropic(modelId)
  }

  /**
   * `tool_calls` when the model stopped to request tools; otherwise the
   * engine's own reason (`stop`, `length`, ...).
   */
  export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter' | 'error' | 'other' | 'unknown'

  export interface CompletionRequest {
    model: LanguageModel
    messages: CoreMessage[]
    temperature?: number
    /** Omitted entirely, never empty, when no tools apply */
    tools?: Record<string, CoreTool>
  }

  export interface Completion {
    text: string
    finishReason: FinishReason
    toolCalls: ToolCallRequest[]
  }

  export interface CompletionEngine {
    complete(request: CompletionRequest): Promise<Completion>
  }

  export interface EngineOptions {
    /** Retries inside the SDK client before the call fails */
    maxRetries?: number
    maxTokens?: number
  }

  const FINISH_REASONS: Record<string, FinishReason> = {
    stop: 'stop',
    length: 'length',
    'tool-calls': 'tool_calls',
    'content-filter': 'content_filter',
    error: 'error',
    other: 'other',
  }

  /**
   * Completion engine over `generateText`. Tools carry no `execute`, so the
   * SDK stops after one step and hands tool calls back for dispatch.
   */
  export function createEngine(options: EngineOptions = {}): CompletionEngine {
    return {
      async complete({model, messages, temperature, tools}) {
        log.debug('generate', {
          model: model.modelId,
          messageCount: messages.length,
          hasTools: tools !== undefined,
        })

        const result = await generateText({
          model,
          messages,
          tools,
          temperature,
          maxTokens: options.maxTokens,
          maxRetries: options.maxRetries,
        })

        const toolCalls = result.toolCalls.map(
          (call): ToolCallRequest => ({
            id: call.toolCallId,
            name: call.toolName,
            arguments: JSON.stringify(call.args ?? {}),
          }),
        )

        log.debug('generated', {
          finishReason: result.finishReason,
          toolCalls: toolCalls.length,
          inputTokens: result.usage.promptTokens,
          outputTokens: result.usage.completionTokens,
        })

        return {
          text: result.text,
          finishReason: FINISH_REASONS[result.finishReason] ?? 'unknown',
          toolCalls,
        }
      },
    }
  }
}
