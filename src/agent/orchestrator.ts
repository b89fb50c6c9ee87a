/**
 * Agent orchestrator
 *
 * Owns the wire protocol around one completion call: message layout,
 * tool-call extraction, and turning provider failures into an apology the
 * user can read. It never throws for a provider failure.
 */

import type {CoreMessage, CoreTool, LanguageModel} from 'ai'
import {keepNewest, type HistoryMessage} from '../conversation'
import {Provider} from '../provider'
import type {ProviderError} from '../provider/errors'
import type {ToolCallRequest, ToolOutcome} from '../tool'
import {Log} from '../util/log'
import {SYSTEM_PROMPT} from './system-prompt'

const log = Log.create({service: 'orchestrator'})

/** One model tool round: the calls it asked for and what each returned */
export interface ToolExchange {
  role: 'tool'
  toolCalls: ToolCallRequest[]
  results: ToolOutcome[]
}

export type AgentMessage = HistoryMessage | ToolExchange

export interface AgentResult {
  response: string
  finishReason: Provider.FinishReason
  toolCalls?: ToolCallRequest[]
  error?: ProviderError
}

export interface ProcessMessageInput {
  userId: string
  /** Omitted for the follow-up pass that only reads tool results */
  message?: string
  history: AgentMessage[]
  /**
   * Entries of the current turn (the user message and its tool exchange),
   * sent after `history` and never truncated
   */
  current?: AgentMessage[]
  tools?: Record<string, CoreTool>
}

export interface Orchestrator {
  formatMessages(history: AgentMessage[], newMessage?: string): CoreMessage[]
  truncateHistory(messages: AgentMessage[], maxTokens: number): AgentMessage[]
  processMessage(input: ProcessMessageInput): Promise<AgentResult>
}

export interface OrchestratorOptions {
  engine: Provider.CompletionEngine
  model: LanguageModel
  temperature?: number
  systemPrompt?: string
  /** Character safety net applied to history: maxHistoryTokens * 4 chars */
  maxHistoryTokens?: number
}

function parseArgs(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch {
    return {}
  }
}

function serializeOutcome(outcome: ToolOutcome | undefined): string {
  if (!outcome) return JSON.stringify({error: 'No result'})
  return 'result' in outcome ? JSON.stringify(outcome.result) : JSON.stringify({error: outcome.error})
}

/** A tool exchange becomes an assistant turn of calls and a tool turn of results */
function expandExchange(exchange: ToolExchange): CoreMessage[] {
  return [
    {
      role: 'assistant',
      content: exchange.toolCalls.map((call) => ({
        type: 'tool-call' as const,
        toolCallId: call.id,
        toolName: call.name,
        args: parseArgs(call.arguments),
      })),
    },
    {
      role: 'tool',
      content: exchange.toolCalls.map((call) => ({
        type: 'tool-result' as const,
        toolCallId: call.id,
        toolName: call.name,
        result: serializeOutcome(exchange.results.find((r) => r.toolCallId === call.id)),
      })),
    },
  ]
}

function sizeOf(message: AgentMessage): number {
  if (message.role === 'tool') return message.results.map(serializeOutcome).join('').length
  return message.content.length
}

export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const {engine, model} = options
  const temperature = options.temperature ?? 0.7
  const systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT
  const maxHistoryTokens = options.maxHistoryTokens ?? 4000

  const orchestrator: Orchestrator = {
    formatMessages(history, newMessage) {
      const messages: CoreMessage[] = [{role: 'system', content: systemPrompt}]

      for (const entry of history) {
        if (entry.role === 'tool') messages.push(...expandExchange(entry))
        else messages.push({role: entry.role, content: entry.content})
      }

      // Providers reject an empty user turn
      if (newMessage) messages.push({role: 'user', content: newMessage})
      return messages
    },

    truncateHistory(messages, maxTokens) {
      const budget = maxTokens * 4
      const sizes = messages.map(sizeOf)
      const total = sizes.reduce((sum, n) => sum + n, 0)
      if (total <= budget) return messages

      const kept = keepNewest(messages, budget, sizes)
      // The request must open on a user turn
      const start = kept.findIndex((m) => m.role === 'user')
      const trimmed = start === -1 ? [] : kept.slice(start)
      log.warn('truncated history', {from: messages.length, to: trimmed.length})
      return trimmed
    },

    async processMessage({userId, message, history, current = [], tools}) {
      const trimmed = orchestrator.truncateHistory(history, maxHistoryTokens)
      const messages = orchestrator.formatMessages([...trimmed, ...current], message)
      const hasTools = tools !== undefined && Object.keys(tools).length > 0

      log.info('processing message', {userId, messages: messages.length, tools: hasTools})

      try {
        const completion = await engine.complete({
          model,
          messages,
          temperature,
          tools: hasTools ? tools : undefined,
        })

        log.info('completion finished', {finishReason: completion.finishReason})

        if (completion.finishReason === 'tool_calls' && completion.toolCalls.length > 0) {
          return {response: completion.text, finishReason: 'tool_calls', toolCalls: completion.toolCalls}
        }
        return {response: completion.text, finishReason: completion.finishReason}
      } catch (error) {
        const classified = Provider.classify(error)
        return {response: classified.userMessage, finishReason: 'error', error: classified}
      }
    },
  }

  return orchestrator
}
