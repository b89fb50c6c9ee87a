/**
 * Turn controller
 *
 * One chat turn as an explicit state machine:
 *
 *   ResolveConversation → AssembleHistory → FirstCompletion
 *     → ReturnReply
 *     → ExecuteTools → (SecondCompletion →) ReturnReply
 *   → PersistMessages → Respond
 *
 * Inbound validation and ownership failures end the turn before any model
 * call. Provider failures do not: the orchestrator already turned them
 * into an apology, which is persisted and returned like any reply.
 */

import type {ConversationManager} from '../conversation'
import {MAX_MESSAGE_LENGTH} from '../conversation'
import type {ToolCallRequest, ToolOutcome, ToolRegistry} from '../tool'
import {Log} from '../util/log'
import {Result} from '../util/result'
import type {AgentMessage, Orchestrator, ToolExchange} from './orchestrator'

const log = Log.create({service: 'turn'})

export const FALLBACK_REPLY = "I've processed your request."

export type TurnErrorKind = 'ValidationError' | 'NotFound' | 'DatabaseError'

export interface TurnError {
  kind: TurnErrorKind
  message: string
}

export interface TurnRequest {
  userId: string
  message: string
  conversationId?: number
}

export interface TurnResponse {
  conversationId: number
  response: string
  /** Present only when at least one tool ran */
  toolCalls?: ToolOutcome[]
  createdAt: string
}

export interface TurnController {
  handleTurn(request: TurnRequest): Promise<Result<TurnResponse, TurnError>>
}

export interface TurnControllerOptions {
  conversations: ConversationManager
  orchestrator: Orchestrator
  tools: ToolRegistry
}

type State =
  | {step: 'ResolveConversation'}
  | {step: 'AssembleHistory'; conversationId: number}
  | {step: 'FirstCompletion'; conversationId: number; history: AgentMessage[]}
  | {step: 'ExecuteTools'; conversationId: number; history: AgentMessage[]; calls: ToolCallRequest[]; text: string}
  | {step: 'SecondCompletion'; conversationId: number; history: AgentMessage[]; exchange: ToolExchange}
  | {step: 'ReturnReply'; conversationId: number; reply: string; outcomes: ToolOutcome[]}
  | {step: 'PersistMessages'; conversationId: number; reply: string; outcomes: ToolOutcome[]}
  | {step: 'Respond'; conversationId: number; reply: string; outcomes: ToolOutcome[]}

function validate(message: string): TurnError | null {
  if (message.trim().length === 0) return {kind: 'ValidationError', message: 'Message cannot be empty'}
  if (message.length > MAX_MESSAGE_LENGTH) {
    return {kind: 'ValidationError', message: 'Message must be 10,000 characters or less'}
  }
  return null
}

export function createTurnController(options: TurnControllerOptions): TurnController {
  const {conversations, orchestrator, tools} = options

  return {
    async handleTurn({userId, message, conversationId}) {
      const invalid = validate(message)
      if (invalid) return Result.err(invalid)

      const turnLog = log.with({userId})
      let state: State = {step: 'ResolveConversation'}

      for (;;) {
        turnLog.debug('turn state', {step: state.step})

        switch (state.step) {
          case 'ResolveConversation': {
            if (conversationId === undefined) {
              const created = await conversations.createConversation(userId)
              if (!created.ok) return Result.err({kind: 'DatabaseError', message: created.error.message})
              turnLog.info('created conversation', {conversationId: created.value.id})
              state = {step: 'AssembleHistory', conversationId: created.value.id}
              break
            }

            const existing = await conversations.getConversation(conversationId, userId)
            if (!existing.ok) {
              if (existing.error.kind === 'DatabaseError') {
                return Result.err({kind: 'DatabaseError', message: existing.error.message})
              }
              // A foreign conversation looks exactly like a missing one
              return Result.err({kind: 'NotFound', message: 'Conversation not found'})
            }
            state = {step: 'AssembleHistory', conversationId}
            break
          }

          case 'AssembleHistory': {
            const history = await conversations.getConversationHistory(state.conversationId, userId)
            if (!history.ok) {
              return Result.err({
                kind: history.error.kind === 'DatabaseError' ? 'DatabaseError' : 'NotFound',
                message: history.error.kind === 'DatabaseError' ? history.error.message : 'Conversation not found',
              })
            }
            state = {step: 'FirstCompletion', conversationId: state.conversationId, history: history.value}
            break
          }

          case 'FirstCompletion': {
            const result = await orchestrator.processMessage({
              userId,
              message,
              history: state.history,
              tools: tools.modelTools(),
            })

            if (result.finishReason === 'tool_calls' && result.toolCalls && result.toolCalls.length > 0) {
              state = {
                step: 'ExecuteTools',
                conversationId: state.conversationId,
                history: state.history,
                calls: result.toolCalls,
                text: result.response,
              }
            } else {
              state = {step: 'ReturnReply', conversationId: state.conversationId, reply: result.response, outcomes: []}
            }
            break
          }

          case 'ExecuteTools': {
            const outcomes: ToolOutcome[] = []
            // Sequential: later calls may depend on earlier side effects
            for (const call of state.calls) {
              outcomes.push(await tools.dispatch(call, userId))
            }
            turnLog.info('tools executed', {count: outcomes.length})

            if (state.text.trim()) {
              state = {step: 'ReturnReply', conversationId: state.conversationId, reply: state.text, outcomes}
            } else {
              state = {
                step: 'SecondCompletion',
                conversationId: state.conversationId,
                history: state.history,
                exchange: {role: 'tool', toolCalls: state.calls, results: outcomes},
              }
            }
            break
          }

          case 'SecondCompletion': {
            const result = await orchestrator.processMessage({
              userId,
              history: state.history,
              current: [{role: 'user', content: message}, state.exchange],
            })
            state = {
              step: 'ReturnReply',
              conversationId: state.conversationId,
              reply: result.response || FALLBACK_REPLY,
              outcomes: state.exchange.results,
            }
            break
          }

          case 'ReturnReply':
            state = {
              step: 'PersistMessages',
              conversationId: state.conversationId,
              reply: state.reply,
              outcomes: state.outcomes,
            }
            break

          case 'PersistMessages': {
            const reply: string = state.reply || FALLBACK_REPLY
            const stored = reply.slice(0, MAX_MESSAGE_LENGTH)
            const user = await conversations.storeMessage(state.conversationId, userId, 'user', message)
            const assistant = user.ok
              ? await conversations.storeMessage(state.conversationId, userId, 'assistant', stored)
              : user
            if (!assistant.ok) {
              // The reply exists already; losing the transcript must not lose it
              turnLog.error('failed to persist turn', {
                conversationId: state.conversationId,
                error: assistant.error.message,
              })
            }
            state = {step: 'Respond', conversationId: state.conversationId, reply, outcomes: state.outcomes}
            break
          }

          case 'Respond':
            return Result.ok({
              conversationId: state.conversationId,
              response: state.reply,
              toolCalls: state.outcomes.length > 0 ? state.outcomes : undefined,
              createdAt: new Date().toISOString(),
            })
        }
      }
    },
  }
}
