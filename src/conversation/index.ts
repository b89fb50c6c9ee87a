/**
 * Conversation manager
 *
 * Ownership-checked access to conversations and their messages. Every
 * operation resolves to a Result; only programming errors escape as throws.
 */

import type {Conversation, ConversationSortField, ConversationSummary, Message, SortOrder, Storage} from '../storage'
import {MESSAGE_ROLES, type ConversationStorage, type MessageRole} from '../storage'
import {Tokens, type TokenCounter} from '../tokens'
import {Log} from '../util/log'
import {Result} from '../util/result'
import {keepNewest, truncateHistoryByTokens, type HistoryMessage} from './truncate'

export {keepNewest, truncateHistoryByTokens, type HistoryMessage}

const log = Log.create({service: 'conversation'})

export const MAX_MESSAGE_LENGTH = 10_000

export type ConversationErrorKind = 'NotFound' | 'Unauthorized' | 'ValidationError' | 'DatabaseError'

export interface ConversationError {
  kind: ConversationErrorKind
  message: string
}

export interface DeletedConversation {
  deletedConversationId: number
  deletedMessageCount: number
}

export interface ConversationManager {
  createConversation(userId: string): Promise<Result<Conversation, ConversationError>>
  storeMessage(
    conversationId: number,
    userId: string,
    role: string,
    content: string,
  ): Promise<Result<Message, ConversationError>>
  /** Recent messages, oldest first, trimmed to the context token budget. */
  getConversationHistory(
    conversationId: number,
    userId: string,
    limit?: number,
  ): Promise<Result<HistoryMessage[], ConversationError>>
  /** Full message records, oldest first, without token truncation. */
  getMessages(
    conversationId: number,
    userId: string,
    options?: {limit?: number; offset?: number},
  ): Promise<Result<Message[], ConversationError>>
  listConversations(
    userId: string,
    options?: {limit?: number; sortBy?: ConversationSortField; order?: SortOrder},
  ): Promise<Result<ConversationSummary[], ConversationError>>
  getConversation(conversationId: number, userId: string): Promise<Result<Conversation, ConversationError>>
  deleteConversation(conversationId: number, userId: string): Promise<Result<DeletedConversation, ConversationError>>
}

export interface ConversationManagerOptions {
  storage: Pick<Storage, 'conversations'>
  tokens?: TokenCounter
  maxHistoryMessages?: number
  maxContextTokens?: number
}

const fail = (kind: ConversationErrorKind, message: string) => Result.err<ConversationError>({kind, message})

function isRole(role: string): role is MessageRole {
  return MESSAGE_ROLES.some((r) => r === role)
}

function owned(store: ConversationStorage, id: number, userId: string): Result<Conversation, ConversationError> {
  const conversation = store.get(id)
  if (!conversation) return fail('NotFound', `Conversation ${id} not found`)
  if (conversation.userId !== userId) return fail('Unauthorized', `Unauthorized access to conversation ${id}`)
  return Result.ok(conversation)
}

function checkRange(name: string, value: number, min: number, max: number): ConversationError | null {
  if (Number.isInteger(value) && value >= min && value <= max) return null
  return {kind: 'ValidationError', message: `${name} must be an integer between ${min} and ${max}`}
}

export function createConversationManager(options: ConversationManagerOptions): ConversationManager {
  const store = options.storage.conversations
  const count = options.tokens ?? Tokens.count
  const maxHistoryMessages = options.maxHistoryMessages ?? 20
  const maxContextTokens = options.maxContextTokens ?? 4000

  /**
   * Run a store operation, turning unexpected exceptions into DatabaseError.
   * Internal detail goes to the log, never into the returned message.
   */
  async function guarded<T>(
    operation: string,
    fn: () => Result<T, ConversationError>,
  ): Promise<Result<T, ConversationError>> {
    try {
      return fn()
    } catch (error) {
      log.error('storage failure', {operation, error})
      return fail('DatabaseError', `Failed to ${operation}`)
    }
  }

  return {
    createConversation(userId) {
      return guarded('create conversation', () => {
        if (userId.length === 0) return fail('ValidationError', 'User id must not be empty')
        const conversation = store.create(userId)
        log.info('created conversation', {conversationId: conversation.id, userId})
        return Result.ok(conversation)
      })
    },

    storeMessage(conversationId, userId, role, content) {
      return guarded('store message', () =>
        store.transaction((tx) => {
          const conversation = owned(tx, conversationId, userId)
          if (!conversation.ok) return conversation

          if (!isRole(role)) {
            return fail('ValidationError', `Invalid role: ${role}. Must be 'user' or 'assistant'`)
          }
          if (content.length < 1 || content.length > MAX_MESSAGE_LENGTH) {
            return fail('ValidationError', 'Message content must be between 1 and 10,000 characters')
          }

          const message = tx.insertMessage({conversationId, userId, role, content})
          tx.touch(conversationId, message.createdAt)
          log.debug('stored message', {conversationId, role, length: content.length})
          return Result.ok(message)
        }),
      )
    },

    getConversationHistory(conversationId, userId, limit = maxHistoryMessages) {
      return guarded('load conversation history', () => {
        const conversation = owned(store, conversationId, userId)
        if (!conversation.ok) return conversation

        const recent = store
          .recentMessages(conversationId, {limit})
          .reverse()
          .map((m): HistoryMessage => ({role: m.role, content: m.content}))

        return Result.ok(truncateHistoryByTokens(recent, maxContextTokens, count))
      })
    },

    getMessages(conversationId, userId, {limit = 100, offset = 0} = {}) {
      return guarded('load messages', () => {
        const invalid = checkRange('Limit', limit, 1, 500) ?? checkRange('Offset', offset, 0, Number.MAX_SAFE_INTEGER)
        if (invalid) return Result.err(invalid)

        const conversation = owned(store, conversationId, userId)
        if (!conversation.ok) return conversation

        return Result.ok(store.recentMessages(conversationId, {limit, offset}).reverse())
      })
    },

    listConversations(userId, {limit = 50, sortBy = 'updated_at', order = 'desc'} = {}) {
      return guarded('list conversations', () => {
        const invalid = checkRange('Limit', limit, 1, 100)
        if (invalid) return Result.err(invalid)
        return Result.ok(store.list(userId, {limit, sortBy, order}))
      })
    },

    getConversation(conversationId, userId) {
      return guarded('load conversation', () => owned(store, conversationId, userId))
    },

    deleteConversation(conversationId, userId) {
      return guarded('delete conversation', () =>
        store.transaction((tx) => {
          const conversation = owned(tx, conversationId, userId)
          if (!conversation.ok) return conversation

          const deletedMessageCount = tx.delete(conversationId)
          log.info('deleted conversation', {conversationId, messages: deletedMessageCount})
          return Result.ok({deletedConversationId: conversationId, deletedMessageCount})
        }),
      )
    },
  }
}
