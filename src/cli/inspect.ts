/**
 * History commands: list conversations, print messages, delete a
 * conversation. None of these call the model.
 */

import type {ConversationError} from '../conversation'
import type {ConversationSortField, ConversationSummary, Message, SortOrder} from '../storage'
import {Result} from '../util/result'
import type {App} from './app'
import type {OutputFormat} from './output'

export interface ListOptions {
  userId: string
  format: OutputFormat
  limit?: number
  sortBy?: ConversationSortField
  order?: SortOrder
}

export interface MessagesOptions {
  userId: string
  conversationId: number
  format: OutputFormat
  limit?: number
  offset?: number
}

function renderConversations(list: ConversationSummary[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(
      list.map((c) => ({
        id: c.id,
        created_at: c.createdAt,
        updated_at: c.updatedAt,
        message_count: c.messageCount,
      })),
      null,
      2,
    )
  }

  if (list.length === 0) return 'No conversations yet.'
  return list
    .map((c) => `#${c.id}  ${c.messageCount} message${c.messageCount === 1 ? '' : 's'}  updated ${c.updatedAt}`)
    .join('\n')
}

function renderMessages(conversationId: number, messages: Message[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(
      {
        conversation_id: conversationId,
        messages: messages.map((m) => ({id: m.id, role: m.role, content: m.content, created_at: m.createdAt})),
      },
      null,
      2,
    )
  }

  if (messages.length === 0) return `Conversation ${conversationId} has no messages.`
  return messages.map((m) => `[${m.createdAt}] ${m.role}: ${m.content}`).join('\n')
}

export async function runList(app: App, options: ListOptions): Promise<Result<string, ConversationError>> {
  const listed = await app.conversations.listConversations(options.userId, {
    limit: options.limit,
    sortBy: options.sortBy,
    order: options.order,
  })
  return Result.map(listed, (list) => renderConversations(list, options.format))
}

export async function runMessages(app: App, options: MessagesOptions): Promise<Result<string, ConversationError>> {
  const loaded = await app.conversations.getMessages(options.conversationId, options.userId, {
    limit: options.limit,
    offset: options.offset,
  })
  return Result.map(loaded, (messages) => renderMessages(options.conversationId, messages, options.format))
}

export async function runDelete(
  app: App,
  options: {userId: string; conversationId: number; format: OutputFormat},
): Promise<Result<string, ConversationError>> {
  const deleted = await app.conversations.deleteConversation(options.conversationId, options.userId)
  return Result.map(deleted, ({deletedConversationId, deletedMessageCount}) =>
    options.format === 'json'
      ? JSON.stringify({deleted_conversation_id: deletedConversationId, deleted_message_count: deletedMessageCount}, null, 2)
      : `Deleted conversation ${deletedConversationId} (${deletedMessageCount} messages)`,
  )
}
