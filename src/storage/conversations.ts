/**
 * Conversation and message storage.
 *
 * Plain record access: ownership rules live in the conversation manager,
 * which runs its check-then-write sequences inside `transaction`.
 */

import {asc, count, desc, eq, inArray} from 'drizzle-orm'
import type {DrizzleDB, Executor} from './db'
import {conversations, messages, type Conversation, type Message, type MessageRole} from './schema'

export type ConversationSortField = 'created_at' | 'updated_at'
export type SortOrder = 'asc' | 'desc'

export interface ConversationSummary extends Conversation {
  messageCount: number
}

export interface ListConversationsOptions {
  limit: number
  sortBy: ConversationSortField
  order: SortOrder
}

export interface NewMessage {
  conversationId: number
  userId: string
  role: MessageRole
  content: string
}

export interface ConversationStorage {
  create(userId: string): Conversation
  get(id: number): Conversation | null
  list(userId: string, options: ListConversationsOptions): ConversationSummary[]
  /** Set updated_at, e.g. to the timestamp of a newly stored message */
  touch(id: number, at: string): void

  insertMessage(input: NewMessage): Message
  /**
   * Messages newest-first by creation order, skipping the `offset` most
   * recent ones.
   */
  recentMessages(conversationId: number, options: {limit: number; offset?: number}): Message[]
  countMessages(conversationId: number): number

  /** Delete the conversation and its messages. Returns how many messages went. */
  delete(id: number): number

  /** Run `fn` in one SQLite transaction; a throw rolls everything back. */
  transaction<T>(fn: (store: ConversationStorage) => T): T
}

function bind(db: Executor, transaction: ConversationStorage['transaction']): ConversationStorage {
  const store: ConversationStorage = {
    create(userId) {
      const now = new Date().toISOString()
      const row = db
        .insert(conversations)
        .values({userId, createdAt: now, updatedAt: now})
        .returning()
        .get()
      if (!row) throw new Error('conversation insert returned no row')
      return row
    },

    get(id) {
      return db.select().from(conversations).where(eq(conversations.id, id)).get() ?? null
    },

    list(userId, {limit, sortBy, order}) {
      const column = sortBy === 'created_at' ? conversations.createdAt : conversations.updatedAt
      const direction = order === 'asc' ? asc : desc

      const rows = db
        .select()
        .from(conversations)
        .where(eq(conversations.userId, userId))
        .orderBy(direction(column), direction(conversations.id))
        .limit(limit)
        .all()

      if (rows.length === 0) return []

      const counts = db
        .select({conversationId: messages.conversationId, total: count()})
        .from(messages)
        .where(
          inArray(
            messages.conversationId,
            rows.map((row) => row.id),
          ),
        )
        .groupBy(messages.conversationId)
        .all()
      const byId = new Map(counts.map((c) => [c.conversationId, c.total]))

      return rows.map((row) => ({...row, messageCount: byId.get(row.id) ?? 0}))
    },

    touch(id, at) {
      db.update(conversations).set({updatedAt: at}).where(eq(conversations.id, id)).run()
    },

    insertMessage(input) {
      const row = db
        .insert(messages)
        .values({...input, createdAt: new Date().toISOString()})
        .returning()
        .get()
      if (!row) throw new Error('message insert returned no row')
      return row
    },

    recentMessages(conversationId, {limit, offset = 0}) {
      return db
        .select()
        .from(messages)
        .where(eq(messages.conversationId, conversationId))
        .orderBy(desc(messages.createdAt), desc(messages.id))
        .limit(limit)
        .offset(offset)
        .all()
    },

    countMessages(conversationId) {
      const row = db
        .select({total: count()})
        .from(messages)
        .where(eq(messages.conversationId, conversationId))
        .get()
      return row?.total ?? 0
    },

    delete(id) {
      const removed = db.delete(messages).where(eq(messages.conversationId, id)).run()
      db.delete(conversations).where(eq(conversations.id, id)).run()
      return removed.changes
    },

    transaction,
  }
  return store
}

export function createConversationStorage(db: DrizzleDB): ConversationStorage {
  return bind(db, (fn) =>
    db.transaction((tx) => {
      // Nested transaction() calls reuse the open transaction
      const scoped: ConversationStorage = bind(tx, (next) => next(scoped))
      return fn(scoped)
    }),
  )
}
