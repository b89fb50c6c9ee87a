/**
 * Drizzle schema definitions for taskchat storage.
 *
 * Mirrors migrations/0001_initial_schema.sql. Messages and tasks carry a
 * denormalized user_id so ownership can be checked in the same query that
 * loads the row.
 */

import {sqliteTable, text, integer, index} from 'drizzle-orm/sqlite-core'

export const MESSAGE_ROLES = ['user', 'assistant'] as const
export type MessageRole = (typeof MESSAGE_ROLES)[number]

// ─────────────────────────────────────────────────────────────────
// Conversations - one chat thread, owned by one user
// ─────────────────────────────────────────────────────────────────

export const conversations = sqliteTable(
  'conversations',
  {
    id: integer('id').primaryKey({autoIncrement: true}),
    userId: text('user_id').notNull(), // immutable once set
    createdAt: text('created_at').notNull(), // ISO 8601
    updatedAt: text('updated_at').notNull(), // bumped on every stored message
  },
  (table) => [index('idx_conversations_user').on(table.userId, table.updatedAt)],
)

/**
 * Append-only message log. No update path exists; rows go away only with
 * their conversation.
 */
export const messages = sqliteTable(
  'messages',
  {
    id: integer('id').primaryKey({autoIncrement: true}),
    conversationId: integer('conversation_id')
      .notNull()
      .references(() => conversations.id, {onDelete: 'cascade'}),
    userId: text('user_id').notNull(),
    role: text('role', {enum: MESSAGE_ROLES}).notNull(),
    content: text('content').notNull(), // 1-10,000 chars, checked before insert
    createdAt: text('created_at').notNull(),
  },
  (table) => [
    index('idx_messages_conversation').on(table.conversationId, table.id),
    index('idx_messages_user').on(table.userId),
  ],
)

// ─────────────────────────────────────────────────────────────────
// Tasks - the todo list the agent manages
// ─────────────────────────────────────────────────────────────────

export const tasks = sqliteTable(
  'tasks',
  {
    id: integer('id').primaryKey({autoIncrement: true}),
    userId: text('user_id').notNull(),
    title: text('title').notNull(), // sanitized (HTML-escaped)
    description: text('description'), // sanitized, null when absent
    completed: integer('completed', {mode: 'boolean'}).notNull().default(false),
    createdAt: text('created_at').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [index('idx_tasks_user').on(table.userId, table.completed)],
)

export type Conversation = typeof conversations.$inferSelect
export type Message = typeof messages.$inferSelect
export type MessageInsert = typeof messages.$inferInsert
export type Task = typeof tasks.$inferSelect
export type TaskInsert = typeof tasks.$inferInsert
