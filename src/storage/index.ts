/**
 * Storage module for taskchat
 *
 * All database access goes through this interface.
 * No raw SQL leaks out of this module.
 */

import {mkdirSync} from 'fs'
import {dirname} from 'path'
import {openDb, type Connection, type DrizzleDB, type RawDatabase} from './db'
import {runMigrations} from './migrate'
import {
  createConversationStorage,
  type ConversationStorage,
  type ConversationSummary,
  type ConversationSortField,
  type ListConversationsOptions,
  type NewMessage,
  type SortOrder,
} from './conversations'
import {
  createTaskStorage,
  type CreateTaskInput,
  type TaskFilter,
  type TaskPage,
  type TaskPatch,
  type TaskStorage,
} from './tasks'

export type {
  ConversationStorage,
  ConversationSummary,
  ConversationSortField,
  ListConversationsOptions,
  NewMessage,
  SortOrder,
  CreateTaskInput,
  TaskFilter,
  TaskPage,
  TaskPatch,
  TaskStorage,
  DrizzleDB,
  RawDatabase,
}

export type {Conversation, Message, MessageRole, Task} from './schema'
export {MESSAGE_ROLES} from './schema'

/**
 * The Storage interface - all access through here
 */
export interface Storage {
  conversations: ConversationStorage
  tasks: TaskStorage
  /** Release the SQLite handle */
  close(): void
}

/**
 * Extended storage with database access for testing/verification.
 */
export interface StorageWithDb extends Storage {
  _db: DrizzleDB
  _raw: RawDatabase
}

/**
 * Create a Storage instance backed by a SQLite file, applying any pending
 * migrations.
 */
export function createStorage(dbPath: string): StorageWithDb {
  mkdirSync(dirname(dbPath), {recursive: true})

  const connection = openDb(dbPath)
  runMigrations(connection.raw)
  return createStorageFromConnection(connection)
}

/**
 * Create an in-memory Storage instance for testing.
 */
export function createInMemoryStorage(): StorageWithDb {
  const connection = openDb(':memory:')
  runMigrations(connection.raw)
  return createStorageFromConnection(connection)
}

function createStorageFromConnection({db, raw}: Connection): StorageWithDb {
  return {
    conversations: createConversationStorage(db),
    tasks: createTaskStorage(db),
    close: () => raw.close(),
    _db: db,
    _raw: raw,
  }
}
