/**
 * Task storage
 *
 * Every statement that touches an existing task filters on id AND user_id,
 * so a foreign task behaves exactly like a missing one.
 */

import {and, count, desc, eq, type SQL} from 'drizzle-orm'
import type {Executor} from './db'
import {tasks, type Task} from './schema'

export type TaskFilter = 'all' | 'pending' | 'completed'

export interface CreateTaskInput {
  userId: string
  title: string
  description: string | null
}

export interface TaskPatch {
  title?: string
  description?: string | null
  completed?: boolean
}

export interface TaskPage {
  tasks: Task[]
  /** Matching tasks before pagination */
  total: number
}

export interface TaskStorage {
  create(input: CreateTaskInput): Task
  /** The task, or null when it is missing or owned by someone else */
  findOwned(id: number, userId: string): Task | null
  list(userId: string, options: {filter: TaskFilter; limit: number; offset: number}): TaskPage
  /** Apply `patch` and bump updated_at. Null when no owned row matched. */
  update(id: number, userId: string, patch: TaskPatch): Task | null
  /** Hard delete. False when no owned row matched. */
  delete(id: number, userId: string): boolean
}

function ownedBy(id: number, userId: string): SQL | undefined {
  return and(eq(tasks.id, id), eq(tasks.userId, userId))
}

function filterClause(userId: string, filter: TaskFilter): SQL | undefined {
  switch (filter) {
    case 'pending':
      return and(eq(tasks.userId, userId), eq(tasks.completed, false))
    case 'completed':
      return and(eq(tasks.userId, userId), eq(tasks.completed, true))
    case 'all':
      return eq(tasks.userId, userId)
  }
}

export function createTaskStorage(db: Executor): TaskStorage {
  return {
    create({userId, title, description}) {
      const now = new Date().toISOString()
      const row = db
        .insert(tasks)
        .values({userId, title, description, completed: false, createdAt: now, updatedAt: now})
        .returning()
        .get()
      if (!row) throw new Error('task insert returned no row')
      return row
    },

    findOwned(id, userId) {
      return db.select().from(tasks).where(ownedBy(id, userId)).get() ?? null
    },

    list(userId, {filter, limit, offset}) {
      const where = filterClause(userId, filter)

      const total = db.select({value: count()}).from(tasks).where(where).get()?.value ?? 0
      const page = db
        .select()
        .from(tasks)
        .where(where)
        .orderBy(desc(tasks.createdAt), desc(tasks.id))
        .limit(limit)
        .offset(offset)
        .all()

      return {tasks: page, total}
    },

    update(id, userId, patch) {
      const row = db
        .update(tasks)
        .set({...patch, updatedAt: new Date().toISOString()})
        .where(ownedBy(id, userId))
        .returning()
        .get()
      return row ?? null
    },

    delete(id, userId) {
      const result = db.delete(tasks).where(ownedBy(id, userId)).run()
      return result.changes > 0
    },
  }
}
