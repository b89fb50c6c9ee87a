/**
 * Task tool definition pattern.
 *
 * A tool pairs a zod parameter schema (enforced here, before any store
 * access) with the JSON schema the model sees, and always resolves to a
 * tagged payload: tools never throw at their caller.
 */

import {z} from 'zod'
import type {jsonSchema} from 'ai'
import type {Task, TaskStorage} from '../storage'
import {Log} from '../util/log'

const log = Log.create({service: 'tool'})

export namespace Tool {
  export type JsonSchema = Parameters<typeof jsonSchema>[0]

  export type ErrorKind = 'ValidationError' | 'NotFoundError' | 'DatabaseError'

  export interface Failure {
    success: false
    error: ErrorKind
    message: string
  }

  export type Payload<T extends object> = ({success: true} & T) | Failure

  /** Wire shape of a task in tool results */
  export interface TaskPayload {
    id: number
    user_id: string
    title: string
    description: string | null
    completed: boolean
    created_at: string
    updated_at: string
  }

  /**
   * Tool execution context. `userId` is the authenticated caller, never a
   * value the model supplied.
   */
  export interface Context {
    userId: string
    tasks: TaskStorage
  }

  export interface Definition<Parameters extends z.AnyZodObject, T extends object> {
    description: string
    parameters: Parameters
    /** Shown to the model; `user_id` is left out because it is injected */
    inputSchema: JsonSchema
    /** Returned, without internal detail, when the store throws */
    failure: string
    execute(args: z.infer<Parameters>, ctx: Context): Promise<Payload<T>>
  }

  export interface Info<Parameters extends z.AnyZodObject = z.AnyZodObject, T extends object = object> {
    id: string
    definition: Definition<Parameters, T>
    /** Validate raw arguments, then execute */
    run(args: unknown, ctx: Context): Promise<Payload<T>>
  }

  export function fail(error: ErrorKind, message: string): Failure {
    return {success: false, error, message}
  }

  export const NOT_FOUND = 'Task not found or does not belong to user'

  export function toPayload(task: Task): TaskPayload {
    return {
      id: task.id,
      user_id: task.userId,
      title: task.title,
      description: task.description,
      completed: task.completed,
      created_at: task.createdAt,
      updated_at: task.updatedAt,
    }
  }

  /**
   * Define a tool with the given ID and definition.
   * `run` validates the arguments and reports the first issue as a
   * ValidationError; a throwing store becomes a DatabaseError.
   */
  export function define<Parameters extends z.AnyZodObject, T extends object>(
    id: string,
    definition: Definition<Parameters, T>,
  ): Info<Parameters, T> {
    return {
      id,
      definition,
      async run(args, ctx) {
        const parsed = definition.parameters.safeParse(args)
        if (!parsed.success) {
          const [issue] = parsed.error.issues
          log.debug('tool arguments rejected', {tool: id, issue: issue?.message})
          return fail('ValidationError', issue?.message ?? 'Invalid arguments')
        }

        try {
          return await definition.execute(parsed.data, ctx)
        } catch (error) {
          log.error('tool failed', {tool: id, userId: ctx.userId, error})
          return fail('DatabaseError', definition.failure)
        }
      },
    }
  }
}
