import {z} from 'zod'

const NOT_INTEGER = 'task_id must be an integer'

/** Positive integer task id, validated before any store access */
export const taskId = z
  .number({required_error: NOT_INTEGER, invalid_type_error: NOT_INTEGER})
  .int(NOT_INTEGER)
  .min(1, 'task_id must be a positive integer')

export const taskIdSchema = {
  type: 'integer',
  minimum: 1,
} as const
