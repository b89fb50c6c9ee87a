/**
 * List Tasks Tool
 *
 * Newest-first page of the caller's tasks, optionally filtered by
 * completion state.
 */

import {z} from 'zod'
import {Tool} from './tool'

const FILTERS = ['all', 'pending', 'completed'] as const

const LIMIT_MESSAGE = 'Limit must be an integer between 1 and 200'
const OFFSET_MESSAGE = 'Offset must be a non-negative integer'

const parameters = z.object({
  filter: z
    .enum(FILTERS, {errorMap: () => ({message: `Filter must be one of: ${FILTERS.join(', ')}`})})
    .default('pending'),
  limit: z
    .number({invalid_type_error: LIMIT_MESSAGE})
    .int(LIMIT_MESSAGE)
    .min(1, LIMIT_MESSAGE)
    .max(200, LIMIT_MESSAGE)
    .default(50),
  offset: z.number({invalid_type_error: OFFSET_MESSAGE}).int(OFFSET_MESSAGE).min(0, OFFSET_MESSAGE).default(0),
})

export interface ListTasksResult {
  tasks: Tool.TaskPayload[]
  total: number
  has_more: boolean
}

export const ListTasksTool = Tool.define<typeof parameters, ListTasksResult>('list_tasks', {
  description:
    "Retrieve user's tasks with optional filtering by completion status. Returns tasks in reverse chronological order (newest first).",
  parameters,
  inputSchema: {
    type: 'object',
    properties: {
      filter: {
        type: 'string',
        enum: [...FILTERS],
        description:
          "Task filter: 'all' for all tasks, 'pending' for incomplete tasks, 'completed' for completed tasks",
        default: 'pending',
      },
      limit: {
        type: 'integer',
        description: 'Maximum number of tasks to return (1-200)',
        minimum: 1,
        maximum: 200,
        default: 50,
      },
      offset: {
        type: 'integer',
        description: 'Pagination offset (number of tasks to skip)',
        minimum: 0,
        default: 0,
      },
    },
  },
  failure: 'Failed to retrieve tasks. Please try again.',
  async execute({filter, limit, offset}, ctx) {
    const page = ctx.tasks.list(ctx.userId, {filter, limit, offset})

    return {
      success: true,
      tasks: page.tasks.map(Tool.toPayload),
      total: page.total,
      has_more: offset + page.tasks.length < page.total,
    }
  },
})
