/**
 * Update Task Tool
 *
 * Changes any of title, description and completed. Null bytes are stripped
 * here rather than rejected.
 */

import {z} from 'zod'
import type {TaskPatch} from '../storage'
import {escapeHtml, stripNullBytes} from '../util/sanitize'
import {taskId, taskIdSchema} from './task-id'
import {Tool} from './tool'

const clean = (text: string) => stripNullBytes(text).trim()

const parameters = z.object({
  task_id: taskId,
  title: z
    .string({invalid_type_error: 'Title must be a string'})
    .transform(clean)
    .refine((title) => title.length > 0, 'Title must not be empty or whitespace-only')
    .refine((title) => title.length <= 200, 'Title must be between 1 and 200 characters')
    .nullish(),
  description: z
    .string({invalid_type_error: 'Description must be a string'})
    .transform(clean)
    .refine((description) => description.length <= 1000, 'Description must be 1000 characters or less')
    .nullish(),
  completed: z.boolean({invalid_type_error: 'Completed must be a boolean value (true or false)'}).nullish(),
})

export const UpdateTaskTool = Tool.define<typeof parameters, {task: Tool.TaskPayload}>('update_task', {
  description:
    "Modify an existing task's title, description, and/or completion status. At least one field must be provided.",
  parameters,
  inputSchema: {
    type: 'object',
    properties: {
      task_id: {...taskIdSchema, description: 'ID of the task to update'},
      title: {
        type: 'string',
        description: 'New task title (1-200 characters)',
        minLength: 1,
        maxLength: 200,
      },
      description: {
        type: 'string',
        description: 'New task description (max 1000 characters)',
        maxLength: 1000,
      },
      completed: {
        type: 'boolean',
        description: 'Mark task as completed (true) or incomplete (false)',
      },
    },
    required: ['task_id'],
  },
  failure: 'Failed to update task. Please try again.',
  async execute({task_id, title, description, completed}, ctx) {
    const patch: TaskPatch = {}
    if (title != null) patch.title = escapeHtml(title)
    if (description != null) patch.description = description ? escapeHtml(description) : null
    if (completed != null) patch.completed = completed

    if (Object.keys(patch).length === 0) {
      return Tool.fail('ValidationError', 'At least one of title, description, or completed must be provided')
    }

    const task = ctx.tasks.update(task_id, ctx.userId, patch)
    if (!task) return Tool.fail('NotFoundError', Tool.NOT_FOUND)

    return {success: true, task: Tool.toPayload(task)}
  },
})
