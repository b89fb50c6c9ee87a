/**
 * Add Task Tool
 *
 * Creates a pending task from something the user wants to do.
 */

import {z} from 'zod'
import {escapeHtml, hasNullByte} from '../util/sanitize'
import {Tool} from './tool'

const DESCRIPTION =
  "Create a new task for the user. Use when user expresses a todo item, need, or intention (e.g., 'I need to buy groceries', 'remind me to call dentist')."

const parameters = z.object({
  title: z
    .string({required_error: 'Title must not be empty', invalid_type_error: 'Title must be a string'})
    .trim()
    .min(1, 'Title must not be empty')
    .max(200, 'Title must be between 1 and 200 characters')
    .refine((title) => !hasNullByte(title), 'Title contains invalid characters'),
  description: z
    .string({invalid_type_error: 'Description must be a string'})
    .trim()
    .max(1000, 'Description must be 1000 characters or less')
    .refine((description) => !hasNullByte(description), 'Description contains invalid characters')
    .nullish(),
})

export const AddTaskTool = Tool.define<typeof parameters, {task: Tool.TaskPayload}>('add_task', {
  description: DESCRIPTION,
  parameters,
  inputSchema: {
    type: 'object',
    properties: {
      title: {
        type: 'string',
        description: "Task title (1-200 characters). Extract from user's message.",
      },
      description: {
        type: 'string',
        description: 'Optional task details (max 1000 characters)',
      },
    },
    required: ['title'],
  },
  failure: 'Failed to create task. Please try again.',
  async execute({title, description}, ctx) {
    const task = ctx.tasks.create({
      userId: ctx.userId,
      title: escapeHtml(title),
      description: description ? escapeHtml(description) : null,
    })

    return {success: true, task: Tool.toPayload(task)}
  },
})
