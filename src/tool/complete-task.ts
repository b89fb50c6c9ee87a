/**
 * Complete Task Tool
 *
 * Idempotent: completing an already-completed task succeeds and only bumps
 * updated_at.
 */

import {z} from 'zod'
import {taskId, taskIdSchema} from './task-id'
import {Tool} from './tool'

const parameters = z.object({task_id: taskId})

export const CompleteTaskTool = Tool.define<typeof parameters, {task: Tool.TaskPayload}>('complete_task', {
  description:
    'Mark an existing task as completed. This is idempotent - completing an already-completed task will succeed.',
  parameters,
  inputSchema: {
    type: 'object',
    properties: {
      task_id: {...taskIdSchema, description: 'ID of the task to mark as complete'},
    },
    required: ['task_id'],
  },
  failure: 'Failed to complete task. Please try again.',
  async execute({task_id}, ctx) {
    const task = ctx.tasks.update(task_id, ctx.userId, {completed: true})
    if (!task) return Tool.fail('NotFoundError', Tool.NOT_FOUND)

    return {success: true, task: Tool.toPayload(task)}
  },
})
