/**
 * Delete Task Tool
 *
 * Hard delete. A repeated delete reports NotFoundError.
 */

import {z} from 'zod'
import {taskId, taskIdSchema} from './task-id'
import {Tool} from './tool'

const parameters = z.object({task_id: taskId})

export interface DeleteTaskResult {
  deleted_task_id: number
  message: string
}

export const DeleteTaskTool = Tool.define<typeof parameters, DeleteTaskResult>('delete_task', {
  description: "Permanently remove a task from the user's task list. This action cannot be undone.",
  parameters,
  inputSchema: {
    type: 'object',
    properties: {
      task_id: {...taskIdSchema, description: 'ID of the task to delete'},
    },
    required: ['task_id'],
  },
  failure: 'Failed to delete task. Please try again.',
  async execute({task_id}, ctx) {
    if (!ctx.tasks.delete(task_id, ctx.userId)) {
      return Tool.fail('NotFoundError', Tool.NOT_FOUND)
    }
    return {success: true, deleted_task_id: task_id, message: 'Task deleted successfully'}
  },
})
