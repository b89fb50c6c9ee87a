/**
 * Task tool registry
 *
 * Closed dispatch table over the five task tools. The caller's user id is
 * injected on every call; a `user_id` in the model's arguments is dropped.
 */

import {jsonSchema, tool, type CoreTool} from 'ai'
import type {TaskStorage} from '../storage'
import {Log} from '../util/log'
import {AddTaskTool} from './add-task'
import {CompleteTaskTool} from './complete-task'
import {DeleteTaskTool} from './delete-task'
import {ListTasksTool} from './list-tasks'
import {Tool} from './tool'
import {UpdateTaskTool} from './update-task'

export {Tool}
export {AddTaskTool, ListTasksTool, CompleteTaskTool, DeleteTaskTool, UpdateTaskTool}

const log = Log.create({service: 'tool'})

export const TOOLS = {
  add_task: AddTaskTool,
  list_tasks: ListTasksTool,
  complete_task: CompleteTaskTool,
  delete_task: DeleteTaskTool,
  update_task: UpdateTaskTool,
} satisfies Record<string, Tool.Info>

export type ToolName = keyof typeof TOOLS

export const TOOL_NAMES = Object.keys(TOOLS).filter(isToolName)

export function isToolName(name: string): name is ToolName {
  return Object.hasOwn(TOOLS, name)
}

/** A tool invocation requested by the model; `arguments` is opaque JSON text */
export interface ToolCallRequest {
  id: string
  name: string
  arguments: string
}

export type ToolOutcome =
  | {toolCallId: string; tool: string; result: Tool.Payload<object>}
  | {toolCallId: string; tool: string; error: string}

export interface ToolRegistry {
  readonly names: readonly ToolName[]
  dispatch(call: ToolCallRequest, userId: string): Promise<ToolOutcome>
  /** Tool set for the completion engine. No `execute`: dispatch stays here. */
  modelTools(): Record<string, CoreTool>
}

function parseArguments(raw: string): Record<string, unknown> | null {
  let value: unknown
  try {
    value = raw.trim() === '' ? {} : JSON.parse(raw)
  } catch {
    return null
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null
  return {...value}
}

export function createToolRegistry(options: {tasks: TaskStorage}): ToolRegistry {
  const {tasks} = options

  return {
    names: TOOL_NAMES,

    async dispatch(call, userId) {
      const base = {toolCallId: call.id, tool: call.name}

      if (!isToolName(call.name)) {
        log.warn('model requested unknown tool', {tool: call.name})
        return {...base, error: `ValidationError: Unknown tool "${call.name}"`}
      }

      const args = parseArguments(call.arguments)
      if (!args) {
        return {...base, error: 'ValidationError: Tool arguments must be a JSON object'}
      }
      delete args.user_id

      try {
        const result = await TOOLS[call.name].run(args, {userId, tasks})
        log.info('tool executed', {tool: call.name, userId, success: result.success})
        return {...base, result}
      } catch (error) {
        log.error('tool dispatch failed', {tool: call.name, error})
        return {...base, error: `UnexpectedError: ${error instanceof Error ? error.message : String(error)}`}
      }
    },

    modelTools() {
      const entries = TOOL_NAMES.map((name) => {
        const {description, inputSchema} = TOOLS[name].definition
        return [name, tool({description, parameters: jsonSchema(inputSchema)})] as const
      })
      return Object.fromEntries(entries)
    },
  }
}
