/**
 * MCP tool registrations for the taskchat MCP server.
 *
 * Tools: add_task, list_tasks, complete_task, delete_task, update_task.
 * Each call runs as the user the server was started for.
 */

import type {McpServer} from '@modelcontextprotocol/sdk/server/mcp.js'
import type {CallToolResult} from '@modelcontextprotocol/sdk/types.js'
import type {TaskStorage} from '../storage'
import {TOOL_NAMES, TOOLS, type Tool} from '../tool'
import {Log} from '../util/log'

const log = Log.create({service: 'mcp-server'})

export function toCallToolResult(payload: Tool.Payload<object>): CallToolResult {
  return {
    isError: !payload.success,
    content: [{type: 'text', text: JSON.stringify(payload, null, 2)}],
  }
}

export function registerTools(mcp: McpServer, options: {tasks: TaskStorage; userId: string}): void {
  const ctx: Tool.Context = {tasks: options.tasks, userId: options.userId}

  for (const name of TOOL_NAMES) {
    const {definition, run} = TOOLS[name]

    mcp.tool(name, definition.description, definition.parameters.shape, async (args: unknown) => {
      const payload = await run(args, ctx)
      log.info('mcp tool call', {tool: name, success: payload.success})
      return toCallToolResult(payload)
    })
  }
}
