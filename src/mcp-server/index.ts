/**
 * taskchat MCP Server
 *
 * Exposes the task tools over the Model Context Protocol so other agents
 * can manage one user's task list directly.
 *
 * Usage: taskchat --mcp --user <id>
 */

import {McpServer} from '@modelcontextprotocol/sdk/server/mcp.js'
import {StdioServerTransport} from '@modelcontextprotocol/sdk/server/stdio.js'
import type {Storage} from '../storage'
import {Log} from '../util/log'
import {VERSION} from '../version'
import {registerTools} from './tools'

const log = Log.create({service: 'mcp-server'})

export function createMcpServer(options: {storage: Storage; userId: string}): McpServer {
  const mcp = new McpServer({name: 'taskchat', version: VERSION}, {capabilities: {tools: {}}})
  registerTools(mcp, {tasks: options.storage.tasks, userId: options.userId})
  return mcp
}

export async function runMcpServer(options: {storage: Storage; userId: string}): Promise<void> {
  const mcp = createMcpServer(options)

  const transport = new StdioServerTransport()
  await mcp.connect(transport)
  log.info('mcp server listening on stdio', {userId: options.userId})

  const shutdown = () => {
    mcp
      .close()
      .catch((error: unknown) => log.error('mcp server close failed', {error}))
      .finally(() => {
        options.storage.close()
        process.exit(0)
      })
  }
  process.on('SIGTERM', shutdown)
  process.on('SIGINT', shutdown)
}
