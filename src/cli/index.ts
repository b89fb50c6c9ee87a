#!/usr/bin/env node
/**
 * taskchat CLI entry point
 *
 * `taskchat -p "prompt"` runs one turn, `--repl` chats interactively,
 * `--list`/`--messages`/`--delete` work on stored conversations and
 * `--mcp` serves the task tools over stdio.
 */

import {parseArgs} from 'util'
import {z} from 'zod'
import {Config} from '../config'
import {runMcpServer} from '../mcp-server'
import {createRateLimiter} from '../rate-limit'
import {createStorage} from '../storage'
import {Log} from '../util/log'
import type {Result} from '../util/result'
import {VERSION_STRING} from '../version'
import {createApp, type App} from './app'
import {runBatch} from './batch'
import {printError, printSimpleError} from './error'
import {runDelete, runList, runMessages} from './inspect'
import {out} from './output'
import {runRepl} from './repl'

const positiveInt = z.coerce.number().int().positive()

const CliOptions = z.object({
  prompt: z.string().optional(),
  conversation: positiveInt.optional(),
  repl: z.boolean(),
  list: z.boolean(),
  messages: positiveInt.optional(),
  delete: positiveInt.optional(),
  mcp: z.boolean(),
  user: z.string().min(1).optional(),
  db: z.string().min(1).optional(),
  format: z.enum(['text', 'json']),
  verbose: z.boolean(),
  help: z.boolean(),
  version: z.boolean(),
  sort: z.enum(['created_at', 'updated_at']).optional(),
  order: z.enum(['asc', 'desc']).optional(),
  limit: positiveInt.optional(),
  offset: z.coerce.number().int().nonnegative().optional(),
})

type CliOptions = z.infer<typeof CliOptions>

function parseCliArgs(argv: string[]): CliOptions {
  const {values} = parseArgs({
    args: argv,
    options: {
      prompt: {type: 'string', short: 'p'},
      conversation: {type: 'string', short: 'c'},
      repl: {type: 'boolean', default: false},
      list: {type: 'boolean', default: false},
      messages: {type: 'string'},
      delete: {type: 'string'},
      mcp: {type: 'boolean', default: false},
      user: {type: 'string'},
      db: {type: 'string'},
      format: {type: 'string', default: 'text'},
      verbose: {type: 'boolean', short: 'v', default: false},
      help: {type: 'boolean', short: 'h', default: false},
      version: {type: 'boolean', short: 'V', default: false},
      sort: {type: 'string'},
      order: {type: 'string'},
      limit: {type: 'string'},
      offset: {type: 'string'},
    },
    allowPositionals: false,
  })

  const parsed = CliOptions.safeParse(values)
  if (!parsed.success) {
    const [issue] = parsed.error.issues
    printSimpleError(`Invalid --${issue?.path.join('.') ?? 'option'}: ${issue?.message}`, 'Run with --help for usage information')
    process.exit(1)
  }
  return parsed.data
}

function printHelp(): void {
  console.log(`
${VERSION_STRING}

Manage your todo list by chatting with an assistant

Usage:
  taskchat -p "prompt"              Run one chat turn
  taskchat -p "prompt" -c <id>      Continue a conversation
  taskchat --repl                   Start an interactive chat
  taskchat --list                   List your conversations
  taskchat --messages <id>          Print a conversation's messages
  taskchat --delete <id>            Delete a conversation and its messages
  taskchat --mcp                    Serve the task tools over MCP (stdio)
  taskchat --help                   Show this help

Options:
  -p, --prompt <text>        Message to send to the assistant
  -c, --conversation <id>    Conversation to continue (default: start a new one)
      --repl                 Interactive mode with readline history
      --list                 List conversations
      --messages <id>        Print messages of a conversation
      --delete <id>          Delete a conversation
      --mcp                  Start the MCP server on stdin/stdout
      --user <id>            Acting user (default: TASKCHAT_USER or "local")
      --db <path>            SQLite database path (default: TASKCHAT_DB or ./taskchat.db)
      --format <type>        Output format: text or json (default: text)
      --sort <field>         --list order field: created_at or updated_at
      --order <dir>          --list direction: asc or desc
      --limit <n>            Page size for --list and --messages
      --offset <n>           Messages to skip for --messages
  -v, --verbose              Debug logging on stderr
  -h, --help                 Show this help message
  -V, --version              Show version information

REPL Commands:
  /new       Start a new conversation
  /history   Show messages in the current conversation
  /help      Show available commands
  /quit      Exit

Environment:
  ANTHROPIC_API_KEY          Required for chat turns
  TASKCHAT_MODEL             Model id
  TASKCHAT_LOG_LEVEL         DEBUG, INFO, WARN or ERROR

Examples:
  taskchat -p "Add a task to buy groceries"
  taskchat -p "What's left on my list?" -c 3
  taskchat --repl --user alice
  taskchat --list --sort created_at --order asc --format json
  taskchat --messages 3 --limit 20
`)
}

/**
 * Print a command's result and return the exit code. A failure prints as
 * one line.
 */
function report(result: Result<string, {message: string}>): number {
  if (result.ok) {
    out.line(result.value)
    return 0
  }
  printSimpleError(result.error.message)
  return 1
}

async function dispatch(app: App, options: CliOptions, userId: string): Promise<number> {
  const {format} = options

  if (options.repl) {
    await runRepl(app, {
      userId,
      conversationId: options.conversation,
      limiter: createRateLimiter({
        perMinute: app.config.rateLimit.perMinute,
        perHour: app.config.rateLimit.perHour,
      }),
    })
    return 0
  }

  if (options.list) {
    return report(await runList(app, {userId, format, limit: options.limit, sortBy: options.sort, order: options.order}))
  }

  if (options.messages !== undefined) {
    return report(
      await runMessages(app, {
        userId,
        format,
        conversationId: options.messages,
        limit: options.limit,
        offset: options.offset,
      }),
    )
  }

  if (options.delete !== undefined) {
    return report(await runDelete(app, {userId, format, conversationId: options.delete}))
  }

  if (options.prompt === undefined) {
    printSimpleError(
      '--prompt (-p) is required (or use --repl/--list/--messages/--delete/--mcp)',
      'Run with --help for usage information',
    )
    return 1
  }

  return report(await runBatch(app, {prompt: options.prompt, userId, conversationId: options.conversation, format}))
}

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2))

  if (options.help) {
    printHelp()
    process.exit(0)
  }

  if (options.version) {
    out.line(VERSION_STRING)
    process.exit(0)
  }

  let config: Config.Config
  try {
    config = {...Config.get()}
  } catch (error) {
    printError(error, {verbose: options.verbose})
    process.exit(1)
  }

  Log.setLevel(options.verbose ? 'DEBUG' : config.logLevel)

  const userId = options.user ?? config.userId
  config.db = options.db ?? config.db

  if (options.mcp) {
    // Runs until stdin closes or a signal arrives
    await runMcpServer({storage: createStorage(config.db), userId})
    return
  }

  const app = createApp({config})
  let code: number
  try {
    code = await dispatch(app, options, userId)
  } finally {
    app.close()
  }
  process.exit(code)
}

main().catch((error: unknown) => {
  printError(error, {verbose: Log.getLevel() === 'DEBUG'})
  process.exit(1)
})
