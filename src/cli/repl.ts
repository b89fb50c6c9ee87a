/**
 * REPL mode for taskchat
 *
 * Multi-turn chat in one conversation, with readline history persisted to
 * ~/.taskchat_history. Commands: /new, /history, /help, /quit.
 * Every chat line is checked against the per-user rate limiter first.
 */

import * as readline from 'readline'
import * as fs from 'fs'
import * as path from 'path'
import * as os from 'os'
import pc from 'picocolors'
import type {RateLimiter} from '../rate-limit'
import {Log} from '../util/log'
import type {App} from './app'
import {renderTurn} from './batch'

const log = Log.create({service: 'repl'})

const PROMPT = 'taskchat> '
const HISTORY_FILE = path.join(os.homedir(), '.taskchat_history')
const MAX_HISTORY = 1000

export interface ReplOptions {
  userId: string
  limiter: RateLimiter
  conversationId?: number
  /** Output sink; defaults to stdout */
  write?: (text: string) => void
}

export type LineOutcome = 'continue' | 'quit'

export class ReplSession {
  private conversationId: number | undefined
  private readonly write: (text: string) => void

  constructor(
    private readonly app: App,
    private readonly options: ReplOptions,
  ) {
    this.conversationId = options.conversationId
    this.write =
      options.write ??
      ((text) => {
        process.stdout.write(text)
      })
  }

  /** Conversation the next message goes to; undefined starts a new one */
  get currentConversation(): number | undefined {
    return this.conversationId
  }

  /**
   * Start reading from stdin. Resolves when the user quits or sends EOF.
   */
  async start(): Promise<void> {
    let history = loadHistory()
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: PROMPT,
      history,
      historySize: MAX_HISTORY,
      terminal: process.stdin.isTTY,
    })

    rl.on('history', (next: string[]) => {
      history = next
    })

    this.write(`\ntaskchat interactive mode (user ${this.options.userId})\nType /help for commands, /quit to exit\n\n`)
    rl.prompt()

    for await (const line of rl) {
      const outcome = await this.handleLine(line)
      if (outcome === 'quit') break
      rl.prompt()
    }

    rl.close()
    saveHistory(history)
    this.write('Goodbye!\n')
  }

  async handleLine(line: string): Promise<LineOutcome> {
    const trimmed = line.trim()
    if (!trimmed) return 'continue'

    if (trimmed.startsWith('/')) return this.handleCommand(trimmed)

    await this.runTurn(line)
    return 'continue'
  }

  private async handleCommand(input: string): Promise<LineOutcome> {
    const [command = ''] = input.slice(1).split(/\s+/)

    switch (command.toLowerCase()) {
      case 'quit':
      case 'exit':
      case 'q':
        return 'quit'

      case 'new':
        this.conversationId = undefined
        this.write('Started a new conversation.\n')
        return 'continue'

      case 'history':
        await this.printHistory()
        return 'continue'

      case 'help':
      case 'h':
      case '?':
        this.printHelp()
        return 'continue'

      default:
        this.write(`Unknown command: /${command}\nType /help for available commands.\n`)
        return 'continue'
    }
  }

  private printHelp(): void {
    this.write(
      [
        'Commands:',
        '  /new             Start a new conversation',
        '  /history         Show messages in this conversation',
        '  /help, /h, /?    Show this help',
        '  /quit, /exit, /q Exit the REPL',
        '',
        'Anything else is sent to the assistant.',
        '',
      ].join('\n'),
    )
  }

  private async printHistory(): Promise<void> {
    if (this.conversationId === undefined) {
      this.write('No messages yet.\n')
      return
    }

    const loaded = await this.app.conversations.getMessages(this.conversationId, this.options.userId)
    if (!loaded.ok) {
      this.write(`${pc.red('Error:')} ${loaded.error.message}\n`)
      return
    }

    for (const message of loaded.value) {
      this.write(`${pc.dim(message.role + ':')} ${message.content}\n`)
    }
  }

  private async runTurn(message: string): Promise<void> {
    const decision = this.options.limiter.check(this.options.userId)
    if (!decision.allowed) {
      this.write(
        `Rate limit exceeded: ${decision.limit} requests per ${decision.window}. ` +
          `Try again in ${decision.retryAfterSeconds}s.\n`,
      )
      return
    }

    const result = await this.app.turns.handleTurn({
      userId: this.options.userId,
      message,
      conversationId: this.conversationId,
    })

    if (!result.ok) {
      this.write(`${pc.red('Error:')} ${result.error.message}\n`)
      return
    }

    this.conversationId = result.value.conversationId
    this.write(renderTurn(result.value, 'text') + '\n\n')
  }
}

function loadHistory(): string[] {
  try {
    if (!fs.existsSync(HISTORY_FILE)) return []
    return fs
      .readFileSync(HISTORY_FILE, 'utf-8')
      .split('\n')
      .filter((line) => line.trim() && !line.startsWith('/'))
      .slice(0, MAX_HISTORY)
  } catch (error) {
    log.debug('could not read history file', {path: HISTORY_FILE, error})
    return []
  }
}

/** readline keeps history newest-first; the file is stored the same way */
function saveHistory(history: string[]): void {
  try {
    fs.writeFileSync(HISTORY_FILE, history.slice(0, MAX_HISTORY).join('\n') + '\n')
  } catch (error) {
    log.debug('could not write history file', {path: HISTORY_FILE, error})
  }
}

export async function runRepl(app: App, options: ReplOptions): Promise<void> {
  const session = new ReplSession(app, options)
  await session.start()
}
