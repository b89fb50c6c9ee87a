/**
 * Adapted from OpenCode (https://github.com/sst/opencode)
 * Original file: packages/opencode/src/util/log.ts
 * License: MIT
 *
 * Structured stderr logging for taskchat.
 *
 * Each line reads `LEVEL timestamp +Δms key=value ... message`. Loggers are
 * cached per service so every module can call `Log.create` at import time.
 */

import {z} from 'zod'
import pc from 'picocolors'

export namespace Log {
  export const Level = z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR'])
  export type Level = z.infer<typeof Level>

  const levelPriority: Record<Level, number> = {
    DEBUG: 0,
    INFO: 1,
    WARN: 2,
    ERROR: 3,
  }

  const levelColors: Record<Level, (s: string) => string> = {
    DEBUG: pc.gray,
    INFO: pc.blue,
    WARN: (s) => pc.bold(pc.yellow(s)),
    ERROR: (s) => pc.bold(pc.red(s)),
  }

  // INFO stays hidden unless --verbose or TASKCHAT_LOG_LEVEL asks for it
  let level: Level = 'WARN'

  export type Extra = Record<string, unknown>

  export type Logger = {
    debug(message: string, extra?: Extra): void
    info(message: string, extra?: Extra): void
    warn(message: string, extra?: Extra): void
    error(message: string, extra?: Extra): void
    /** A logger carrying extra tags on every line, e.g. a conversation id. */
    with(tags: Extra): Logger
  }

  const loggers = new Map<string, Logger>()

  let write = (msg: string): void => {
    process.stderr.write(msg)
  }

  export function setLevel(next: Level): void {
    level = next
  }

  export function getLevel(): Level {
    return level
  }

  /**
   * Redirect output. Tests use this to capture lines; pass `null` to restore stderr.
   */
  export function setWriter(fn: ((msg: string) => void) | null): void {
    write =
      fn ??
      ((msg: string) => {
        process.stderr.write(msg)
      })
  }

  function formatError(error: Error, depth = 0): string {
    const result = error.message
    return error.cause instanceof Error && depth < 10
      ? result + ' Caused by: ' + formatError(error.cause, depth + 1)
      : result
  }

  function formatValue(value: unknown): string {
    if (value instanceof Error) return pc.red(formatError(value))
    if (typeof value === 'object') return pc.cyan(JSON.stringify(value))
    return String(value)
  }

  let last = Date.now()

  function build(logLevel: Level, message: string, tags: Extra, extra?: Extra): string {
    const fields = Object.entries({...tags, ...extra})
      .filter(([, value]) => value !== undefined && value !== null)
      .map(([key, value]) => pc.dim(key + '=') + formatValue(value))
      .join(' ')

    const now = new Date()
    const diff = now.getTime() - last
    last = now.getTime()

    return (
      [
        levelColors[logLevel](logLevel.padEnd(5)),
        pc.dim(now.toISOString().split('.')[0]),
        pc.dim('+' + diff + 'ms'),
        fields,
        message,
      ]
        .filter(Boolean)
        .join(' ') + '\n'
    )
  }

  function make(tags: Extra): Logger {
    const emit = (logLevel: Level, message: string, extra?: Extra) => {
      if (levelPriority[logLevel] >= levelPriority[level]) {
        write(build(logLevel, message, tags, extra))
      }
    }
    return {
      debug: (message, extra) => emit('DEBUG', message, extra),
      info: (message, extra) => emit('INFO', message, extra),
      warn: (message, extra) => emit('WARN', message, extra),
      error: (message, extra) => emit('ERROR', message, extra),
      with: (more) => make({...tags, ...more}),
    }
  }

  export function create(tags: {service: string} & Extra): Logger {
    const cached = loggers.get(tags.service)
    if (cached) return cached

    const logger = make({...tags})
    loggers.set(tags.service, logger)
    return logger
  }
}
