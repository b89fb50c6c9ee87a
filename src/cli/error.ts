/**
 * Error output for the taskchat CLI
 *
 * Core failures arrive as typed errors and print as one line. Anything
 * unexpected is categorized here and printed with a hint.
 */

import pc from 'picocolors'
import {LoadAPIKeyError} from 'ai'
import {err} from './output'

interface ErrorInfo {
  title: string
  message: string
  hint?: string
  details?: string
}

/**
 * Categorize an error and extract what is worth showing.
 */
export function categorizeError(error: unknown): ErrorInfo {
  if (LoadAPIKeyError.isInstance(error)) {
    return {
      title: 'Missing API Key',
      message: 'ANTHROPIC_API_KEY environment variable is not set',
      hint: 'Export ANTHROPIC_API_KEY before starting a chat.',
    }
  }

  if (!(error instanceof Error)) {
    return {title: 'Unknown Error', message: String(error)}
  }

  const msg = error.message

  if (error.name === 'ZodError') {
    return {
      title: 'Invalid Configuration',
      message: msg,
      hint: 'Check the TASKCHAT_* environment variables.',
    }
  }

  if (msg.includes('ENOENT')) {
    const path = msg.match(/ENOENT.*'([^']+)'/)?.[1] ?? 'unknown'
    return {
      title: 'File Not Found',
      message: `Cannot find: ${path}`,
      hint: 'Check that the directory for --db exists and is reachable.',
    }
  }

  if (msg.includes('EACCES') || msg.includes('EPERM') || msg.includes('EROFS')) {
    return {
      title: 'Permission Denied',
      message: msg,
      hint: 'Pick a writable location with --db or TASKCHAT_DB.',
    }
  }

  if (msg.includes('SQLITE') || msg.includes('database') || msg.includes('migration')) {
    return {
      title: 'Database Error',
      message: msg,
      hint: 'The database file may be locked or from an incompatible version.',
    }
  }

  return {title: 'Error', message: msg, details: error.stack}
}

/**
 * Print an unexpected error to stderr, with the stack in verbose mode.
 */
export function printError(error: unknown, options?: {verbose?: boolean}): void {
  const info = categorizeError(error)

  err.line()
  err.line(`${pc.red('✗')} ${pc.bold(pc.red(info.title))}: ${info.message}`)
  if (info.hint) err.line(`  ${pc.dim(info.hint)}`)
  if (options?.verbose && info.details) {
    err.line()
    err.line(pc.dim(info.details))
  }
  err.line()
}

/**
 * Print a one-line error for bad arguments or a rejected request.
 */
export function printSimpleError(message: string, hint?: string): void {
  err.line(`${pc.red('✗')} ${pc.bold('Error:')} ${message}`)
  if (hint) err.line(`  ${pc.dim(hint)}`)
}
