import {describe, it, expect} from 'vitest'
import {LoadAPIKeyError} from 'ai'
import {z} from 'zod'
import {categorizeError} from './error'

describe('categorizeError', () => {
  it('recognizes a missing API key', () => {
    const info = categorizeError(new LoadAPIKeyError({message: 'Anthropic API key is missing.'}))

    expect(info.title).toBe('Missing API Key')
  })

  it('extracts the path from ENOENT', () => {
    const info = categorizeError(new Error("ENOENT: no such file or directory, open '/nope/taskchat.db'"))

    expect(info).toMatchObject({title: 'File Not Found', message: 'Cannot find: /nope/taskchat.db'})
  })

  it('flags configuration errors', () => {
    const parsed = z.object({port: z.number()}).safeParse({port: 'x'})
    if (parsed.success) throw new Error('expected failure')

    expect(categorizeError(parsed.error).title).toBe('Invalid Configuration')
  })

  it('treats SQLite failures as database errors', () => {
    expect(categorizeError(new Error('SQLITE_BUSY: database is locked')).title).toBe('Database Error')
  })

  it('falls back to a generic error with the stack', () => {
    const error = new Error('boom')

    expect(categorizeError(error)).toEqual({title: 'Error', message: 'boom', details: error.stack})
  })

  it('stringifies non-errors', () => {
    expect(categorizeError(42)).toEqual({title: 'Unknown Error', message: '42'})
  })
})
