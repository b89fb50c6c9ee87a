import {afterEach, describe, expect, test} from 'vitest'
import {Config} from './index'

describe('Config', () => {
  afterEach(() => {
    Config.reset()
  })

  test('applies defaults when the environment is empty', () => {
    const config = Config.get({})
    expect(config.model).toBe('claude-sonnet-4-5-20250929')
    expect(config.temperature).toBe(0.7)
    expect(config.db).toBe('./taskchat.db')
    expect(config.userId).toBe('local')
    expect(config.history).toEqual({maxMessages: 20, maxContextTokens: 4000})
    expect(config.rateLimit).toEqual({perMinute: 20, perHour: 100})
    expect(config.logLevel).toBe('WARN')
  })

  test('reads and coerces environment variables', () => {
    const config = Config.get({
      TASKCHAT_TEMPERATURE: '0.2',
      TASKCHAT_HISTORY_MESSAGES: '10',
      TASKCHAT_CONTEXT_TOKENS: '500',
      TASKCHAT_USER: 'alice',
      TASKCHAT_LOG_LEVEL: 'debug',
    })
    expect(config.temperature).toBe(0.2)
    expect(config.history.maxMessages).toBe(10)
    expect(config.history.maxContextTokens).toBe(500)
    expect(config.userId).toBe('alice')
    expect(config.logLevel).toBe('DEBUG')
  })

  test('caches until reset', () => {
    const first = Config.get({TASKCHAT_USER: 'first'})
    expect(Config.get({TASKCHAT_USER: 'second'})).toBe(first)
    Config.reset()
    expect(Config.get({TASKCHAT_USER: 'second'}).userId).toBe('second')
  })

  test('rejects an out-of-range temperature', () => {
    expect(() => Config.get({TASKCHAT_TEMPERATURE: '3'})).toThrow()
  })
})
