import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest'
import {createFakeEngine} from '../agent/fake-engine'
import {Config} from '../config'
import {createInMemoryStorage, type StorageWithDb} from '../storage'
import {createApp, type App} from './app'
import {runDelete, runList, runMessages} from './inspect'

describe('history commands', () => {
  let storage: StorageWithDb
  let app: App

  beforeEach(() => {
    vi.useFakeTimers({toFake: ['Date']})
    vi.setSystemTime(new Date('2026-01-05T10:00:00.000Z'))
    storage = createInMemoryStorage()
    app = createApp({config: Config.Schema.parse({history: {}, rateLimit: {}}), storage, engine: createFakeEngine([])})
  })

  afterEach(() => {
    storage.close()
    vi.useRealTimers()
  })

  async function seed(userId: string, contents: string[]): Promise<number> {
    const created = await app.conversations.createConversation(userId)
    if (!created.ok) throw new Error(created.error.message)
    contents.forEach((content, i) => {
      storage.conversations.insertMessage({
        conversationId: created.value.id,
        userId,
        role: i % 2 === 0 ? 'user' : 'assistant',
        content,
      })
    })
    return created.value.id
  }

  it('lists only the caller’s conversations with message counts', async () => {
    await seed('u1', ['a', 'b'])
    await seed('u2', ['c'])
    await seed('u1', ['d'])

    const result = await runList(app, {userId: 'u1', format: 'text', sortBy: 'created_at', order: 'asc'})

    expect(result).toEqual({
      ok: true,
      value: [
        '#1  2 messages  updated 2026-01-05T10:00:00.000Z',
        '#3  1 message  updated 2026-01-05T10:00:00.000Z',
      ].join('\n'),
    })
  })

  it('says so when there are no conversations', async () => {
    expect(await runList(app, {userId: 'nobody', format: 'text'})).toEqual({ok: true, value: 'No conversations yet.'})
  })

  it('rejects an out-of-range list limit', async () => {
    const result = await runList(app, {userId: 'u1', format: 'text', limit: 101})

    expect(result).toEqual({
      ok: false,
      error: {kind: 'ValidationError', message: 'Limit must be an integer between 1 and 100'},
    })
  })

  it('prints messages oldest first', async () => {
    const id = await seed('u1', ['Add milk', 'Done!'])

    const result = await runMessages(app, {userId: 'u1', conversationId: id, format: 'text'})

    expect(result).toEqual({
      ok: true,
      value: ['[2026-01-05T10:00:00.000Z] user: Add milk', '[2026-01-05T10:00:00.000Z] assistant: Done!'].join('\n'),
    })
  })

  it('pages messages with limit and offset', async () => {
    const id = await seed('u1', ['one', 'two', 'three'])

    const result = await runMessages(app, {userId: 'u1', conversationId: id, format: 'json', limit: 1, offset: 1})

    if (!result.ok) throw new Error(result.error.message)
    expect(JSON.parse(result.value)).toMatchObject({
      conversation_id: id,
      messages: [{role: 'assistant', content: 'two'}],
    })
  })

  it('refuses to print another user’s messages', async () => {
    const id = await seed('u1', ['secret'])

    const result = await runMessages(app, {userId: 'u2', conversationId: id, format: 'text'})

    expect(result).toEqual({
      ok: false,
      error: {kind: 'Unauthorized', message: `Unauthorized access to conversation ${id}`},
    })
  })

  it('deletes a conversation and reports the message count', async () => {
    const id = await seed('u1', ['a', 'b', 'c'])

    const result = await runDelete(app, {userId: 'u1', conversationId: id, format: 'text'})

    expect(result).toEqual({ok: true, value: `Deleted conversation ${id} (3 messages)`})
    expect(storage.conversations.get(id)).toBeNull()
  })

  it('reports a missing conversation on delete', async () => {
    const result = await runDelete(app, {userId: 'u1', conversationId: 42, format: 'text'})

    expect(result).toEqual({ok: false, error: {kind: 'NotFound', message: 'Conversation 42 not found'}})
  })
})
