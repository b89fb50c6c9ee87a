import {describe, it, expect, beforeEach, afterEach} from 'vitest'
import {createFakeEngine, type ScriptStep} from '../agent/fake-engine'
import {Config} from '../config'
import {createInMemoryStorage, type StorageWithDb} from '../storage'
import {createApp, type App} from './app'
import {runBatch} from './batch'

describe('runBatch', () => {
  let storage: StorageWithDb

  beforeEach(() => {
    storage = createInMemoryStorage()
  })

  afterEach(() => {
    storage.close()
  })

  function app(steps: ScriptStep[]): App {
    const config = Config.Schema.parse({history: {}, rateLimit: {}})
    return createApp({config, storage, engine: createFakeEngine(steps)})
  }

  it('prints the reply and the conversation id', async () => {
    const result = await runBatch(app([{text: 'Hello!'}]), {prompt: 'Hi', userId: 'u1', format: 'text'})

    expect(result).toEqual({ok: true, value: 'Hello!\n\n(conversation 1)'})
  })

  it('lists each tool that ran under the reply', async () => {
    const result = await runBatch(
      app([
        {
          finishReason: 'tool_calls',
          toolCalls: [
            {id: 'c1', name: 'add_task', arguments: '{"title":"Buy milk"}'},
            {id: 'c2', name: 'complete_task', arguments: '{"task_id":99}'},
          ],
        },
        {text: 'Added it.'},
      ]),
      {prompt: 'Add buy milk', userId: 'u1', format: 'text'},
    )

    expect(result).toEqual({
      ok: true,
      value: [
        'Added it.',
        '[add_task: ok]',
        '[complete_task: NotFoundError (Task not found or does not belong to user)]',
        '',
        '(conversation 1)',
      ].join('\n'),
    })
  })

  it('renders json with snake_case keys', async () => {
    const result = await runBatch(app([{text: 'Hello!'}]), {prompt: 'Hi', userId: 'u1', format: 'json'})

    if (!result.ok) throw new Error(result.error.message)
    expect(JSON.parse(result.value)).toMatchObject({conversation_id: 1, response: 'Hello!', tool_calls: []})
  })

  it('continues an existing conversation', async () => {
    const chat = app([{text: 'First'}, {text: 'Second'}])
    await runBatch(chat, {prompt: 'One', userId: 'u1', format: 'text'})

    const result = await runBatch(chat, {prompt: 'Two', userId: 'u1', conversationId: 1, format: 'text'})

    expect(result).toEqual({ok: true, value: 'Second\n\n(conversation 1)'})
    expect(storage.conversations.countMessages(1)).toBe(4)
  })

  it('reports a foreign conversation as not found', async () => {
    const chat = app([{text: 'Mine'}])
    await runBatch(chat, {prompt: 'One', userId: 'u1', format: 'text'})

    const result = await runBatch(chat, {prompt: 'Peek', userId: 'u2', conversationId: 1, format: 'text'})

    expect(result).toEqual({ok: false, error: {kind: 'NotFound', message: 'Conversation not found'}})
  })

  it('rejects an empty prompt before calling the model', async () => {
    const result = await runBatch(app([]), {prompt: '   ', userId: 'u1', format: 'text'})

    expect(result).toEqual({ok: false, error: {kind: 'ValidationError', message: 'Message cannot be empty'}})
  })
})
