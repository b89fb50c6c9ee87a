import {describe, it, expect, beforeEach, afterEach} from 'vitest'
import {APICallError} from 'ai'
import {MockLanguageModelV1} from 'ai/test'
import {createConversationManager, type ConversationManager} from '../conversation'
import {createInMemoryStorage, type StorageWithDb} from '../storage'
import {Tokens} from '../tokens'
import {createToolRegistry} from '../tool'
import {Result} from '../util/result'
import {createFakeEngine, type FakeEngine, type ScriptStep} from './fake-engine'
import {createOrchestrator} from './orchestrator'
import {createTurnController, FALLBACK_REPLY, type TurnController} from './turn'

describe('TurnController', () => {
  let storage: StorageWithDb
  let conversations: ConversationManager
  let engine: FakeEngine

  beforeEach(() => {
    storage = createInMemoryStorage()
    conversations = createConversationManager({storage, tokens: Tokens.approximate})
  })

  afterEach(() => {
    storage.close()
  })

  function controller(steps: ScriptStep[], manager: ConversationManager = conversations): TurnController {
    engine = createFakeEngine(steps)
    return createTurnController({
      conversations: manager,
      orchestrator: createOrchestrator({engine, model: new MockLanguageModelV1(), systemPrompt: 'SYSTEM'}),
      tools: createToolRegistry({tasks: storage.tasks}),
    })
  }

  async function transcript(conversationId: number) {
    const history = await conversations.getConversationHistory(conversationId, 'u1')
    return history.ok ? history.value : []
  }

  it('replies directly when no tools are requested', async () => {
    const turns = controller([{text: 'Hello!', finishReason: 'stop'}])

    const result = await turns.handleTurn({userId: 'u1', message: 'Hi'})

    if (!result.ok) throw new Error(result.error.message)
    expect(result.value.conversationId).toBe(1)
    expect(result.value.response).toBe('Hello!')
    expect(result.value.toolCalls).toBeUndefined()
    expect(result.value.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T/)

    expect(engine.requests).toHaveLength(1)
    expect(Object.keys(engine.requests[0].tools ?? {}).sort()).toEqual([
      'add_task',
      'complete_task',
      'delete_task',
      'list_tasks',
      'update_task',
    ])
    expect(await transcript(1)).toEqual([
      {role: 'user', content: 'Hi'},
      {role: 'assistant', content: 'Hello!'},
    ])
  })

  it('runs tools and asks for a follow-up reply when the first pass has no text', async () => {
    const turns = controller([
      {finishReason: 'tool_calls', toolCalls: [{id: 'call_1', name: 'add_task', arguments: '{"title":"Buy milk"}'}]},
      {text: "I've added 'Buy milk' to your list."},
    ])

    const result = await turns.handleTurn({userId: 'u1', message: 'I need to buy milk'})

    if (!result.ok) throw new Error(result.error.message)
    expect(result.value.response).toBe("I've added 'Buy milk' to your list.")
    expect(result.value.toolCalls).toMatchObject([
      {toolCallId: 'call_1', tool: 'add_task', result: {success: true, task: {title: 'Buy milk', user_id: 'u1'}}},
    ])
    expect(storage.tasks.list('u1', {filter: 'pending', limit: 10, offset: 0}).total).toBe(1)

    const followUp = engine.requests[1]
    expect(followUp.tools).toBeUndefined()
    expect(followUp.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool'])
    expect(followUp.messages[1]).toEqual({role: 'user', content: 'I need to buy milk'})

    expect(await transcript(result.value.conversationId)).toEqual([
      {role: 'user', content: 'I need to buy milk'},
      {role: 'assistant', content: "I've added 'Buy milk' to your list."},
    ])
  })

  it('passes a large tool result to the follow-up in full', async () => {
    for (let i = 0; i < 50; i++) {
      storage.tasks.create({userId: 'u1', title: `Task ${i}`, description: 'd'.repeat(300)})
    }
    const turns = controller([
      {finishReason: 'tool_calls', toolCalls: [{id: 'call_1', name: 'list_tasks', arguments: '{"filter":"all"}'}]},
      {text: 'You have 50 tasks.'},
    ])

    const result = await turns.handleTurn({userId: 'u1', message: 'Show all my tasks'})

    expect(result.ok && result.value.response).toBe('You have 50 tasks.')
    const followUp = engine.requests[1]
    expect(followUp.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool'])
    expect(followUp.messages[1]).toEqual({role: 'user', content: 'Show all my tasks'})
    const toolMessage = followUp.messages[3]
    if (toolMessage.role !== 'tool') throw new Error('expected a tool message')
    const [part] = toolMessage.content
    expect(JSON.parse(String(part?.result))).toMatchObject({success: true, total: 50, has_more: false})
  })

  it('uses the first pass text when it came with tool calls', async () => {
    const turns = controller([
      {
        text: 'Done, both are on your list.',
        finishReason: 'tool_calls',
        toolCalls: [
          {id: 'call_1', name: 'add_task', arguments: '{"title":"A"}'},
          {id: 'call_2', name: 'add_task', arguments: '{"title":"B"}'},
        ],
      },
    ])

    const result = await turns.handleTurn({userId: 'u1', message: 'Add A and B'})

    expect(result.ok && result.value.response).toBe('Done, both are on your list.')
    expect(result.ok && result.value.toolCalls?.map((o) => o.toolCallId)).toEqual(['call_1', 'call_2'])
    expect(engine.requests).toHaveLength(1)
  })

  it('keeps going when one tool call fails', async () => {
    const turns = controller([
      {
        finishReason: 'tool_calls',
        toolCalls: [
          {id: 'call_1', name: 'delete_task', arguments: '{"task_id":42}'},
          {id: 'call_2', name: 'add_task', arguments: '{"title":"Still added"}'},
        ],
      },
      {text: 'Partly done.'},
    ])

    const result = await turns.handleTurn({userId: 'u1', message: 'Delete 42 and add a task'})

    expect(result.ok && result.value.toolCalls).toMatchObject([
      {tool: 'delete_task', result: {success: false, error: 'NotFoundError'}},
      {tool: 'add_task', result: {success: true}},
    ])
  })

  it('falls back to a generic reply when the follow-up is empty', async () => {
    const turns = controller([
      {finishReason: 'tool_calls', toolCalls: [{id: 'call_1', name: 'list_tasks', arguments: '{}'}]},
      {text: ''},
    ])

    const result = await turns.handleTurn({userId: 'u1', message: 'What is on my list?'})

    expect(result.ok && result.value.response).toBe(FALLBACK_REPLY)
  })

  it('returns and stores an apology when the provider fails', async () => {
    const unavailable = new APICallError({
      message: 'Service Unavailable',
      url: 'https://api.example.test/v1/messages',
      requestBodyValues: {},
      statusCode: 503,
    })
    const turns = controller([unavailable])

    const result = await turns.handleTurn({userId: 'u1', message: 'Hi'})

    expect(result.ok && result.value.response).toBe("I'm temporarily unavailable. Please try again shortly.")
    expect(await transcript(1)).toEqual([
      {role: 'user', content: 'Hi'},
      {role: 'assistant', content: "I'm temporarily unavailable. Please try again shortly."},
    ])
  })

  it('continues an existing conversation with its history', async () => {
    const first = controller([{text: 'Hello!'}])
    const opened = await first.handleTurn({userId: 'u1', message: 'Hi'})
    if (!opened.ok) throw new Error(opened.error.message)

    const second = controller([{text: 'Sure.'}])
    await second.handleTurn({userId: 'u1', message: 'Again', conversationId: opened.value.conversationId})

    expect(engine.requests[0].messages).toEqual([
      {role: 'system', content: 'SYSTEM'},
      {role: 'user', content: 'Hi'},
      {role: 'assistant', content: 'Hello!'},
      {role: 'user', content: 'Again'},
    ])
  })

  it.each([
    ['   ', 'Message cannot be empty'],
    ['x'.repeat(10_001), 'Message must be 10,000 characters or less'],
  ])('rejects an invalid message before any model call', async (message, expected) => {
    const turns = controller([{text: 'never'}])

    const result = await turns.handleTurn({userId: 'u1', message})

    expect(result).toEqual({ok: false, error: {kind: 'ValidationError', message: expected}})
    expect(engine.requests).toHaveLength(0)
    expect(storage.conversations.get(1)).toBeNull()
  })

  it('hides conversations owned by someone else', async () => {
    const owned = await conversations.createConversation('u2')
    if (!owned.ok) throw new Error(owned.error.message)
    const turns = controller([{text: 'never'}])

    const result = await turns.handleTurn({userId: 'u1', message: 'Hi', conversationId: owned.value.id})

    expect(result).toEqual({ok: false, error: {kind: 'NotFound', message: 'Conversation not found'}})
    expect(engine.requests).toHaveLength(0)
  })

  it('reports a missing conversation the same way', async () => {
    const turns = controller([{text: 'never'}])
    const result = await turns.handleTurn({userId: 'u1', message: 'Hi', conversationId: 404})
    expect(result).toEqual({ok: false, error: {kind: 'NotFound', message: 'Conversation not found'}})
  })

  it('still replies when the transcript cannot be stored', async () => {
    const failing: ConversationManager = {
      ...conversations,
      storeMessage: async () => Result.err({kind: 'DatabaseError', message: 'Failed to store message'}),
    }
    const turns = controller([{text: 'Hello!'}], failing)

    const result = await turns.handleTurn({userId: 'u1', message: 'Hi'})

    expect(result.ok && result.value.response).toBe('Hello!')
    expect(storage.conversations.countMessages(1)).toBe(0)
  })

  it('stores an overlong reply truncated to the message limit', async () => {
    const turns = controller([{text: 'y'.repeat(10_050)}])

    const result = await turns.handleTurn({userId: 'u1', message: 'Write a lot'})

    expect(result.ok && result.value.response.length).toBe(10_050)
    const [, reply] = storage.conversations.recentMessages(1, {limit: 2}).reverse()
    expect(reply.content).toHaveLength(10_000)
  })
})
