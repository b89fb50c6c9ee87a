/**
 * Wires the core services for one CLI process.
 */

import {createConversationManager, type ConversationManager} from '../conversation'
import {Config} from '../config'
import {createOrchestrator, createTurnController, type TurnController} from '../agent'
import {Provider} from '../provider'
import {createStorage, type Storage} from '../storage'
import {Tokens} from '../tokens'
import {createToolRegistry} from '../tool'

export interface App {
  config: Config.Config
  storage: Storage
  conversations: ConversationManager
  turns: TurnController
  close(): void
}

export interface AppOptions {
  config: Config.Config
  /** Defaults to a SQLite file at `config.db` */
  storage?: Storage
  /** Defaults to the Anthropic-backed engine */
  engine?: Provider.CompletionEngine
}

export function createApp({config, storage = createStorage(config.db), engine}: AppOptions): App {
  const conversations = createConversationManager({
    storage,
    tokens: Tokens.create({exact: true}),
    maxHistoryMessages: config.history.maxMessages,
    maxContextTokens: config.history.maxContextTokens,
  })

  const orchestrator = createOrchestrator({
    engine: engine ?? Provider.createEngine({maxRetries: config.maxRetries, maxTokens: config.maxOutputTokens}),
    model: Provider.getModel(config.model),
    temperature: config.temperature,
    maxHistoryTokens: config.history.maxContextTokens,
  })

  const turns = createTurnController({
    conversations,
    orchestrator,
    tools: createToolRegistry({tasks: storage.tasks}),
  })

  return {
    config,
    storage,
    conversations,
    turns,
    close: () => storage.close(),
  }
}
