/**
 * Scripted completion engine for tests. Each call consumes the next step;
 * an Error step is thrown instead of returned.
 */

import type {Provider} from '../provider'

export type ScriptStep = Partial<Provider.Completion> | Error

export interface FakeEngine extends Provider.CompletionEngine {
  requests: Provider.CompletionRequest[]
}

export function createFakeEngine(steps: ScriptStep[]): FakeEngine {
  const queue = [...steps]
  const requests: Provider.CompletionRequest[] = []

  return {
    requests,
    async complete(request) {
      requests.push(request)
      const next = queue.shift()
      if (next === undefined) throw new Error(`unexpected completion call #${requests.length}`)
      if (next instanceof Error) throw next
      return {text: '', finishReason: 'stop', toolCalls: [], ...next}
    },
  }
}
