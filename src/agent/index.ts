/**
 * Chat agent: the orchestrator that talks to the model and the turn
 * controller that drives one user message through it.
 */

export {
  createOrchestrator,
  type AgentMessage,
  type AgentResult,
  type Orchestrator,
  type OrchestratorOptions,
  type ProcessMessageInput,
  type ToolExchange,
} from './orchestrator'
export {
  createTurnController,
  FALLBACK_REPLY,
  type TurnController,
  type TurnControllerOptions,
  type TurnError,
  type TurnErrorKind,
  type TurnRequest,
  type TurnResponse,
} from './turn'
export {SYSTEM_PROMPT} from './system-prompt'
