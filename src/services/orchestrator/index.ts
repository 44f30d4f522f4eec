// Orchestrator Module - Main exports

export { Orchestrator, buildExecuteResult, isTerminationMessage, TERMINATE_MARKER } from './orchestrator.js';
export type { OrchestratorOptions, ExecuteOptions } from './orchestrator.js';
export { ConversationState } from './conversation-state.js';
export {
  SpeakerSelector,
  resolveSpeaker,
  eligibleAgents,
  consecutiveTurns,
  lastAgentSpeaker,
} from './speaker-selector.js';
export type { SpeakerSelectorOptions } from './speaker-selector.js';
export { createLoggingTracer } from './tracing.js';
export * from './types.js';
