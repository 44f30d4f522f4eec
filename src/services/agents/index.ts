// Agents Module - Main exports

export { AgentFactory } from './factory.js';
export type { AgentFactoryOptions } from './factory.js';
export { LlmAgent, toProviderMessages } from './llm-agent.js';
export type { LlmAgentOptions } from './llm-agent.js';
export { createModelSpeakerDecision, matchAgentName } from './speaker-decision.js';
export type { ModelSpeakerDecisionOptions } from './speaker-decision.js';
export { parseToolCallsFromText, stripReasoning } from './parser.js';
export { DEFAULT_AGENT_DESCRIPTORS, buildAgentSystemPrompt, buildSpeakerSelectionPrompt } from './prompts.js';
