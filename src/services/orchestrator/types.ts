// Orchestrator Types
// Conversation messages, agents and the collaborators the turn loop depends on

import type { ExecutionResult, ToolArguments } from '../tools/types.js';

export type MessageRole = 'user' | 'agent' | 'tool' | 'system';

// Speaker of the seeding message
export const USER_SPEAKER = 'user';
// Speaker of error and notice messages written by the orchestrator
export const SYSTEM_SPEAKER = 'system';

export interface ToolCallRequest {
  name: string;
  arguments: ToolArguments;
}

export interface ToolCallRecord extends ToolCallRequest {
  /** Envelope id, unique within the conversation */
  id: number;
}

export interface Message {
  readonly index: number;
  readonly speaker: string;
  readonly role: MessageRole;
  readonly content: string;
  /** Calls requested by an agent message */
  readonly toolCalls?: readonly ToolCallRecord[];
  /** On tool messages: the request this result answers */
  readonly toolCall?: ToolCallRecord;
  readonly toolResult?: ExecutionResult;
}

export type NewMessage = Omit<Message, 'index'>;

export interface AgentDescriptor {
  name: string;
  /** Instructions that define the agent's role; also shown to the speaker decision */
  directive: string;
  tools: string[];
  maxConsecutiveTurns?: number;
}

export interface AgentReply {
  content: string;
  toolCalls: ToolCallRequest[];
  /** Explicit end of conversation; content ending in TERMINATE has the same effect */
  terminate?: boolean;
}

export interface Agent {
  readonly descriptor: AgentDescriptor;
  respond(history: readonly Message[], signal?: AbortSignal): Promise<AgentReply>;
}

/**
 * What the speaker decision came back with: an agent name, a name with a
 * forced repeat of the previous speaker, or nothing usable.
 */
export type SpeakerAnswer = string | { name: string; repeat?: boolean } | null;

export type SpeakerDecision = (
  history: readonly Message[],
  agents: readonly AgentDescriptor[],
  signal?: AbortSignal,
) => Promise<SpeakerAnswer>;

export type TerminationReason = 'terminate_signal' | 'max_rounds' | 'no_eligible_speaker' | 'error' | 'cancelled';

export interface TurnEvent {
  round: number;
  speaker: string;
  content: string;
  toolCalls: number;
  durationMs: number;
}

export interface ToolCallEvent {
  round: number;
  speaker: string;
  call: ToolCallRecord;
  result: ExecutionResult;
}

// Observability sink; failures are logged and never affect the conversation
export interface ConversationTracer {
  onTurn?(event: TurnEvent): void | Promise<void>;
  onToolCall?(event: ToolCallEvent): void | Promise<void>;
}

export interface ConversationEntry {
  speaker: string;
  role: MessageRole;
  content: string;
  toolCall?: ToolCallRecord;
}

export interface ExecuteResult {
  conversation: ConversationEntry[];
  participants: string[];
  output: string;
  rounds: number;
  terminationReason: TerminationReason;
}
