// Orchestrator
// Drives a multi-agent conversation: select a speaker, collect its reply, run its tool calls, repeat

import { randomUUID } from 'node:crypto';
import type { Logger } from '../../utils/logger.js';
import { AgentError, errorMessage, OrchestrationError } from '../../utils/errors.js';
import { withTimeout } from '../../utils/timeout.js';
import type { ToolGateway } from '../gateway/tool-gateway.js';
import { errorResult, type ExecutionResult } from '../tools/types.js';
import { ConversationState } from './conversation-state.js';
import type { SpeakerSelector } from './speaker-selector.js';
import {
  SYSTEM_SPEAKER,
  USER_SPEAKER,
  type Agent,
  type AgentDescriptor,
  type AgentReply,
  type ConversationTracer,
  type ExecuteResult,
  type ToolCallRecord,
} from './types.js';

export const TERMINATE_MARKER = 'TERMINATE';

export interface OrchestratorOptions {
  agents: Agent[];
  gateway: ToolGateway;
  selector: SpeakerSelector;
  logger: Logger;
  maxRounds?: number;
  /** Bound on one agent response */
  agentTimeoutMs?: number;
  tracer?: ConversationTracer;
}

export interface ExecuteOptions {
  /** Checked between turns; a turn in progress always completes */
  signal?: AbortSignal;
}

const DEFAULT_MAX_ROUNDS = 10;
const DEFAULT_AGENT_TIMEOUT_MS = 120_000;

export function isTerminationMessage(content: string): boolean {
  return content.trimEnd().endsWith(TERMINATE_MARKER);
}

function stripTerminateMarker(content: string): string {
  const trimmed = content.trimEnd();
  return isTerminationMessage(trimmed) ? trimmed.slice(0, -TERMINATE_MARKER.length).trimEnd() : trimmed;
}

function toolMessageContent(result: ExecutionResult): string {
  return result.status === 'ok' ? result.output : `Error (${result.errorKind ?? 'ApplicationError'}): ${result.output}`;
}

export function buildExecuteResult(state: ConversationState): ExecuteResult {
  const messages = state.messages;

  const conversation = messages
    .filter(message => message.content.trim() !== '')
    .map(message => ({
      speaker: message.speaker,
      role: message.role,
      content: message.content,
      ...(message.toolCall ? { toolCall: message.toolCall } : {}),
    }));

  const participants: string[] = [];
  for (const message of messages) {
    if (message.role === 'agent' && !participants.includes(message.speaker)) {
      participants.push(message.speaker);
    }
  }

  const lastAnswer = [...messages]
    .reverse()
    .find(message => message.role === 'agent' && stripTerminateMarker(message.content) !== '');

  return {
    conversation,
    participants,
    output: lastAnswer ? stripTerminateMarker(lastAnswer.content) : '',
    rounds: state.round,
    terminationReason: state.terminationReason ?? 'max_rounds',
  };
}

export class Orchestrator {
  private readonly agents = new Map<string, Agent>();
  private readonly descriptors: AgentDescriptor[];
  private readonly gateway: ToolGateway;
  private readonly selector: SpeakerSelector;
  private readonly logger: Logger;
  private readonly maxRounds: number;
  private readonly agentTimeoutMs: number;
  private readonly tracer: ConversationTracer | undefined;

  constructor(options: OrchestratorOptions) {
    if (options.agents.length === 0) {
      throw new OrchestrationError('At least one agent is required');
    }
    for (const agent of options.agents) {
      if (this.agents.has(agent.descriptor.name)) {
        throw new OrchestrationError(`Duplicate agent name "${agent.descriptor.name}"`);
      }
      this.agents.set(agent.descriptor.name, agent);
    }

    this.descriptors = options.agents.map(agent => agent.descriptor);
    this.gateway = options.gateway;
    this.selector = options.selector;
    this.logger = options.logger.child({ component: 'orchestrator' });
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.agentTimeoutMs = options.agentTimeoutMs ?? DEFAULT_AGENT_TIMEOUT_MS;
    this.tracer = options.tracer;
  }

  get agentNames(): string[] {
    return this.descriptors.map(descriptor => descriptor.name);
  }

  /**
   * Run one conversation seeded with `query`.
   *
   * Never rejects: agent and selection failures end the conversation with a
   * system message, and the transcript up to that point is returned.
   */
  async execute(query: string, options: ExecuteOptions = {}): Promise<ExecuteResult> {
    const state = new ConversationState(this.maxRounds);
    const log = this.logger.child({ conversation: randomUUID() });

    state.append({ speaker: USER_SPEAKER, role: 'user', content: query });
    log.info({ query, agents: this.agentNames, maxRounds: this.maxRounds }, 'Conversation started');

    while (!state.terminated) {
      if (state.roundsExhausted) {
        state.terminate('max_rounds');
        break;
      }
      if (options.signal?.aborted) {
        state.terminate('cancelled');
        break;
      }

      const agent = await this.selectSpeaker(state, log);
      if (!agent) break;

      const round = state.startRound();
      const startTime = Date.now();

      const reply = await this.collectReply(agent, state, log);
      if (!reply) break;

      const calls: ToolCallRecord[] = reply.toolCalls.map(call => ({
        id: state.nextToolCallId(),
        name: call.name,
        arguments: call.arguments,
      }));

      state.append({
        speaker: agent.descriptor.name,
        role: 'agent',
        content: reply.content,
        toolCalls: calls.length > 0 ? calls : undefined,
      });

      await this.runToolCalls(agent.descriptor, calls, state, round, log);

      await this.notify(log, () =>
        this.tracer?.onTurn?.({
          round,
          speaker: agent.descriptor.name,
          content: reply.content,
          toolCalls: calls.length,
          durationMs: Date.now() - startTime,
        }),
      );

      if (reply.terminate || isTerminationMessage(reply.content)) {
        state.terminate('terminate_signal');
      }
    }

    const result = buildExecuteResult(state);
    log.info(
      { rounds: result.rounds, reason: result.terminationReason, participants: result.participants },
      'Conversation finished',
    );
    return result;
  }

  private async selectSpeaker(state: ConversationState, log: Logger): Promise<Agent | null> {
    let name: string | null;
    try {
      name = await this.selector.select(state.messages, this.descriptors);
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Speaker selection failed');
      state.append({ speaker: SYSTEM_SPEAKER, role: 'system', content: errorMessage(error) });
      state.terminate('error');
      return null;
    }

    const agent = name === null ? undefined : this.agents.get(name);
    if (!agent) {
      log.info({ round: state.round }, 'No eligible speaker');
      state.terminate('no_eligible_speaker');
      return null;
    }
    return agent;
  }

  private async collectReply(agent: Agent, state: ConversationState, log: Logger): Promise<AgentReply | null> {
    const name = agent.descriptor.name;
    try {
      return await withTimeout(
        signal => agent.respond(state.messages, signal),
        this.agentTimeoutMs,
        () => new AgentError(name, `no response within ${this.agentTimeoutMs}ms`),
      );
    } catch (error) {
      const failure = error instanceof AgentError ? error : new AgentError(name, errorMessage(error));
      log.error({ agent: name, error: failure.message }, 'Agent failed to respond');
      state.append({ speaker: SYSTEM_SPEAKER, role: 'system', content: failure.message });
      state.terminate('error');
      return null;
    }
  }

  private async runToolCalls(
    agent: AgentDescriptor,
    calls: ToolCallRecord[],
    state: ConversationState,
    round: number,
    log: Logger,
  ): Promise<void> {
    for (const call of calls) {
      const result = agent.tools.includes(call.name)
        ? await this.gateway.call(call.name, call.arguments, { id: call.id })
        : errorResult('ValidationError', `Agent "${agent.name}" has no tool named "${call.name}"`);

      log.debug({ tool: call.name, id: call.id, status: result.status, errorKind: result.errorKind }, 'Tool call finished');

      state.append({
        speaker: call.name,
        role: 'tool',
        content: toolMessageContent(result),
        toolCall: call,
        toolResult: result,
      });

      await this.notify(log, () => this.tracer?.onToolCall?.({ round, speaker: agent.name, call, result }));
    }
  }

  private async notify(log: Logger, emit: () => void | Promise<void>): Promise<void> {
    try {
      await emit();
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Tracer failed');
    }
  }
}
