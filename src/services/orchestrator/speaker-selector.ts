// Speaker Selector
// Picks the next agent from the decision function's answer, with deterministic fallbacks

import type { Logger } from '../../utils/logger.js';
import { errorMessage, OrchestrationError } from '../../utils/errors.js';
import { withTimeout } from '../../utils/timeout.js';
import type { AgentDescriptor, Message, SpeakerAnswer, SpeakerDecision } from './types.js';

export function lastAgentSpeaker(history: readonly Message[]): string | null {
  for (let i = history.length - 1; i >= 0; i--) {
    if (history[i].role === 'agent') return history[i].speaker;
  }
  return null;
}

/**
 * Number of turns `name` has taken in a row at the end of the history.
 * Tool results belong to the turn that requested them; any other speaker ends the run.
 */
export function consecutiveTurns(history: readonly Message[], name: string): number {
  let turns = 0;
  for (let i = history.length - 1; i >= 0; i--) {
    const message = history[i];
    if (message.role === 'tool') continue;
    if (message.role !== 'agent' || message.speaker !== name) break;
    turns++;
  }
  return turns;
}

export function eligibleAgents(history: readonly Message[], agents: readonly AgentDescriptor[]): AgentDescriptor[] {
  return agents.filter(
    agent => agent.maxConsecutiveTurns === undefined || consecutiveTurns(history, agent.name) < agent.maxConsecutiveTurns,
  );
}

function normalizeAnswer(answer: SpeakerAnswer): { name: string; repeat: boolean } | null {
  if (answer === null) return null;
  if (typeof answer === 'string') return { name: answer.trim(), repeat: false };
  return { name: answer.name.trim(), repeat: answer.repeat === true };
}

/**
 * Resolve the decision function's answer into the next speaker, or null when
 * no agent is eligible.
 *
 * An answer naming an eligible agent wins, except that the previous speaker
 * is only chosen again when the answer forces a repeat or no other agent is
 * eligible. Anything else falls through to round-robin in registration order,
 * starting after the previous speaker.
 */
export function resolveSpeaker(
  history: readonly Message[],
  agents: readonly AgentDescriptor[],
  answer: SpeakerAnswer,
): string | null {
  const eligible = eligibleAgents(history, agents);
  if (eligible.length === 0) return null;

  const previous = lastAgentSpeaker(history);
  const isEligible = (name: string) => eligible.some(agent => agent.name === name);
  const allowed = (name: string) => isEligible(name) && (name !== previous || eligible.length < 2);

  const requested = normalizeAnswer(answer);
  if (requested && isEligible(requested.name) && (requested.repeat || allowed(requested.name))) {
    return requested.name;
  }

  const start = previous === null ? -1 : agents.findIndex(agent => agent.name === previous);
  for (let step = 1; step <= agents.length; step++) {
    const candidate = agents[(start + step + agents.length) % agents.length];
    if (allowed(candidate.name)) return candidate.name;
  }

  return null;
}

export interface SpeakerSelectorOptions {
  decide: SpeakerDecision;
  logger: Logger;
  /** Bound on one decision; the model-backed decision calls the language model */
  timeoutMs?: number;
}

const DEFAULT_DECISION_TIMEOUT_MS = 120_000;

export class SpeakerSelector {
  private readonly decide: SpeakerDecision;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: SpeakerSelectorOptions) {
    this.decide = options.decide;
    this.logger = options.logger.child({ component: 'speaker-selector' });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DECISION_TIMEOUT_MS;
  }

  /**
   * Next speaker, or null when nobody is eligible.
   * Throws OrchestrationError when the decision function fails.
   */
  async select(history: readonly Message[], agents: readonly AgentDescriptor[]): Promise<string | null> {
    if (eligibleAgents(history, agents).length === 0) {
      return null;
    }

    let answer: SpeakerAnswer;
    try {
      answer = await withTimeout(
        signal => this.decide(history, agents, signal),
        this.timeoutMs,
        () => new Error(`no decision within ${this.timeoutMs}ms`),
      );
    } catch (error) {
      throw new OrchestrationError(`Speaker selection failed: ${errorMessage(error)}`);
    }

    const speaker = resolveSpeaker(history, agents, answer);
    this.logger.debug({ answer, speaker }, 'Speaker selected');
    return speaker;
  }
}
