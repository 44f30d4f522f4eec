// Model-backed speaker decision
// Asks the language model which role should speak next

import type { Logger } from '../../utils/logger.js';
import type { Provider } from '../../providers/types.js';
import type { AgentDescriptor, Message, SpeakerAnswer, SpeakerDecision } from '../orchestrator/types.js';
import { lastAgentSpeaker } from '../orchestrator/speaker-selector.js';
import { buildSpeakerSelectionPrompt } from './prompts.js';
import { stripReasoning } from './parser.js';

export interface ModelSpeakerDecisionOptions {
  provider: Provider;
  model: string;
  logger: Logger;
  /** Messages of recent history shown to the model */
  contextMessages?: number;
}

const DEFAULT_CONTEXT_MESSAGES = 6;
const MAX_CONTEXT_CHARS = 1000;

/**
 * Find the agent the model named. An exact answer wins; otherwise the
 * earliest agent name mentioned in the text.
 */
export function matchAgentName(text: string, agents: readonly AgentDescriptor[]): string | null {
  const answer = stripReasoning(text).replace(/[`'"*]/g, '').trim();
  const exact = agents.find(agent => agent.name === answer);
  if (exact) return exact.name;

  let best: { name: string; index: number } | null = null;
  for (const agent of agents) {
    const index = answer.indexOf(agent.name);
    if (index !== -1 && (best === null || index < best.index)) {
      best = { name: agent.name, index };
    }
  }
  return best ? best.name : null;
}

function renderTranscript(history: readonly Message[], limit: number): string {
  return history
    .slice(-limit)
    .filter(message => message.content.trim() !== '')
    .map(message => `${message.speaker}: ${message.content.slice(0, MAX_CONTEXT_CHARS)}`)
    .join('\n\n');
}

export function createModelSpeakerDecision(options: ModelSpeakerDecisionOptions): SpeakerDecision {
  const logger = options.logger.child({ component: 'speaker-decision' });
  const contextMessages = options.contextMessages ?? DEFAULT_CONTEXT_MESSAGES;

  return async (history, agents, signal): Promise<SpeakerAnswer> => {
    // Tool results go back to the agent that asked for them
    const last = history[history.length - 1];
    if (last?.role === 'tool') {
      const requester = lastAgentSpeaker(history);
      if (requester) {
        return { name: requester, repeat: true };
      }
    }

    const response = await options.provider.sendChat(
      [
        { role: 'system', content: buildSpeakerSelectionPrompt(agents) },
        { role: 'user', content: renderTranscript(history, contextMessages) },
      ],
      { model: options.model, temperature: 0, maxTokens: 32, signal },
    );

    const name = matchAgentName(response.content, agents);
    if (!name) {
      logger.debug({ answer: response.content }, 'Model named no known agent');
    }
    return name;
  };
}
