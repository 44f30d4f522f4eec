// Agent Factory
// Builds LLM agents from descriptors after checking that every tool they reference is registered

import type { Logger } from '../../utils/logger.js';
import { ToolRegistrationError } from '../../utils/errors.js';
import type { Provider } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { Agent, AgentDescriptor } from '../orchestrator/types.js';
import { LlmAgent } from './llm-agent.js';
import { DEFAULT_AGENT_DESCRIPTORS } from './prompts.js';

export interface AgentFactoryOptions {
  registry: ToolRegistry;
  provider: Provider;
  model: string;
  temperature?: number;
  /** Applied to descriptors that do not set their own limit */
  maxConsecutiveTurns?: number;
  logger: Logger;
}

export class AgentFactory {
  private readonly options: AgentFactoryOptions;
  private readonly logger: Logger;

  constructor(options: AgentFactoryOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'agent-factory' });
  }

  create(descriptor: AgentDescriptor): Agent {
    const missing = descriptor.tools.filter(tool => !this.options.registry.has(tool));
    if (missing.length > 0) {
      throw new ToolRegistrationError(missing.join(', '), `not found in registry (required by agent "${descriptor.name}")`);
    }

    const resolved: AgentDescriptor = {
      ...descriptor,
      maxConsecutiveTurns: descriptor.maxConsecutiveTurns ?? this.options.maxConsecutiveTurns,
    };

    this.logger.info({ agent: resolved.name, tools: resolved.tools }, 'Creating agent');

    return new LlmAgent({
      descriptor: resolved,
      provider: this.options.provider,
      registry: this.options.registry,
      model: this.options.model,
      temperature: this.options.temperature,
      logger: this.options.logger,
    });
  }

  /**
   * The default agents whose names are listed, in the default order.
   * All of them when no names are given.
   */
  createDefaultAgents(names?: string[]): Agent[] {
    const descriptors = names
      ? DEFAULT_AGENT_DESCRIPTORS.filter(descriptor => names.includes(descriptor.name))
      : DEFAULT_AGENT_DESCRIPTORS;
    return descriptors.map(descriptor => this.create(descriptor));
  }
}
