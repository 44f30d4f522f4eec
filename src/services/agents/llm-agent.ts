// LLM Agent
// An agent whose replies come from a chat-completions provider with the agent's tools attached

import type { Logger } from '../../utils/logger.js';
import { AgentError, errorMessage } from '../../utils/errors.js';
import type { Provider, ProviderMessage, ProviderResponse, ProviderTool, ToolCall } from '../../providers/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolArguments } from '../tools/types.js';
import type { Agent, AgentDescriptor, AgentReply, Message, ToolCallRequest } from '../orchestrator/types.js';
import { isRecord, parseToolCallsFromText, stripReasoning } from './parser.js';
import { buildAgentSystemPrompt } from './prompts.js';

export interface LlmAgentOptions {
  descriptor: AgentDescriptor;
  provider: Provider;
  registry: ToolRegistry;
  model: string;
  temperature?: number;
  maxTokens?: number;
  logger: Logger;
}

// Provider-side id of a conversation tool call
function providerCallId(id: number): string {
  return `call_${id}`;
}

/**
 * Render the shared transcript from one agent's point of view: its own turns
 * are assistant messages, results of its own tool calls are tool messages, and
 * everything else arrives as user text prefixed with the speaker's name.
 */
export function toProviderMessages(descriptor: AgentDescriptor, history: readonly Message[]): ProviderMessage[] {
  const messages: ProviderMessage[] = [{ role: 'system', content: buildAgentSystemPrompt(descriptor) }];
  let requester: string | null = null;

  for (const message of history) {
    switch (message.role) {
      case 'user':
        messages.push({ role: 'user', content: message.content });
        break;

      case 'agent':
        requester = message.speaker;
        if (message.speaker === descriptor.name) {
          const assistant: ProviderMessage = { role: 'assistant', content: message.content };
          if (message.toolCalls && message.toolCalls.length > 0) {
            assistant.tool_calls = message.toolCalls.map(call => ({
              id: providerCallId(call.id),
              name: call.name,
              arguments: JSON.stringify(call.arguments),
            }));
          }
          messages.push(assistant);
        } else if (message.content.trim()) {
          messages.push({ role: 'user', content: `${message.speaker}: ${message.content}` });
        }
        break;

      case 'tool':
        if (requester === descriptor.name && message.toolCall) {
          messages.push({
            role: 'tool',
            content: message.content,
            tool_call_id: providerCallId(message.toolCall.id),
            name: message.toolCall.name,
          });
        } else {
          messages.push({ role: 'user', content: `Result of ${message.speaker}: ${message.content}` });
        }
        break;

      case 'system':
        messages.push({ role: 'user', content: `system: ${message.content}` });
        break;
    }
  }

  return messages;
}

export class LlmAgent implements Agent {
  readonly descriptor: AgentDescriptor;
  private readonly provider: Provider;
  private readonly registry: ToolRegistry;
  private readonly model: string;
  private readonly temperature: number | undefined;
  private readonly maxTokens: number | undefined;
  private readonly logger: Logger;

  constructor(options: LlmAgentOptions) {
    this.descriptor = options.descriptor;
    this.provider = options.provider;
    this.registry = options.registry;
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.logger = options.logger.child({ agent: options.descriptor.name });
  }

  async respond(history: readonly Message[], signal?: AbortSignal): Promise<AgentReply> {
    const tools: ProviderTool[] = this.registry
      .toOpenAIFunctions(this.descriptor.tools)
      .map(fn => ({ type: 'function' as const, function: fn }));

    let response: ProviderResponse;
    try {
      response = await this.provider.sendChat(toProviderMessages(this.descriptor, history), {
        model: this.model,
        temperature: this.temperature,
        maxTokens: this.maxTokens,
        signal,
        tools: tools.length > 0 ? tools : undefined,
      });
    } catch (error) {
      throw new AgentError(this.descriptor.name, errorMessage(error));
    }

    this.logger.debug(
      { toolCalls: response.toolCalls.length, totalTokens: response.usage.totalTokens },
      'Model responded',
    );

    if (response.toolCalls.length > 0) {
      return {
        content: stripReasoning(response.content),
        toolCalls: response.toolCalls.map(call => this.toRequest(call)),
      };
    }

    const parsed = parseToolCallsFromText(response.content);
    return { content: parsed.text, toolCalls: parsed.calls };
  }

  private toRequest(call: ToolCall): ToolCallRequest {
    return { name: call.name, arguments: this.parseArguments(call) };
  }

  private parseArguments(call: ToolCall): ToolArguments {
    if (!call.arguments.trim()) return {};

    let parsed: unknown;
    try {
      parsed = JSON.parse(call.arguments);
    } catch (error) {
      throw new AgentError(this.descriptor.name, `invalid arguments for tool "${call.name}": ${errorMessage(error)}`);
    }

    if (!isRecord(parsed)) {
      throw new AgentError(this.descriptor.name, `arguments for tool "${call.name}" must be a JSON object`);
    }
    return parsed;
  }
}
