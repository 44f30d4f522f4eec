// OpenAI-compatible Provider
// Chat completions with function calling; works against Ollama, vLLM, LM Studio and the OpenAI API

import { z } from 'zod';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ToolCall } from './types.js';

export interface OpenAICompatibleConfig {
  name: string;
  baseUrl: string;
  apiKey: string;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().optional(),
                function: z.object({
                  name: z.string(),
                  // Ollama returns the arguments as an object
                  arguments: z.union([z.string(), z.record(z.unknown())]).optional(),
                }),
              }),
            )
            .nullish(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .nullish(),
});

type WireMessage = {
  role: ProviderMessage['role'];
  content: string;
  tool_call_id?: string;
  name?: string;
  tool_calls?: Array<{ id: string; type: 'function'; function: { name: string; arguments: string } }>;
};

function toWireMessage(message: ProviderMessage): WireMessage {
  const wire: WireMessage = { role: message.role, content: message.content };
  if (message.role === 'tool') {
    wire.tool_call_id = message.tool_call_id;
    if (message.name) wire.name = message.name;
  }
  if (message.role === 'assistant' && message.tool_calls && message.tool_calls.length > 0) {
    wire.tool_calls = message.tool_calls.map(call => ({
      id: call.id,
      type: 'function' as const,
      function: { name: call.name, arguments: call.arguments },
    }));
  }
  return wire;
}

export class OpenAICompatibleProvider implements Provider {
  name: string;
  private baseUrl: string;
  private apiKey: string;

  constructor(config: OpenAICompatibleConfig) {
    this.name = config.name;
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const hasTools = options.tools !== undefined && options.tools.length > 0;

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: options.model,
        messages: messages.map(toWireMessage),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        stream: false,
        tools: hasTools ? options.tools : undefined,
        tool_choice: hasTools ? options.tool_choice ?? 'auto' : undefined,
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${this.name} API error: ${response.status} - ${error}`);
    }

    const data = ChatCompletionSchema.parse(await response.json());
    const message = data.choices[0].message;

    const toolCalls: ToolCall[] = (message.tool_calls ?? []).map((call, i) => ({
      id: call.id || `call_${i}`,
      name: call.function.name,
      arguments:
        typeof call.function.arguments === 'string'
          ? call.function.arguments
          : JSON.stringify(call.function.arguments ?? {}),
    }));

    return {
      content: message.content || '',
      toolCalls,
      usage: {
        promptTokens: data.usage?.prompt_tokens || 0,
        completionTokens: data.usage?.completion_tokens || 0,
        totalTokens: data.usage?.total_tokens || 0,
      },
    };
  }
}
