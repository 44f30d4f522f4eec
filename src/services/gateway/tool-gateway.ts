// Tool Gateway
// Dispatches a tool call to its remote endpoint, falling back to the local handler when the tool did not run

import type { Logger } from '../../utils/logger.js';
import { errorMessage, ToolProtocolError, ToolTransportError } from '../../utils/errors.js';
import type { ToolRegistry } from '../tools/registry.js';
import {
  errorResult,
  okResult,
  type ExecutionResult,
  type ExecutionSource,
  type ToolArguments,
  type ToolDefinition,
} from '../tools/types.js';
import { HttpToolTransport, type ToolTransport } from './http-transport.js';
import { buildToolCallRequest, parseToolCallResponse } from './protocol.js';

export interface ToolGatewayOptions {
  registry: ToolRegistry;
  logger: Logger;
  transport?: ToolTransport;
  /** Bound on one remote call */
  timeoutMs?: number;
  /** Bound on one local handler run */
  localTimeoutMs?: number;
  useFallback?: boolean;
}

export interface CallOptions {
  /** Envelope id; conversations pass their own counter so ids stay unique per conversation */
  id?: number;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class ToolGateway {
  private readonly registry: ToolRegistry;
  private readonly logger: Logger;
  private readonly transport: ToolTransport;
  private readonly timeoutMs: number;
  private readonly localTimeoutMs: number;
  private readonly useFallback: boolean;
  private lastId = 0;

  constructor(options: ToolGatewayOptions) {
    this.registry = options.registry;
    this.logger = options.logger.child({ component: 'tool-gateway' });
    this.transport = options.transport ?? new HttpToolTransport();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.localTimeoutMs = options.localTimeoutMs ?? this.timeoutMs;
    this.useFallback = options.useFallback ?? true;
  }

  hasTool(name: string): boolean {
    return this.registry.has(name);
  }

  async call(toolName: string, args: ToolArguments, options: CallOptions = {}): Promise<ExecutionResult> {
    const tool = this.registry.get(toolName);
    if (!tool) {
      return errorResult('ValidationError', `Tool "${toolName}" not found`);
    }

    if (!tool.endpoint) {
      return this.runLocal(tool, args, 'local');
    }

    const id = options.id ?? ++this.lastId;
    const startTime = Date.now();

    try {
      const output = await this.callRemote(tool, tool.endpoint, id, args);
      if (output.status === 'error') {
        this.logger.info({ tool: toolName, id, error: output.output }, 'Remote tool reported an error');
      }
      return {
        ...output,
        metadata: { ...output.metadata, durationMs: Date.now() - startTime, source: 'remote' },
      };
    } catch (error) {
      const failure =
        error instanceof ToolTransportError || error instanceof ToolProtocolError
          ? error
          : new ToolTransportError(tool.endpoint, errorMessage(error));

      if (tool.execute && this.useFallback) {
        this.logger.warn({ tool: toolName, id, kind: failure.kind, error: failure.message }, 'Remote tool failed, using local fallback');
        return this.runLocal(tool, args, 'fallback');
      }

      this.logger.error({ tool: toolName, id, kind: failure.kind, error: failure.message }, 'Remote tool failed, no fallback');
      return errorResult(failure.kind, failure.message, {
        durationMs: Date.now() - startTime,
        source: 'remote',
      });
    }
  }

  async checkHealth(endpoint: string, timeoutMs = 5000): Promise<boolean> {
    return this.transport.checkHealth(endpoint, timeoutMs);
  }

  /**
   * Resolves with the remote tool's result or its application error.
   * Throws ToolTransportError / ToolProtocolError when the tool did not run.
   */
  private async callRemote(
    tool: ToolDefinition,
    endpoint: string,
    id: number,
    args: ToolArguments,
  ): Promise<ExecutionResult> {
    const request = buildToolCallRequest(id, tool.remoteName ?? tool.name, args);
    const reply = await this.transport.send(endpoint, request, this.timeoutMs);
    const parsed = parseToolCallResponse(reply.body);

    if (typeof parsed === 'string') {
      // Error statuses without an envelope come from proxies or a server that is down
      if (reply.status >= 400) {
        throw new ToolTransportError(endpoint, `HTTP ${reply.status}`);
      }
      throw new ToolProtocolError(endpoint, parsed);
    }

    if (parsed.id !== id) {
      throw new ToolProtocolError(endpoint, `response id ${parsed.id} does not match request id ${id}`);
    }

    if (parsed.kind === 'error') {
      return errorResult('ApplicationError', parsed.error.message, { rpcCode: parsed.error.code });
    }

    return okResult(parsed.text);
  }

  private async runLocal(tool: ToolDefinition, args: ToolArguments, source: ExecutionSource): Promise<ExecutionResult> {
    const startTime = Date.now();

    if (!tool.execute) {
      return errorResult('ValidationError', `Tool "${tool.name}" has no local handler`);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<ExecutionResult>(resolve => {
      timer = setTimeout(
        () => resolve(errorResult('ApplicationError', `Tool "${tool.name}" timed out after ${this.localTimeoutMs}ms`)),
        this.localTimeoutMs,
      );
    });

    try {
      const result = await Promise.race([tool.execute(args), timeout]);
      return {
        ...result,
        metadata: { ...result.metadata, durationMs: Date.now() - startTime, source },
      };
    } catch (error) {
      this.logger.error({ tool: tool.name, error: errorMessage(error) }, 'Local tool handler threw');
      return errorResult('ApplicationError', `Tool "${tool.name}" failed: ${errorMessage(error)}`, {
        durationMs: Date.now() - startTime,
        source,
      });
    } finally {
      clearTimeout(timer);
    }
  }
}
