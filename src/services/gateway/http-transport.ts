// HTTP transport for tool-call envelopes
// POSTs one envelope per call with a bounded timeout

import { ToolTransportError } from '../../utils/errors.js';
import type { ToolCallRequest } from './protocol.js';

export interface TransportReply {
  status: number;
  /** Parsed JSON body, or undefined when the body was not JSON */
  body: unknown;
}

export interface ToolTransport {
  send(endpoint: string, request: ToolCallRequest, timeoutMs: number): Promise<TransportReply>;
  checkHealth(endpoint: string, timeoutMs: number): Promise<boolean>;
}

function describeFetchFailure(error: unknown, timeoutMs: number): string {
  if (error instanceof Error) {
    if (error.name === 'TimeoutError' || error.name === 'AbortError') {
      return `no response within ${timeoutMs}ms`;
    }
    // undici wraps the socket error (ECONNREFUSED, ENOTFOUND, ...) in `cause`
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

// The health probe lives beside the tool endpoint: http://host:8080/mcp -> http://host:8080/health
export function healthUrlFor(endpoint: string): string {
  return new URL('/health', endpoint).toString();
}

export class HttpToolTransport implements ToolTransport {
  async send(endpoint: string, request: ToolCallRequest, timeoutMs: number): Promise<TransportReply> {
    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new ToolTransportError(endpoint, describeFetchFailure(error, timeoutMs));
    }

    let raw: string;
    try {
      raw = await response.text();
    } catch (error) {
      throw new ToolTransportError(endpoint, describeFetchFailure(error, timeoutMs));
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      body = undefined;
    }

    return { status: response.status, body };
  }

  async checkHealth(endpoint: string, timeoutMs: number): Promise<boolean> {
    try {
      const response = await fetch(healthUrlFor(endpoint), {
        method: 'GET',
        signal: AbortSignal.timeout(timeoutMs),
      });
      return response.ok;
    } catch {
      return false;
    }
  }
}
