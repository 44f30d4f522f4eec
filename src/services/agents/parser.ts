// Text tool-call parser
// Extracts {"tool": ..., "args": ...} requests from models that answer in text instead of native tool calls

import type { ToolArguments } from '../tools/types.js';
import type { ToolCallRequest } from '../orchestrator/types.js';

export interface ParsedText {
  /** Response text with the tool-call JSON removed */
  text: string;
  calls: ToolCallRequest[];
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Index just past the brace that closes the object opening at `start`, or -1
function findObjectEnd(source: string, start: number): number {
  let depth = 0;
  let inString = false;

  for (let i = start; i < source.length; i++) {
    const char = source[i];
    if (inString) {
      if (char === '\\') i++;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }

  return -1;
}

function toArguments(value: unknown): ToolArguments | null {
  if (value === undefined) return {};
  if (isRecord(value)) return value;
  if (typeof value === 'string') {
    try {
      const parsed: unknown = JSON.parse(value);
      return isRecord(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }
  return null;
}

function toToolCall(candidate: string): ToolCallRequest | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch {
    return null;
  }

  if (!isRecord(parsed) || typeof parsed.tool !== 'string' || !parsed.tool.trim()) {
    return null;
  }

  const args = toArguments(parsed.args);
  return args ? { name: parsed.tool.trim(), arguments: args } : null;
}

export function stripReasoning(response: string): string {
  return response
    .replace(/<think>[\s\S]*?<\/think>/gi, '')
    .replace(/<thinking>[\s\S]*?<\/thinking>/gi, '')
    .trim();
}

export function parseToolCallsFromText(response: string): ParsedText {
  const source = stripReasoning(response);
  const calls: ToolCallRequest[] = [];
  let text = '';
  let cursor = 0;
  let i = source.indexOf('{');

  while (i !== -1) {
    const end = findObjectEnd(source, i);
    const call = end === -1 ? null : toToolCall(source.slice(i, end));

    if (call) {
      calls.push(call);
      text += source.slice(cursor, i);
      cursor = end;
      i = source.indexOf('{', end);
    } else {
      i = source.indexOf('{', i + 1);
    }
  }
  text += source.slice(cursor);

  // Code fences left empty by the removed JSON
  text = text.replace(/```(?:json)?\s*```/g, '').trim();

  return { text, calls };
}
