// Log-based tracing sink
// Emits one structured log line per agent turn and per tool call

import type { Logger } from '../../utils/logger.js';
import type { ConversationTracer } from './types.js';

const PREVIEW_LENGTH = 200;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH)}...` : text;
}

export function createLoggingTracer(logger: Logger): ConversationTracer {
  const trace = logger.child({ component: 'trace' });

  return {
    onTurn(event) {
      trace.info(
        {
          round: event.round,
          speaker: event.speaker,
          toolCalls: event.toolCalls,
          durationMs: event.durationMs,
          content: preview(event.content),
        },
        'Agent turn',
      );
    },
    onToolCall(event) {
      trace.info(
        {
          round: event.round,
          speaker: event.speaker,
          tool: event.call.name,
          id: event.call.id,
          status: event.result.status,
          errorKind: event.result.errorKind,
          source: event.result.metadata?.source,
          durationMs: event.result.metadata?.durationMs,
        },
        'Tool call',
      );
    },
  };
}
