import type { ToolCallResponse } from '../types/tools.js';

/**
 * Serialize a tool result as pretty-printed JSON text content
 */
export function jsonResponse(result: unknown): ToolCallResponse {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(result, null, 2),
    }],
  };
}

export function errorResponse(error: string, details: Record<string, unknown> = {}): ToolCallResponse {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify({ error, ...details }, null, 2),
    }],
    isError: true,
  };
}
