import type { ToolCallResult } from '../interfaces/tool.interface';

export function ok(data: unknown): ToolCallResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

export function text(message: string): ToolCallResult {
  return { content: [{ type: 'text', text: message }] };
}

export function err(message: string): ToolCallResult {
  return { content: [{ type: 'text', text: message }], isError: true };
}
