import type { ZodRawShape } from 'zod';

export type ToolTextContent = { type: 'text'; text: string };

export type ToolCallResult = {
  content: ToolTextContent[];
  isError?: boolean;
};

export interface WorkflowTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ZodRawShape;
  execute(args: Record<string, unknown>): Promise<ToolCallResult>;
}
