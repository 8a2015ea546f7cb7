import { Logger } from '@nestjs/common';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ZodRawShape } from 'zod';
import type { ToolCallResult, WorkflowTool } from '../interfaces/tool.interface';
import { errorMessage } from '../utils/error-utils';
import { err } from './tool-results';

export interface McpServerInfo {
  name: string;
  version: string;
}

const logger = new Logger('McpServer');

/** Registers workflow tools on a new MCP server. Connecting a transport is up to the caller. */
export function createMcpServer(
  tools: readonly WorkflowTool[],
  info: McpServerInfo = { name: 'agent-workflows', version: '0.1.0' },
): McpServer {
  const server = new McpServer(info);

  for (const tool of tools) {
    const handler = async (
      args: Record<string, unknown>,
    ): Promise<ToolCallResult> => {
      try {
        return await tool.execute(args);
      } catch (error) {
        logger.error(`Tool ${tool.name} failed: ${errorMessage(error)}`);
        return err(`${tool.name} failed: ${errorMessage(error)}`);
      }
    };
    // The shape type is pinned: inferring it from a widened ZodRawShape
    // exceeds the compiler's instantiation depth.
    server.tool<ZodRawShape>(tool.name, tool.description, tool.inputSchema, handler);
  }

  return server;
}
