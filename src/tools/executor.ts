/**
 * Tool Executor Factory
 *
 * Validates tool calls against the catalog and forwards them to the tool
 * server through the MCP client. Never throws: every failure comes back
 * as an unsuccessful ToolExecutionResult.
 */

import { errorMessage } from '../types/index.js';
import type {
  ToolDescriptor,
  ToolExecutionResult,
  ToolExecutor,
} from '../types/index.js';

import { parseToolCall } from './catalog.js';
import type { MCPClient } from './types.js';
import { ToolError } from './types.js';

/**
 * Dependencies for creating a tool executor
 */
export interface CreateToolExecutorDeps {
  /** Client for the pricing tool server */
  mcpClient: MCPClient;

  /** Default timeout for one tool call (ms) */
  defaultTimeout: number;
}

export function createToolExecutor(deps: CreateToolExecutorDeps): ToolExecutor {
  const { mcpClient, defaultTimeout } = deps;

  return {
    async listTools(): Promise<ToolDescriptor[]> {
      return mcpClient.listTools();
    },

    async execute(
      toolName: string,
      input: Record<string, unknown>
    ): Promise<ToolExecutionResult> {
      const startTime = Date.now();

      try {
        const call = parseToolCall(toolName, input);
        const result = await mcpClient.callTool(
          call.name,
          { ...call.args },
          defaultTimeout
        );

        if (!result.success) {
          return {
            success: false,
            output: result.output,
            errorMessage: result.errorMessage ?? 'Tool execution failed',
            durationMs: Date.now() - startTime,
          };
        }

        return {
          success: true,
          output: result.output,
          durationMs: Date.now() - startTime,
        };
      } catch (error) {
        const message =
          error instanceof ToolError
            ? error.message
            : errorMessage(error, 'Tool server unavailable');
        return {
          success: false,
          output: {},
          errorMessage: message,
          durationMs: Date.now() - startTime,
        };
      }
    },
  };
}
