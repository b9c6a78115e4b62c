/**
 * MCP Client
 *
 * Talks to the pricing tool server over the Model Context Protocol.
 * createMCPClient spawns the server as a child process on stdio and
 * connects lazily; connectMCPClient wraps an already chosen transport.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import {
  StdioClientTransport,
  getDefaultEnvironment,
} from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { z } from 'zod';

import { isRecord, tryParseJson } from '../../lib/json.js';
import type { ToolDescriptor } from '../../types/index.js';
import type { MCPClient, MCPServerConfig, MCPToolResult } from '../types.js';

const CLIENT_INFO = { name: 'pricing-scout', version: '0.1.0' };

const callToolResultSchema = z.object({
  content: z
    .array(
      z
        .object({
          type: z.string(),
          text: z.string().optional(),
        })
        .passthrough()
    )
    .default([]),
  isError: z.boolean().optional(),
});

/**
 * Map an MCP tools/call result to our result shape
 *
 * Text content is expected to hold a JSON object; other text is
 * returned as { text }.
 */
export function toToolResult(raw: unknown): MCPToolResult {
  const parsed = callToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      output: {},
      errorMessage: 'Tool server returned a malformed result',
    };
  }

  const text = parsed.data.content
    .filter((item) => item.type === 'text' && item.text !== undefined)
    .map((item) => item.text ?? '')
    .join('\n');

  if (parsed.data.isError === true) {
    return {
      success: false,
      output: {},
      errorMessage: text.replace(/^Error:\s*/, '') || 'Tool execution failed',
    };
  }

  const json = tryParseJson(text);
  return {
    success: true,
    output: isRecord(json) ? json : { text },
  };
}

/**
 * Connect an MCP client over the given transport
 */
export async function connectMCPClient(
  transport: Transport
): Promise<MCPClient> {
  const client = new Client(CLIENT_INFO);
  let connected = false;

  client.onclose = () => {
    connected = false;
  };

  await client.connect(transport);
  connected = true;

  return {
    async listTools(): Promise<ToolDescriptor[]> {
      const { tools } = await client.listTools();
      return tools.map((tool) => ({
        name: tool.name,
        description: tool.description ?? '',
        inputSchema: { ...tool.inputSchema },
      }));
    },

    async callTool(
      toolName: string,
      input: Record<string, unknown>,
      timeout: number
    ): Promise<MCPToolResult> {
      const result = await client.callTool(
        { name: toolName, arguments: input },
        undefined,
        { timeout }
      );
      return toToolResult(result);
    },

    isHealthy(): boolean {
      return connected;
    },

    async close(): Promise<void> {
      connected = false;
      await client.close();
    },
  };
}

/**
 * Environment for the child process: the SDK's safe defaults plus our own
 * variables, so API keys loaded from .env reach the tool server.
 */
function childEnvironment(
  extra: Record<string, string> | undefined
): Record<string, string> {
  const env: Record<string, string> = { ...getDefaultEnvironment() };
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return { ...env, ...extra };
}

/**
 * Create an MCP client for a stdio tool server
 *
 * The server is started on first use and restarted on the next call if
 * its process has gone away.
 */
export function createMCPClient(config: MCPServerConfig): MCPClient {
  let pending: Promise<MCPClient> | null = null;
  let healthy = false;

  async function connection(): Promise<MCPClient> {
    if (pending !== null) {
      const existing = await pending;
      if (existing.isHealthy()) {
        return existing;
      }
      pending = null;
    }

    const transport = new StdioClientTransport({
      command: config.command,
      args: config.args,
      env: childEnvironment(config.env),
      ...(config.cwd !== undefined && { cwd: config.cwd }),
    });

    const attempt = connectMCPClient(transport);
    pending = attempt;
    try {
      const client = await attempt;
      healthy = true;
      return client;
    } catch (error) {
      pending = null;
      healthy = false;
      throw error;
    }
  }

  return {
    async listTools(): Promise<ToolDescriptor[]> {
      const client = await connection();
      return client.listTools();
    },

    async callTool(
      toolName: string,
      input: Record<string, unknown>,
      timeout: number
    ): Promise<MCPToolResult> {
      const client = await connection();
      const result = await client.callTool(toolName, input, timeout);
      healthy = client.isHealthy();
      return result;
    },

    isHealthy(): boolean {
      return healthy;
    },

    async close(): Promise<void> {
      const current = pending;
      pending = null;
      healthy = false;
      if (current !== null) {
        const client = await current;
        await client.close();
      }
    },
  };
}
