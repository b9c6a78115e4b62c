/**
 * Test Utilities
 * Common helpers for writing tests
 */

import type { RateGate } from '@/orchestrator/rate-gate.js';
import type { LLMResponse, LLMToolCall } from '@/types/index.js';

/**
 * A plain assistant answer
 */
export function createLLMResponse(
  content: string,
  overrides: Partial<LLMResponse> = {}
): LLMResponse {
  return {
    id: 'response-123',
    model: 'openai/gpt-4o-mini',
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content },
        finish_reason: 'stop',
      },
    ],
    ...overrides,
  };
}

/**
 * An assistant message requesting tool calls
 */
export function createToolCallResponse(
  toolCalls: Array<{ id: string; name: string; args: unknown }>
): LLMResponse {
  const calls: LLMToolCall[] = toolCalls.map((tc) => ({
    id: tc.id,
    type: 'function',
    function: {
      name: tc.name,
      arguments: typeof tc.args === 'string' ? tc.args : JSON.stringify(tc.args),
    },
  }));

  return createLLMResponse('', {
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: '', tool_calls: calls },
        finish_reason: 'tool_calls',
      },
    ],
  });
}

/**
 * Rate gate that never sleeps but counts its waits
 */
export function createInstantGate(): RateGate & { waits: number } {
  const gate = {
    waits: 0,
    async wait(): Promise<void> {
      gate.waits++;
    },
  };
  return gate;
}

