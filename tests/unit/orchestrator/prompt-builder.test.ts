/**
 * Prompt Builder Tests
 */

import { describe, it, expect } from 'vitest';

import {
  CACHE_HINT_HEADING,
  CORE_INSTRUCTIONS,
  createPromptBuilder,
  formatCachedRecord,
  toolsToLLMFormat,
} from '@/orchestrator/prompt-builder.js';
import type { LLMMessage, ToolDescriptor } from '@/types/index.js';

import { cloudriftQuery, pricingRecord } from '../../fixtures/index.js';

const scrapeTool: ToolDescriptor = {
  name: 'scrape',
  description: 'Scrape a page',
  inputSchema: {
    type: 'object',
    properties: { url: { type: 'string' } },
    required: ['url'],
  },
};

describe('formatCachedRecord', () => {
  it('lists company, plan, costs and the recording date', () => {
    expect(formatCachedRecord(pricingRecord())).toBe(
      '- CloudRift AI / DeepSeek V3: input 0.25 USD, output 0.9 USD per 1M tokens (recorded 2025-01-15)'
    );
  });

  it('shows n/a for unknown costs', () => {
    expect(
      formatCachedRecord(pricingRecord({ outputTokenCost: null }))
    ).toContain('output n/a per 1M tokens');
  });
});

describe('toolsToLLMFormat', () => {
  it('wraps descriptors as function tools', () => {
    expect(toolsToLLMFormat([scrapeTool])).toEqual([
      {
        type: 'function',
        function: {
          name: 'scrape',
          description: 'Scrape a page',
          parameters: scrapeTool.inputSchema,
        },
      },
    ]);
  });
});

describe('Prompt Builder', () => {
  const builder = createPromptBuilder();

  it('puts the system prompt first and the user message last', () => {
    const history: LLMMessage[] = [
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello! Ask me about pricing.' },
    ];

    const output = builder.build({
      coreInstructions: CORE_INSTRUCTIONS,
      cachedRecords: [],
      conversationHistory: history,
      userMessage: cloudriftQuery,
      tools: [scrapeTool],
    });

    expect(output.messages).toEqual([
      { role: 'system', content: CORE_INSTRUCTIONS },
      ...history,
      { role: 'user', content: cloudriftQuery },
    ]);
    expect(output.tools).toHaveLength(1);
  });

  it('keeps tool calls and tool results from the history', () => {
    const history: LLMMessage[] = [
      { role: 'user', content: cloudriftQuery },
      {
        role: 'assistant',
        content: '',
        tool_calls: [
          {
            id: 'call_1',
            type: 'function',
            function: { name: 'scrape', arguments: '{"url":"https://www.cloudrift.ai/pricing"}' },
          },
        ],
      },
      { role: 'tool', tool_call_id: 'call_1', content: '{"provider":"cloudrift_ai"}' },
      { role: 'assistant', content: 'DeepSeek V3 costs $0.25 / $0.90.' },
    ];

    const output = builder.build({
      coreInstructions: CORE_INSTRUCTIONS,
      cachedRecords: [],
      conversationHistory: history,
      userMessage: 'And Llama?',
      tools: [],
    });

    expect(output.messages.slice(1, 5)).toEqual(history);
  });

  it('adds the cached pricing section when records match', () => {
    const output = builder.build({
      coreInstructions: CORE_INSTRUCTIONS,
      cachedRecords: [pricingRecord()],
      conversationHistory: [],
      userMessage: cloudriftQuery,
      tools: [],
    });

    const system = output.messages[0]?.content ?? '';
    expect(system.startsWith(CORE_INSTRUCTIONS)).toBe(true);
    expect(system).toContain(CACHE_HINT_HEADING);
    expect(system).toContain('avoid scraping the same pages again');
    expect(system).toContain(formatCachedRecord(pricingRecord()));
  });

  it('omits the cached pricing section without matches', () => {
    const output = builder.build({
      coreInstructions: CORE_INSTRUCTIONS,
      cachedRecords: [],
      conversationHistory: [],
      userMessage: cloudriftQuery,
      tools: [],
    });

    expect(output.messages[0]?.content).not.toContain(CACHE_HINT_HEADING);
  });
});
