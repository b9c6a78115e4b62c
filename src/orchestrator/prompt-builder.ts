/**
 * Prompt Builder Implementation
 *
 * Assembles the messages for one turn: a system message (core
 * instructions plus any cached pricing data), the session history and
 * the new user message.
 */

import type {
  LLMMessage,
  LLMToolDefinition,
  PricingRecord,
  PromptBuilderInput,
  PromptBuilderOutput,
  ToolDescriptor,
} from '../types/index.js';

export const CORE_INSTRUCTIONS = `## ROLE
You are a research assistant that answers questions about LLM inference pricing: what providers charge per token for the models and plans they offer.

## TOOLS
- scrape: fetch a provider's pricing page by URL. Use the provider's official pricing page.
- extract: pull structured pricing plans out of page content. After a scrape, call extract with source set to the provider name returned by scrape, and a hint naming the model or plan the user asked about.
- Call tools one at a time and only when the answer is not already known.

## ANSWERS
- Token costs are per 1M tokens unless stated otherwise.
- Quote the company, plan or model, input and output cost, and currency.
- If a page could not be scraped or holds no pricing, say so plainly instead of guessing.`;

export const CACHE_HINT_HEADING = '## CACHED PRICING DATA';

/**
 * Prompt Builder interface
 */
export interface PromptBuilder {
  build(input: PromptBuilderInput): PromptBuilderOutput;
}

function formatCost(value: number | null, currency: string): string {
  return value === null ? 'n/a' : `${value} ${currency}`;
}

/**
 * One line per stored plan, e.g.
 * "- CloudRift AI / DeepSeek V3: input 0.25 USD, output 0.9 USD per 1M tokens (recorded 2025-01-15)"
 */
export function formatCachedRecord(record: PricingRecord): string {
  const input = formatCost(record.inputTokenCost, record.currency);
  const output = formatCost(record.outputTokenCost, record.currency);
  const recorded = record.createdAt.toISOString().slice(0, 10);
  return `- ${record.companyName} / ${record.planName}: input ${input}, output ${output} ${record.billingPeriod} (recorded ${recorded})`;
}

function formatCachedRecords(records: PricingRecord[]): string {
  if (records.length === 0) {
    return '';
  }

  return [
    `\n${CACHE_HINT_HEADING}`,
    'The following pricing data is already stored from earlier research. ' +
      'If it answers the question, answer from it and avoid scraping the same pages again.',
    ...records.map(formatCachedRecord),
  ].join('\n');
}

/**
 * Convert tool descriptors to LLM format
 */
export function toolsToLLMFormat(tools: ToolDescriptor[]): LLMToolDefinition[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  }));
}

/**
 * Create a prompt builder instance
 */
export function createPromptBuilder(): PromptBuilder {
  return {
    build(input: PromptBuilderInput): PromptBuilderOutput {
      const systemParts: string[] = [input.coreInstructions];

      const cacheSection = formatCachedRecords(input.cachedRecords);
      if (cacheSection) {
        systemParts.push(cacheSection);
      }

      const systemContent = systemParts.join('\n');
      const messages: LLMMessage[] = [
        { role: 'system', content: systemContent },
        ...input.conversationHistory,
        { role: 'user', content: input.userMessage },
      ];

      return {
        messages,
        tools: toolsToLLMFormat(input.tools),
      };
    },
  };
}
