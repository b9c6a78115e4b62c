/**
 * Pricing Extractor
 *
 * Asks the completion service, in JSON mode, to pull pricing plans out of
 * page content, then validates the answer against extractResultSchema.
 */

import { tryParseJson } from '../../lib/json.js';
import { errorMessage } from '../../types/index.js';
import type { ExtractResult, LLMClient } from '../../types/index.js';
import type { PricingExtractor } from '../types.js';
import { ToolError } from '../types.js';

import { extractResultSchema } from './schema.js';

export interface PricingExtractorDeps {
  llmClient: LLMClient;
  model: string;
  maxContentChars: number;
  maxOutputTokens?: number;
}

export const EXTRACTION_INSTRUCTIONS = `You extract LLM inference pricing from web page content.
Return only a JSON object of the form {"plans": [...]}, where every plan has these keys:
- companyName: the company selling the plan
- planName: the plan, tier or model name
- inputTokenCost: cost per 1M input tokens as a number, or null if not listed
- outputTokenCost: cost per 1M output tokens as a number, or null if not listed
- currency: e.g. "USD"
- billingPeriod: e.g. "per 1M tokens"
- features: array of short strings
- limitations: short string, empty if none
Convert prices quoted per 1K tokens to per 1M tokens. If the content lists no pricing, return {"plans": []}.`;

/**
 * Remove a surrounding ``` fence if the model added one despite JSON mode
 */
export function stripCodeFence(text: string): string {
  const match = text.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return match?.[1] ?? text.trim();
}

export function createPricingExtractor(
  deps: PricingExtractorDeps
): PricingExtractor {
  const { llmClient, model, maxContentChars, maxOutputTokens = 4096 } = deps;

  return {
    async extract({ content, hint }): Promise<ExtractResult> {
      if (content.trim() === '') {
        throw new ToolError('INVALID_ARGUMENTS', 'No content to extract from');
      }

      const focus =
        hint !== undefined && hint.trim() !== ''
          ? `Focus on: ${hint.trim()}\n\n`
          : '';

      let raw: string;
      try {
        const response = await llmClient.complete({
          model,
          messages: [
            { role: 'system', content: EXTRACTION_INSTRUCTIONS },
            {
              role: 'user',
              content: `${focus}Content:\n${content.slice(0, maxContentChars)}`,
            },
          ],
          response_format: { type: 'json_object' },
          temperature: 0,
          max_tokens: maxOutputTokens,
        });
        raw = response.choices[0]?.message.content ?? '';
      } catch (error) {
        throw new ToolError(
          'EXTRACTION_FAILED',
          `Extraction request failed: ${errorMessage(error)}`
        );
      }

      const json = tryParseJson(stripCodeFence(raw));
      if (json === undefined) {
        throw new ToolError(
          'EXTRACTION_FAILED',
          'Extraction returned invalid JSON'
        );
      }

      const parsed = extractResultSchema.safeParse(json);
      if (!parsed.success) {
        throw new ToolError(
          'EXTRACTION_FAILED',
          'Extraction returned an unexpected structure'
        );
      }
      return parsed.data;
    },
  };
}
