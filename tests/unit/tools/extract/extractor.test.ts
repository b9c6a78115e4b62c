/**
 * Pricing Extractor Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';

import {
  EXTRACTION_INSTRUCTIONS,
  createPricingExtractor,
  stripCodeFence,
} from '@/tools/extract/extractor.js';
import type { PricingExtractor } from '@/tools/types.js';
import type { LLMClient } from '@/types/index.js';

import { cloudriftMarkdown, deepseekPlan } from '../../../fixtures/index.js';
import { createLLMResponse } from '../../../helpers/test-utils.js';

describe('stripCodeFence', () => {
  it('removes a json fence', () => {
    expect(stripCodeFence('```json\n{"plans": []}\n```')).toBe('{"plans": []}');
  });

  it('leaves bare JSON alone', () => {
    expect(stripCodeFence(' {"plans": []} ')).toBe('{"plans": []}');
  });
});

describe('Pricing Extractor', () => {
  let complete: Mock<LLMClient['complete']>;
  let extractor: PricingExtractor;

  beforeEach(() => {
    complete = vi.fn<LLMClient['complete']>();
    extractor = createPricingExtractor({
      llmClient: { complete },
      model: 'openai/gpt-4o-mini',
      maxContentChars: 20000,
    });
  });

  it('asks for JSON at temperature 0 and returns validated plans', async () => {
    complete.mockResolvedValue(
      createLLMResponse(JSON.stringify({ plans: [deepseekPlan] }))
    );

    const result = await extractor.extract({
      content: cloudriftMarkdown,
      hint: 'DeepSeek V3',
    });

    expect(result).toEqual({ plans: [deepseekPlan] });
    expect(complete).toHaveBeenCalledWith({
      model: 'openai/gpt-4o-mini',
      messages: [
        { role: 'system', content: EXTRACTION_INSTRUCTIONS },
        {
          role: 'user',
          content: `Focus on: DeepSeek V3\n\nContent:\n${cloudriftMarkdown}`,
        },
      ],
      response_format: { type: 'json_object' },
      temperature: 0,
      max_tokens: 4096,
    });
  });

  it('caps the content sent to the model', async () => {
    const capped = createPricingExtractor({
      llmClient: { complete },
      model: 'openai/gpt-4o-mini',
      maxContentChars: 5,
    });
    complete.mockResolvedValue(createLLMResponse('{"plans": []}'));

    await capped.extract({ content: 'abcdefghij' });

    const request = complete.mock.calls[0][0];
    expect(request.messages[1]).toEqual({
      role: 'user',
      content: 'Content:\nabcde',
    });
  });

  it('accepts fenced JSON', async () => {
    complete.mockResolvedValue(
      createLLMResponse('```json\n{"plans": []}\n```')
    );

    await expect(extractor.extract({ content: 'no prices here' })).resolves.toEqual({
      plans: [],
    });
  });

  it('fails on invalid JSON', async () => {
    complete.mockResolvedValue(createLLMResponse('DeepSeek V3 costs $0.25'));

    await expect(
      extractor.extract({ content: cloudriftMarkdown })
    ).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      message: 'Extraction returned invalid JSON',
    });
  });

  it('fails on an unexpected structure', async () => {
    complete.mockResolvedValue(createLLMResponse('{"models": []}'));

    await expect(
      extractor.extract({ content: cloudriftMarkdown })
    ).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      message: 'Extraction returned an unexpected structure',
    });
  });

  it('wraps completion failures', async () => {
    complete.mockRejectedValue(new Error('429 Rate limit exceeded'));

    await expect(
      extractor.extract({ content: cloudriftMarkdown })
    ).rejects.toMatchObject({
      code: 'EXTRACTION_FAILED',
      message: 'Extraction request failed: 429 Rate limit exceeded',
    });
  });

  it('rejects empty content without calling the model', async () => {
    await expect(extractor.extract({ content: '  ' })).rejects.toMatchObject({
      code: 'INVALID_ARGUMENTS',
    });
    expect(complete).not.toHaveBeenCalled();
  });
});
