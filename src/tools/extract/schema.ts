/**
 * Extraction Output Schema
 *
 * Validates what the model returns for an extraction request and
 * normalizes it into ExtractedPlan values. Also used by the chat client
 * to validate extract tool output before persisting it.
 */

import { z } from 'zod';

import { isRecord } from '../../lib/json.js';
import type { ExtractResult } from '../../types/index.js';

export const DEFAULT_CURRENCY = 'USD';
export const DEFAULT_BILLING_PERIOD = 'per 1M tokens';

// snake_case keys some models produce anyway
const KEY_ALIASES: Record<string, string> = {
  company_name: 'companyName',
  company: 'companyName',
  provider: 'companyName',
  plan_name: 'planName',
  plan: 'planName',
  model: 'planName',
  input_token_cost: 'inputTokenCost',
  input_tokens: 'inputTokenCost',
  output_token_cost: 'outputTokenCost',
  output_tokens: 'outputTokenCost',
  billing_period: 'billingPeriod',
};

function canonicalKeys(value: unknown): unknown {
  if (!isRecord(value)) {
    return value;
  }
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const canonical = KEY_ALIASES[key] ?? key;
    if (!(canonical in result)) {
      result[canonical] = entry;
    }
  }
  return result;
}

/**
 * Read a cost: numbers as-is, strings like "$1,200.50" parsed, anything
 * else (or a negative value) becomes null
 */
export function toCost(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string') {
    const match = value.replace(/,/g, '').match(/-?\d+(?:\.\d+)?/);
    if (match === null) {
      return null;
    }
    return toCost(Number(match[0]));
  }
  return null;
}

function toText(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return '';
}

function toTextList(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items.map(toText).filter((item) => item !== '');
}

const planSchema = z.preprocess(
  canonicalKeys,
  z
    .object({
      companyName: z.unknown(),
      planName: z.unknown(),
      inputTokenCost: z.unknown(),
      outputTokenCost: z.unknown(),
      currency: z.unknown(),
      billingPeriod: z.unknown(),
      features: z.unknown(),
      limitations: z.unknown(),
    })
    .transform((plan) => ({
      companyName: toText(plan.companyName),
      planName: toText(plan.planName),
      inputTokenCost: toCost(plan.inputTokenCost),
      outputTokenCost: toCost(plan.outputTokenCost),
      currency: toText(plan.currency) || DEFAULT_CURRENCY,
      billingPeriod: toText(plan.billingPeriod) || DEFAULT_BILLING_PERIOD,
      features: toTextList(plan.features),
      limitations: toTextList(plan.limitations).join('; '),
    }))
);

export const extractResultSchema: z.ZodType<
  ExtractResult,
  z.ZodTypeDef,
  unknown
> = z
  .object({
    plans: z.array(planSchema),
  })
  .transform(({ plans }) => ({
    plans: plans.filter(
      (plan) => plan.companyName !== '' || plan.planName !== ''
    ),
  }));
