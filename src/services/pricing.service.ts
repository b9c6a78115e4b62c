/**
 * PricingService Implementation
 *
 * SCOPE: Cached pricing plans
 *
 * Owns: pricing_plans
 *
 * GUARDRAILS:
 * - Records are insert-only; there is no update or delete path
 * - A record needs a company name or a plan name
 * - Repeated extraction of the same plan creates another row
 */

import type { NewPricingRecord, PricingRecord, Result } from '../types/index.js';
import { errorMessage, failure, success } from '../types/index.js';

/**
 * Database abstraction interface for PricingService
 */
export interface PricingServiceDb {
  insertPlan: (record: NewPricingRecord) => Promise<PricingRecord>;
  searchPlans: (params: {
    keywords: string[];
    query: string;
    limit: number;
  }) => Promise<PricingRecord[]>;
  listRecentPlans: (limit: number) => Promise<PricingRecord[]>;
  findPlans: (companyName: string, planName: string) => Promise<PricingRecord[]>;
}

/**
 * PricingService interface
 */
export interface PricingService {
  recordPlan(record: NewPricingRecord): Promise<Result<PricingRecord>>;
  findMatching(query: string, limit?: number): Promise<Result<PricingRecord[]>>;
  listRecent(limit: number): Promise<Result<PricingRecord[]>>;
  findByCompanyAndPlan(
    companyName: string,
    planName: string
  ): Promise<Result<PricingRecord[]>>;
}

export const DEFAULT_MATCH_LIMIT = 5;

/** Rows fetched before ranking */
const CANDIDATE_LIMIT = 200;

/**
 * Words that say nothing about which provider or model is meant
 */
const STOPWORDS = new Set([
  'about', 'and', 'any', 'are', 'can', 'charge', 'charges', 'cheap',
  'cheapest', 'compare', 'cost', 'costs', 'does', 'for', 'from', 'get',
  'give', 'have', 'how', 'input', 'much', 'output', 'per', 'please',
  'price', 'prices', 'pricing', 'show', 'tell', 'that', 'the', 'their',
  'this', 'token', 'tokens', 'use', 'what', 'which', 'with', 'you',
]);

/**
 * Lowercase alphanumeric words of three or more characters, minus stopwords
 */
export function extractKeywords(query: string): string[] {
  const words = query.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  const keywords: string[] = [];
  for (const word of words) {
    if (word.length >= 3 && !STOPWORDS.has(word) && !keywords.includes(word)) {
      keywords.push(word);
    }
  }
  return keywords;
}

function isValidCost(cost: number | null): boolean {
  return cost === null || (Number.isFinite(cost) && cost >= 0);
}

/**
 * Create PricingService instance
 */
export function createPricingService(deps: {
  db: PricingServiceDb;
}): PricingService {
  const { db } = deps;

  /**
   * Number of keywords found in the record's company and plan names
   */
  function scoreRecord(record: PricingRecord, keywords: string[]): number {
    const haystack = `${record.companyName} ${record.planName}`.toLowerCase();
    return keywords.filter((keyword) => haystack.includes(keyword)).length;
  }

  return {
    async recordPlan(
      record: NewPricingRecord
    ): Promise<Result<PricingRecord>> {
      const companyName = record.companyName.trim();
      const planName = record.planName.trim();

      if (companyName === '' && planName === '') {
        return failure(
          'VALIDATION_ERROR',
          'A pricing record needs a company name or a plan name'
        );
      }

      if (
        !isValidCost(record.inputTokenCost) ||
        !isValidCost(record.outputTokenCost)
      ) {
        return failure(
          'VALIDATION_ERROR',
          'Token costs must be non-negative numbers or null',
          {
            inputTokenCost: record.inputTokenCost,
            outputTokenCost: record.outputTokenCost,
          }
        );
      }

      try {
        const created = await db.insertPlan({
          ...record,
          companyName,
          planName,
        });
        return success(created);
      } catch (error) {
        return failure(
          'STORE_ERROR',
          `Failed to store pricing plan: ${errorMessage(error)}`
        );
      }
    },

    async findMatching(
      query: string,
      limit: number = DEFAULT_MATCH_LIMIT
    ): Promise<Result<PricingRecord[]>> {
      const trimmed = query.trim();
      if (trimmed === '') {
        return success([]);
      }

      const keywords = extractKeywords(trimmed);
      const normalizedQuery = trimmed.toLowerCase();

      let candidates: PricingRecord[];
      try {
        candidates = await db.searchPlans({
          keywords,
          query: trimmed,
          limit: CANDIDATE_LIMIT,
        });
      } catch (error) {
        return failure(
          'STORE_ERROR',
          `Failed to search pricing plans: ${errorMessage(error)}`
        );
      }

      const ranked = candidates
        .map((record) => {
          const sameQuery =
            record.sourceQuery.trim().toLowerCase() === normalizedQuery;
          const score =
            scoreRecord(record, keywords) + (sameQuery ? keywords.length + 1 : 0);
          return { record, score };
        })
        .filter((entry) => entry.score > 0)
        .sort((a, b) => b.score - a.score || b.record.id - a.record.id);

      return success(ranked.slice(0, limit).map((entry) => entry.record));
    },

    async listRecent(limit: number): Promise<Result<PricingRecord[]>> {
      if (!Number.isInteger(limit) || limit <= 0) {
        return failure('VALIDATION_ERROR', 'Limit must be a positive integer');
      }

      try {
        return success(await db.listRecentPlans(limit));
      } catch (error) {
        return failure(
          'STORE_ERROR',
          `Failed to read pricing plans: ${errorMessage(error)}`
        );
      }
    },

    async findByCompanyAndPlan(
      companyName: string,
      planName: string
    ): Promise<Result<PricingRecord[]>> {
      try {
        return success(
          await db.findPlans(companyName.trim(), planName.trim())
        );
      } catch (error) {
        return failure(
          'STORE_ERROR',
          `Failed to read pricing plans: ${errorMessage(error)}`
        );
      }
    },
  };
}
