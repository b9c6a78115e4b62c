/**
 * PricingService Database Adapter
 * Implements PricingServiceDb using Drizzle over better-sqlite3
 *
 * SCOPE: pricing_plans table
 */

import { and, desc, like, or, sql, type SQL } from 'drizzle-orm';

import type { PricingDb } from '../lib/database.js';
import { pricingPlans, type PricingPlanRow } from '../lib/schema.js';
import type { NewPricingRecord, PricingRecord } from '../types/index.js';

import type { PricingServiceDb } from './pricing.service.js';

/**
 * Parse the JSON-serialized features column; anything but a string array yields []
 */
function parseFeatures(raw: string | null): string[] {
  if (raw === null || raw === '') {
    return [];
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    if (Array.isArray(parsed)) {
      return parsed.filter((item): item is string => typeof item === 'string');
    }
    return [];
  } catch {
    return [];
  }
}

/**
 * SQLite CURRENT_TIMESTAMP is UTC in 'YYYY-MM-DD HH:MM:SS' form
 */
function parseTimestamp(raw: string | null): Date {
  if (raw === null) {
    return new Date(0);
  }
  const iso = raw.includes('T') ? raw : `${raw.replace(' ', 'T')}Z`;
  return new Date(iso);
}

/**
 * Map database row to PricingRecord entity
 */
function mapRowToRecord(row: PricingPlanRow): PricingRecord {
  return {
    id: row.id,
    companyName: row.companyName ?? '',
    planName: row.planName ?? '',
    inputTokenCost: row.inputTokens,
    outputTokenCost: row.outputTokens,
    currency: row.currency ?? '',
    billingPeriod: row.billingPeriod ?? '',
    features: parseFeatures(row.features),
    limitations: row.limitations ?? '',
    sourceQuery: row.sourceQuery ?? '',
    createdAt: parseTimestamp(row.createdAt),
  };
}

/**
 * Create PricingServiceDb implementation using SQLite
 */
export function createPricingServiceDb(db: PricingDb): PricingServiceDb {
  return {
    async insertPlan(record: NewPricingRecord): Promise<PricingRecord> {
      const row = db
        .insert(pricingPlans)
        .values({
          companyName: record.companyName,
          planName: record.planName,
          inputTokens: record.inputTokenCost,
          outputTokens: record.outputTokenCost,
          currency: record.currency,
          billingPeriod: record.billingPeriod,
          features: JSON.stringify(record.features),
          limitations: record.limitations,
          sourceQuery: record.sourceQuery,
        })
        .returning()
        .get();

      return mapRowToRecord(row);
    },

    async searchPlans(params: {
      keywords: string[];
      query: string;
      limit: number;
    }): Promise<PricingRecord[]> {
      const conditions: SQL[] = [
        sql`lower(trim(${pricingPlans.sourceQuery})) = ${params.query.trim().toLowerCase()}`,
      ];

      for (const keyword of params.keywords) {
        const pattern = `%${keyword}%`;
        conditions.push(like(pricingPlans.companyName, pattern));
        conditions.push(like(pricingPlans.planName, pattern));
      }

      const rows = db
        .select()
        .from(pricingPlans)
        .where(or(...conditions))
        .orderBy(desc(pricingPlans.id))
        .limit(params.limit)
        .all();

      return rows.map(mapRowToRecord);
    },

    async listRecentPlans(limit: number): Promise<PricingRecord[]> {
      const rows = db
        .select()
        .from(pricingPlans)
        .orderBy(desc(pricingPlans.id))
        .limit(limit)
        .all();

      return rows.map(mapRowToRecord);
    },

    async findPlans(companyName: string, planName: string): Promise<PricingRecord[]> {
      const rows = db
        .select()
        .from(pricingPlans)
        .where(
          and(
            sql`lower(${pricingPlans.companyName}) = ${companyName.toLowerCase()}`,
            sql`lower(${pricingPlans.planName}) = ${planName.toLowerCase()}`
          )
        )
        .orderBy(desc(pricingPlans.id))
        .all();

      return rows.map(mapRowToRecord);
    },
  };
}
