/**
 * SQLite schema for the pricing store (Drizzle ORM)
 *
 * Mirrors the DDL in database.ts; token columns hold the cost per
 * one million tokens.
 */

import { sql } from 'drizzle-orm';
import { integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

export const pricingPlans = sqliteTable('pricing_plans', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  companyName: text('company_name'),
  planName: text('plan_name'),
  inputTokens: real('input_tokens'),
  outputTokens: real('output_tokens'),
  currency: text('currency'),
  billingPeriod: text('billing_period'),
  features: text('features'),
  limitations: text('limitations'),
  sourceQuery: text('source_query'),
  createdAt: text('created_at').default(sql`CURRENT_TIMESTAMP`),
});

export type PricingPlanRow = typeof pricingPlans.$inferSelect;
export type NewPricingPlanRow = typeof pricingPlans.$inferInsert;
