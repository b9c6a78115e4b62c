/**
 * Pricing Domain Types
 *
 * SCOPE: Pricing plans extracted from provider pages and cached locally
 */

/**
 * A persisted pricing plan (one row of pricing_plans)
 *
 * Token costs are per one million tokens.
 */
export interface PricingRecord {
  id: number;
  companyName: string;
  planName: string;
  inputTokenCost: number | null;
  outputTokenCost: number | null;
  currency: string;
  billingPeriod: string;
  features: string[];
  limitations: string;
  sourceQuery: string;
  createdAt: Date;
}

/**
 * Fields supplied when recording a plan; id and createdAt are assigned by the store
 */
export type NewPricingRecord = Omit<PricingRecord, 'id' | 'createdAt'>;
