/**
 * Service Layer Exports
 */

export {
  createPricingService,
  extractKeywords,
  DEFAULT_MATCH_LIMIT,
} from './pricing.service.js';
export type { PricingService, PricingServiceDb } from './pricing.service.js';
export { createPricingServiceDb } from './pricing.db.js';
