/**
 * Tool Domain Types
 *
 * SCOPE: The two capabilities exposed by the tool server
 *
 * Each tool kind carries a typed argument structure and a typed result
 * structure; dispatch goes through lookup tables keyed by ToolName.
 */

/**
 * Names of the tools exposed by the tool server
 */
export type ToolName = 'scrape' | 'extract';

export const TOOL_NAMES: readonly ToolName[] = ['scrape', 'extract'];

/**
 * Arguments for the scrape tool
 */
export type ScrapeArgs = {
  url: string;
  /** Name used for saved content; derived from the URL host when absent */
  provider?: string;
};

/**
 * Arguments for the extract tool
 * Either raw content or the identifier of a previously scraped page is required.
 */
export type ExtractArgs = {
  content?: string;
  /** Provider name, URL or domain of a page saved by an earlier scrape */
  source?: string;
  /** What structure to look for (e.g. a model name) */
  hint?: string;
};

/**
 * Result of the scrape tool
 */
export interface ScrapeResult {
  provider: string;
  url: string;
  domain: string;
  title: string;
  description: string;
  scrapedAt: string;
  /** Page markdown, capped at the configured length */
  content: string;
  truncated: boolean;
}

/**
 * A single plan as returned by the extraction tool
 */
export interface ExtractedPlan {
  companyName: string;
  planName: string;
  inputTokenCost: number | null;
  outputTokenCost: number | null;
  currency: string;
  billingPeriod: string;
  features: string[];
  limitations: string;
}

/**
 * Result of the extract tool
 */
export interface ExtractResult {
  plans: ExtractedPlan[];
}

export interface ToolArgs {
  scrape: ScrapeArgs;
  extract: ExtractArgs;
}

export interface ToolResults {
  scrape: ScrapeResult;
  extract: ExtractResult;
}

/**
 * A validated tool invocation
 */
export type ToolCall = {
  [K in ToolName]: { name: K; args: ToolArgs[K] };
}[ToolName];

/**
 * Tool catalog entry as advertised by the tool server
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>; // JSON Schema
}
