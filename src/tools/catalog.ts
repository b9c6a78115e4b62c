/**
 * Tool Catalog
 *
 * The two tools the server exposes, with their argument schemas. The same
 * schemas validate calls on the client side before they are forwarded.
 */

import { z } from 'zod';

import type {
  ExtractArgs,
  ScrapeArgs,
  ToolArgs,
  ToolCall,
  ToolName,
} from '../types/index.js';
import { TOOL_NAMES } from '../types/index.js';

import { ToolError } from './types.js';

export const scrapeArgsShape = {
  url: z.string().url().describe('Full URL of the pricing page to scrape'),
  provider: z
    .string()
    .min(1)
    .optional()
    .describe(
      'Short provider name used to save the page (e.g. "cloudrift_ai"); derived from the URL when omitted'
    ),
};

export const extractArgsShape = {
  content: z
    .string()
    .optional()
    .describe('Raw page text or markdown to extract pricing from'),
  source: z
    .string()
    .optional()
    .describe(
      'Provider name, URL or domain of a page saved by an earlier scrape call; used when content is omitted'
    ),
  hint: z
    .string()
    .optional()
    .describe('What to look for, e.g. the model or plan the user asked about'),
};

const scrapeArgsSchema: z.ZodType<ScrapeArgs> = z.object(scrapeArgsShape);

const extractArgsSchema: z.ZodType<ExtractArgs> = z
  .object(extractArgsShape)
  .refine(
    (args) =>
      (args.content !== undefined && args.content.trim() !== '') ||
      (args.source !== undefined && args.source.trim() !== ''),
    { message: 'Either content or source is required' }
  );

const TOOL_ARG_SCHEMAS: { [K in ToolName]: z.ZodType<ToolArgs[K]> } = {
  scrape: scrapeArgsSchema,
  extract: extractArgsSchema,
};

export const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  scrape:
    'Scrape a web page (typically an LLM inference pricing page) and return its content as markdown. ' +
    'The page is also saved so that extract can refer to it by provider name, URL or domain.',
  extract:
    'Extract structured pricing plans (company, plan or model name, input and output cost per 1M tokens, ' +
    'currency, billing period, features, limitations) from page content. ' +
    'Pass either the raw content or the source of a page scraped earlier, plus an optional hint.',
};

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((toolName) => toolName === name);
}

/**
 * Validate arguments for a known tool
 */
export function parseToolArgs<K extends ToolName>(
  name: K,
  input: unknown
): ToolArgs[K] {
  const parsed = TOOL_ARG_SCHEMAS[name].safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message
      )
      .join('; ');
    throw new ToolError(
      'INVALID_ARGUMENTS',
      `Invalid arguments for ${name}: ${details}`
    );
  }
  return parsed.data;
}

const CALL_PARSERS: {
  [K in ToolName]: (input: unknown) => Extract<ToolCall, { name: K }>;
} = {
  scrape: (input) => ({ name: 'scrape', args: parseToolArgs('scrape', input) }),
  extract: (input) => ({
    name: 'extract',
    args: parseToolArgs('extract', input),
  }),
};

/**
 * Turn a tool name and raw arguments into a typed tool call
 *
 * @throws ToolError UNKNOWN_TOOL or INVALID_ARGUMENTS
 */
export function parseToolCall(name: string, input: unknown): ToolCall {
  if (!isToolName(name)) {
    throw new ToolError('UNKNOWN_TOOL', `Unknown tool: ${name}`);
  }
  return CALL_PARSERS[name](input);
}
