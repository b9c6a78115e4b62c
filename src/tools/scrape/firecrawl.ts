/**
 * Firecrawl Scraper
 *
 * Scrapes a page through the Firecrawl REST API (POST /scrape), saves the
 * markdown and html through the content store, and returns the markdown
 * capped at maxContentChars.
 */

import { z } from 'zod';

import { errorMessage } from '../../types/index.js';
import type { ScrapeArgs, ScrapeResult } from '../../types/index.js';
import type { Scraper } from '../types.js';
import { ToolError } from '../types.js';

import type { ContentStore, ScrapeEntry } from './content-store.js';

export const SCRAPE_FORMATS = ['markdown', 'html'];

export interface FirecrawlScraperConfig {
  apiKey: string;
  /** API root, e.g. https://api.firecrawl.dev/v1 */
  baseUrl: string;
  timeoutMs: number;
  maxContentChars: number;
  contentStore: ContentStore;
  fetch?: typeof fetch;
  now?: () => Date;
}

const scrapeResponseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
  data: z
    .object({
      markdown: z.string().optional(),
      html: z.string().optional(),
      metadata: z
        .object({
          title: z.string().optional(),
          description: z.string().optional(),
          statusCode: z.number().optional(),
          error: z.string().optional(),
        })
        .passthrough()
        .optional(),
    })
    .optional(),
});

type ScrapedPage = {
  markdown: string;
  html: string;
  title: string;
  description: string;
};

/**
 * Derive a file-safe provider name from a URL host
 * e.g. https://www.cloudrift.ai/pricing → cloudrift_ai
 */
export function providerFromUrl(url: string): string {
  const host = new URL(url).hostname.replace(/^www\./i, '');
  return sanitizeProvider(host);
}

function sanitizeProvider(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function createFirecrawlScraper(config: FirecrawlScraperConfig): Scraper {
  const {
    apiKey,
    baseUrl,
    timeoutMs,
    maxContentChars,
    contentStore,
    fetch: fetchFn = fetch,
    now = () => new Date(),
  } = config;

  async function fetchPage(url: string): Promise<ScrapedPage> {
    let response: Response;
    try {
      response = await fetchFn(`${baseUrl.replace(/\/+$/, '')}/scrape`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          url,
          formats: SCRAPE_FORMATS,
          onlyMainContent: true,
        }),
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new ToolError(
        'SCRAPE_FAILED',
        `Scrape request failed for ${url}: ${errorMessage(error)}`
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      body = undefined;
    }
    const parsed = scrapeResponseSchema.safeParse(body);

    if (!response.ok) {
      const detail =
        parsed.success && parsed.data.error !== undefined
          ? parsed.data.error
          : `HTTP ${response.status}`;
      throw new ToolError('SCRAPE_FAILED', `Scrape failed for ${url}: ${detail}`);
    }
    if (!parsed.success) {
      throw new ToolError(
        'SCRAPE_FAILED',
        `Scrape failed for ${url}: unexpected response from scraping service`
      );
    }

    const { success, error, data } = parsed.data;
    if (!success) {
      throw new ToolError(
        'SCRAPE_FAILED',
        `Scrape failed for ${url}: ${error ?? 'Unknown error'}`
      );
    }

    const metadata = data?.metadata;
    const statusCode = metadata?.statusCode;
    if (statusCode !== undefined && statusCode !== 200) {
      throw new ToolError(
        'SCRAPE_FAILED',
        `Scrape failed for ${url} with status ${statusCode}: ${metadata?.error ?? 'Unknown error'}`
      );
    }

    const markdown = data?.markdown ?? '';
    if (markdown.trim() === '') {
      throw new ToolError(
        'SCRAPE_FAILED',
        `Scrape failed for ${url}: no content returned`
      );
    }

    return {
      markdown,
      html: data?.html ?? '',
      title: metadata?.title ?? '',
      description: metadata?.description ?? '',
    };
  }

  return {
    async scrape(args: ScrapeArgs): Promise<ScrapeResult> {
      let parsedUrl: URL;
      try {
        parsedUrl = new URL(args.url);
      } catch {
        throw new ToolError('INVALID_ARGUMENTS', `Invalid URL: ${args.url}`);
      }

      const provider =
        args.provider !== undefined && sanitizeProvider(args.provider) !== ''
          ? sanitizeProvider(args.provider)
          : providerFromUrl(args.url);

      const entry: ScrapeEntry = {
        provider,
        url: args.url,
        domain: parsedUrl.host,
        scrapedAt: now().toISOString(),
        formats: SCRAPE_FORMATS,
      };

      let page: ScrapedPage;
      try {
        page = await fetchPage(args.url);
      } catch (error) {
        await contentStore.recordFailure(entry, errorMessage(error));
        throw error;
      }

      await contentStore.save(
        { ...entry, title: page.title, description: page.description },
        { markdown: page.markdown, html: page.html }
      );

      const truncated = page.markdown.length > maxContentChars;
      return {
        provider,
        url: args.url,
        domain: entry.domain,
        title: page.title,
        description: page.description,
        scrapedAt: entry.scrapedAt,
        content: truncated
          ? page.markdown.slice(0, maxContentChars)
          : page.markdown,
        truncated,
      };
    },
  };
}
