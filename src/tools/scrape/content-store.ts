/**
 * Scraped Content Store
 *
 * Keeps scraped pages on disk so a later extract call can refer to them
 * by provider name, URL or domain. Each format is written to
 * `<provider>_<format>.txt`; `scraped_metadata.json` holds one summary
 * entry per provider, successful or not.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { z } from 'zod';

import { errorMessage } from '../../types/index.js';
import { ToolError } from '../types.js';

export const METADATA_FILE = 'scraped_metadata.json';

/**
 * Describes one scrape attempt
 */
export interface ScrapeEntry {
  provider: string;
  url: string;
  domain: string;
  scrapedAt: string;
  formats: string[];
}

/**
 * Metadata kept for a provider after its latest scrape
 */
export interface ScrapeMetadata extends ScrapeEntry {
  success: boolean;
  /** format → file name, relative to the store directory */
  contentFiles: Record<string, string>;
  title: string;
  description: string;
  error?: string;
}

export interface ContentStore {
  /**
   * Write every non-empty format to its file and record the entry
   */
  save(
    entry: ScrapeEntry & { title: string; description: string },
    contents: Record<string, string>
  ): Promise<ScrapeMetadata>;

  recordFailure(entry: ScrapeEntry, error: string): Promise<void>;

  /**
   * Look up an entry by provider name, URL or domain
   */
  find(identifier: string): Promise<ScrapeMetadata | null>;

  /**
   * Read saved content back
   * @throws ToolError NOT_FOUND when nothing usable was saved
   */
  readContent(identifier: string, format?: string): Promise<string>;
}

// On-disk layout uses snake_case keys
const storedEntrySchema = z.object({
  provider_name: z.string(),
  url: z.string(),
  domain: z.string(),
  scraped_at: z.string(),
  formats: z.array(z.string()).default([]),
  success: z.boolean(),
  content_files: z.record(z.string()).optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  error: z.string().optional(),
});

const storedMetadataSchema = z.record(storedEntrySchema);

type StoredEntry = z.infer<typeof storedEntrySchema>;

function fromStored(stored: StoredEntry): ScrapeMetadata {
  return {
    provider: stored.provider_name,
    url: stored.url,
    domain: stored.domain,
    scrapedAt: stored.scraped_at,
    formats: stored.formats,
    success: stored.success,
    contentFiles: stored.content_files ?? {},
    title: stored.title ?? '',
    description: stored.description ?? '',
    ...(stored.error !== undefined && { error: stored.error }),
  };
}

function toStored(metadata: ScrapeMetadata): StoredEntry {
  const base: StoredEntry = {
    provider_name: metadata.provider,
    url: metadata.url,
    domain: metadata.domain,
    scraped_at: metadata.scrapedAt,
    formats: metadata.formats,
    success: metadata.success,
  };
  if (!metadata.success) {
    return { ...base, error: metadata.error ?? 'Unknown error' };
  }
  return {
    ...base,
    content_files: metadata.contentFiles,
    title: metadata.title,
    description: metadata.description,
  };
}

function normalize(value: string): string {
  return value.trim().toLowerCase();
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && error.code === 'ENOENT'
  );
}

export function createContentStore(dir: string): ContentStore {
  const metadataPath = join(dir, METADATA_FILE);

  async function readMetadata(): Promise<Record<string, StoredEntry>> {
    let raw: string;
    try {
      raw = await readFile(metadataPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw new ToolError(
        'CONTENT_STORE_ERROR',
        `Failed to read ${METADATA_FILE}: ${errorMessage(error)}`
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ToolError(
        'CONTENT_STORE_ERROR',
        `Error decoding ${METADATA_FILE}: ${errorMessage(error)}`
      );
    }

    const parsed = storedMetadataSchema.safeParse(json);
    if (!parsed.success) {
      throw new ToolError(
        'CONTENT_STORE_ERROR',
        `Unexpected structure in ${METADATA_FILE}`
      );
    }
    return parsed.data;
  }

  async function writeEntry(metadata: ScrapeMetadata): Promise<void> {
    const all = await readMetadata();
    all[metadata.provider] = toStored(metadata);
    await writeFile(metadataPath, JSON.stringify(all, null, 4), 'utf-8');
  }

  async function find(identifier: string): Promise<ScrapeMetadata | null> {
    const wanted = normalize(identifier);
    if (wanted === '') {
      return null;
    }
    const all = await readMetadata();
    for (const [provider, entry] of Object.entries(all)) {
      if (
        normalize(provider) === wanted ||
        normalize(entry.url) === wanted ||
        normalize(entry.domain) === wanted
      ) {
        return fromStored(entry);
      }
    }
    return null;
  }

  return {
    async save(entry, contents): Promise<ScrapeMetadata> {
      await mkdir(dir, { recursive: true });

      const contentFiles: Record<string, string> = {};
      for (const format of entry.formats) {
        const content = contents[format];
        if (content === undefined || content === '') {
          continue;
        }
        const fileName = `${entry.provider}_${format}.txt`;
        await writeFile(join(dir, fileName), content, 'utf-8');
        contentFiles[format] = fileName;
      }

      const metadata: ScrapeMetadata = {
        ...entry,
        success: true,
        contentFiles,
      };
      await writeEntry(metadata);
      return metadata;
    },

    async recordFailure(entry, error): Promise<void> {
      await mkdir(dir, { recursive: true });
      await writeEntry({
        ...entry,
        success: false,
        contentFiles: {},
        title: '',
        description: '',
        error,
      });
    },

    find,

    async readContent(identifier, format = 'markdown'): Promise<string> {
      const entry = await find(identifier);
      const fileName = entry?.success === true ? entry.contentFiles[format] : undefined;
      if (fileName === undefined) {
        throw new ToolError(
          'NOT_FOUND',
          `There's no saved information related to identifier '${identifier}'`
        );
      }

      try {
        return await readFile(join(dir, fileName), 'utf-8');
      } catch (error) {
        if (isMissingFile(error)) {
          throw new ToolError(
            'NOT_FOUND',
            `There's no saved information related to identifier '${identifier}'`
          );
        }
        throw new ToolError(
          'CONTENT_STORE_ERROR',
          `Failed to read ${fileName}: ${errorMessage(error)}`
        );
      }
    },
  };
}
