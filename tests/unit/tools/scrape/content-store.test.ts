/**
 * Scraped Content Store Tests
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  METADATA_FILE,
  createContentStore,
} from '@/tools/scrape/content-store.js';
import type { ContentStore } from '@/tools/scrape/content-store.js';
import { ToolError } from '@/tools/types.js';

const entry = {
  provider: 'cloudrift_ai',
  url: 'https://www.cloudrift.ai/pricing',
  domain: 'www.cloudrift.ai',
  scrapedAt: '2025-01-15T10:00:00.000Z',
  formats: ['markdown', 'html'],
};

describe('ContentStore', () => {
  let dir: string;
  let store: ContentStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pricing-scout-'));
    store = createContentStore(join(dir, 'scraped'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes one file per format and a snake_case metadata summary', async () => {
    await store.save(
      { ...entry, title: 'Pricing | CloudRift', description: 'GPU pricing' },
      { markdown: '# Pricing', html: '<h1>Pricing</h1>' }
    );

    const markdown = await readFile(
      join(dir, 'scraped', 'cloudrift_ai_markdown.txt'),
      'utf-8'
    );
    expect(markdown).toBe('# Pricing');

    const metadata: unknown = JSON.parse(
      await readFile(join(dir, 'scraped', METADATA_FILE), 'utf-8')
    );
    expect(metadata).toEqual({
      cloudrift_ai: {
        provider_name: 'cloudrift_ai',
        url: 'https://www.cloudrift.ai/pricing',
        domain: 'www.cloudrift.ai',
        scraped_at: '2025-01-15T10:00:00.000Z',
        formats: ['markdown', 'html'],
        success: true,
        content_files: {
          markdown: 'cloudrift_ai_markdown.txt',
          html: 'cloudrift_ai_html.txt',
        },
        title: 'Pricing | CloudRift',
        description: 'GPU pricing',
      },
    });
  });

  it('skips empty formats', async () => {
    const saved = await store.save(
      { ...entry, title: '', description: '' },
      { markdown: '# Pricing', html: '' }
    );

    expect(saved.contentFiles).toEqual({
      markdown: 'cloudrift_ai_markdown.txt',
    });
  });

  it('finds an entry by provider, URL or domain', async () => {
    await store.save(
      { ...entry, title: '', description: '' },
      { markdown: '# Pricing' }
    );

    for (const identifier of [
      'cloudrift_ai',
      'https://www.cloudrift.ai/pricing',
      'WWW.CLOUDRIFT.AI',
    ]) {
      const found = await store.find(identifier);
      expect(found?.provider).toBe('cloudrift_ai');
    }
    await expect(store.find('groq')).resolves.toBeNull();
  });

  it('reads saved content back', async () => {
    await store.save(
      { ...entry, title: '', description: '' },
      { markdown: '# Pricing', html: '<h1>Pricing</h1>' }
    );

    await expect(store.readContent('cloudrift_ai')).resolves.toBe('# Pricing');
    await expect(store.readContent('cloudrift_ai', 'html')).resolves.toBe(
      '<h1>Pricing</h1>'
    );
  });

  it('records failures with the error and no content files', async () => {
    await store.recordFailure(entry, 'HTTP 500');

    const found = await store.find('cloudrift_ai');
    expect(found).toMatchObject({ success: false, error: 'HTTP 500', contentFiles: {} });

    const error = await store.readContent('cloudrift_ai').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ToolError);
    expect(error).toMatchObject({
      code: 'NOT_FOUND',
      message: "There's no saved information related to identifier 'cloudrift_ai'",
    });
  });

  it('replaces a provider entry on the next scrape', async () => {
    await store.recordFailure(entry, 'HTTP 500');
    await store.save(
      { ...entry, title: 'Pricing', description: '' },
      { markdown: '# Pricing' }
    );

    const found = await store.find('cloudrift_ai');
    expect(found?.success).toBe(true);
    expect(found?.error).toBeUndefined();
  });

  it('reports NOT_FOUND when nothing was scraped yet', async () => {
    await expect(store.readContent('groq')).rejects.toMatchObject({
      code: 'NOT_FOUND',
    });
  });

  it('reports a corrupt metadata file', async () => {
    await store.recordFailure(entry, 'HTTP 500');
    await writeFile(join(dir, 'scraped', METADATA_FILE), '{not json', 'utf-8');

    await expect(store.find('cloudrift_ai')).rejects.toMatchObject({
      code: 'CONTENT_STORE_ERROR',
    });
  });
});
