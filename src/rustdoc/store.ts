/**
 * Rustdoc Store
 * Persistent per-crate documentation with an in-memory layer and item search
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { StoreIndexError, StoreMissError, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { CrawlProvider, DocStore, MarkupConverter, RustdocItem } from '../types/docs.js';
import { convertRustdocToMarkdown } from './converter.js';
import { RustdocCrawler } from './crawler.js';
import { ITEM_KINDS, displayItem } from './item.js';

const STORE_VERSION = '1.0.0';
const CRATE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

const RustdocItemSchema = z.object({
  kind: z.enum(ITEM_KINDS),
  name: z.string(),
  path: z.array(z.string()),
});

const StoredCrateSchema = z.object({
  version: z.string(),
  crateName: z.string(),
  indexedAt: z.number(),
  docs: z.array(z.tuple([z.string(), z.string()])),
  items: z.array(RustdocItemSchema),
});

type StoredCrate = z.infer<typeof StoredCrateSchema>;

interface CrateDocs {
  crateName: string;
  indexedAt: number;
  docs: Map<string, string>;
  items: RustdocItem[];
}

export interface RustdocStoreOptions {
  dataDir: string;
  searchLimit?: number;
  convert?: MarkupConverter;
  logger?: Logger;
}

export class RustdocStore implements DocStore {
  private readonly dataDir: string;
  private readonly searchLimit: number;
  private readonly crawler: RustdocCrawler;
  private readonly logger?: Logger;
  private readonly crates: Map<string, CrateDocs> = new Map();
  private readonly inFlight: Map<string, Promise<void>> = new Map();
  private loadedAll: Promise<void> | null = null;

  constructor(options: RustdocStoreOptions) {
    this.dataDir = options.dataDir;
    this.searchLimit = options.searchLimit ?? 50;
    this.logger = options.logger;
    this.crawler = new RustdocCrawler(options.convert ?? convertRustdocToMarkdown, options.logger);
  }

  /**
   * Stored Markdown for an item of a crate; `itemPath` is `a::b`, empty for the crate root
   */
  async load(crateName: string, itemPath: string = ''): Promise<string> {
    const crate = await this.getCrate(crateName);
    const docs = crate?.docs.get(itemPath);
    if (docs === undefined) {
      throw new StoreMissError(crateName, itemPath);
    }
    return docs;
  }

  /**
   * Items whose `crate::path::name` contains the query, prefix matches first
   */
  async search(query: string): Promise<Array<[string, RustdocItem]>> {
    await this.loadAll();

    const needle = query.trim().toLowerCase();
    const matches: Array<{ display: string; prefix: boolean; entry: [string, RustdocItem] }> = [];

    for (const crate of this.crates.values()) {
      for (const item of crate.items) {
        const display = `${crate.crateName}::${displayItem(item)}`.toLowerCase();
        if (display.includes(needle)) {
          matches.push({ display, prefix: display.startsWith(needle), entry: [crate.crateName, item] });
        }
      }
    }

    matches.sort((a, b) => {
      if (a.prefix !== b.prefix) return a.prefix ? -1 : 1;
      if (a.display.length !== b.display.length) return a.display.length - b.display.length;
      return a.display < b.display ? -1 : a.display > b.display ? 1 : 0;
    });

    return matches.slice(0, this.searchLimit).map(match => match.entry);
  }

  /**
   * Crawl a crate and persist it. Concurrent calls for one crate share a crawl.
   */
  index(crateName: string, provider: CrawlProvider): Promise<void> {
    const running = this.inFlight.get(crateName);
    if (running) {
      return running;
    }

    const task = this.crawlAndPersist(crateName, provider).finally(() => {
      this.inFlight.delete(crateName);
    });
    this.inFlight.set(crateName, task);
    return task;
  }

  private async crawlAndPersist(crateName: string, provider: CrawlProvider): Promise<void> {
    if (!CRATE_NAME_PATTERN.test(crateName)) {
      throw new StoreIndexError(`invalid crate name: ${crateName}`, { crateName });
    }

    const startTime = Date.now();
    let crate: CrateDocs;
    try {
      const crawled = await this.crawler.crawl(crateName, provider);
      crate = { ...crawled, indexedAt: Date.now() };
    } catch (error) {
      if (error instanceof StoreIndexError) throw error;
      throw new StoreIndexError(`failed to index ${crateName}: ${toError(error).message}`, { crateName }, toError(error));
    }

    await this.persist(crate);
    this.crates.set(crateName, crate);

    this.logger?.info('Indexed crate', {
      crateName,
      pages: crate.docs.size,
      items: crate.items.length,
      duration: Date.now() - startTime,
    });
  }

  /**
   * Write through a temp file so an abandoned index never leaves a torn file
   */
  private async persist(crate: CrateDocs): Promise<void> {
    const data: StoredCrate = {
      version: STORE_VERSION,
      crateName: crate.crateName,
      indexedAt: crate.indexedAt,
      docs: Array.from(crate.docs.entries()),
      items: crate.items,
    };

    const file = this.crateFile(crate.crateName);
    const temp = `${file}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
      await fs.writeFile(temp, JSON.stringify(data));
      await fs.rename(temp, file);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw new StoreIndexError(`failed to persist ${crate.crateName}: ${toError(error).message}`, {
        crateName: crate.crateName,
        file,
      }, toError(error));
    }
  }

  private async getCrate(crateName: string): Promise<CrateDocs | null> {
    const cached = this.crates.get(crateName);
    if (cached) {
      return cached;
    }
    if (!CRATE_NAME_PATTERN.test(crateName)) {
      return null;
    }

    const crate = await this.readCrateFile(this.crateFile(crateName));
    if (crate) {
      this.crates.set(crateName, crate);
    }
    return crate;
  }

  private async readCrateFile(file: string): Promise<CrateDocs | null> {
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      this.logger?.warn('Ignoring unreadable store file', { file, error: toError(error).message });
      return null;
    }

    const parsed = StoredCrateSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger?.warn('Ignoring invalid store file', { file, error: parsed.error.message });
      return null;
    }

    if (parsed.data.version !== STORE_VERSION) {
      this.logger?.warn(`Store version mismatch: ${parsed.data.version} vs ${STORE_VERSION}`, { file });
    }

    return {
      crateName: parsed.data.crateName,
      indexedAt: parsed.data.indexedAt,
      docs: new Map(parsed.data.docs),
      items: parsed.data.items,
    };
  }

  /**
   * Bring every persisted crate into memory once, for search
   */
  private loadAll(): Promise<void> {
    if (!this.loadedAll) {
      this.loadedAll = this.readAllCrateFiles().catch((error: unknown) => {
        // Let the next search retry
        this.loadedAll = null;
        throw error;
      });
    }
    return this.loadedAll;
  }

  private async readAllCrateFiles(): Promise<void> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dataDir);
    } catch (error) {
      if (isNotFound(error)) return;
      throw error;
    }

    for (const entry of entries) {
      if (!entry.endsWith('.json')) continue;
      const crateName = entry.slice(0, -'.json'.length);
      if (this.crates.has(crateName) || !CRATE_NAME_PATTERN.test(crateName)) continue;

      const crate = await this.readCrateFile(path.join(this.dataDir, entry));
      if (crate) {
        this.crates.set(crateName, crate);
      }
    }
  }

  private crateFile(crateName: string): string {
    return path.join(this.dataDir, `${crateName}.json`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
