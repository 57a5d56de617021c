/**
 * Rustdoc crawler
 * Walks a crate's documentation breadth-first, following item links
 */

import { join } from 'path';
import { StoreIndexError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { CrawlProvider, Fs, MarkupConverter, RustdocItem } from '../types/docs.js';
import { displayItem, itemUrlPath, nestUnder } from './item.js';

/**
 * Serves pages from `cargo doc` output under a workspace root
 */
export class LocalProvider implements CrawlProvider {
  constructor(
    private readonly fs: Fs,
    private readonly workspaceRoot: string,
    private readonly buildDocDir: string = 'target/doc'
  ) {}

  async fetchPage(crateName: string, item?: RustdocItem): Promise<string | null> {
    const path = join(this.workspaceRoot, this.buildDocDir, crateName, item ? itemUrlPath(item) : 'index.html');
    if (!(await this.fs.isFile(path))) {
      return null;
    }
    const contents = await this.fs.load(path);
    return contents.toString('utf-8');
  }
}

export interface CrawledCrate {
  crateName: string;
  /** Markdown keyed by item display path; '' is the crate root */
  docs: Map<string, string>;
  items: RustdocItem[];
}

export class RustdocCrawler {
  constructor(
    private readonly convert: MarkupConverter,
    private readonly logger?: Logger
  ) {}

  async crawl(crateName: string, provider: CrawlProvider): Promise<CrawledCrate> {
    const rootPage = await provider.fetchPage(crateName);
    if (rootPage === null) {
      throw new StoreIndexError(`no docs found for crate ${crateName}`, { crateName });
    }

    const root = this.convert(rootPage);
    const docs = new Map<string, string>([['', root.markdown]]);
    const items: RustdocItem[] = [];
    const seen = new Set<string>();
    const queue: RustdocItem[] = [];

    const enqueue = (item: RustdocItem): void => {
      const key = `${item.kind}:${displayItem(item)}`;
      if (!seen.has(key)) {
        seen.add(key);
        queue.push(item);
      }
    };

    root.items.forEach(enqueue);

    for (let item = queue.shift(); item; item = queue.shift()) {
      const page = await provider.fetchPage(crateName, item);
      if (page === null) {
        this.logger?.debug('Skipping missing rustdoc page', { crateName, item: displayItem(item) });
        continue;
      }

      const converted = this.convert(page);
      const key = displayItem(item);
      if (!docs.has(key)) {
        docs.set(key, converted.markdown);
      }
      items.push(item);

      for (const child of converted.items) {
        enqueue(nestUnder(child, item));
      }
    }

    return { crateName, docs, items };
  }
}
