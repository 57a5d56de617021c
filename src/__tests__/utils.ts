/**
 * Test utilities: in-process stand-ins for the filesystem, HTTP and the store
 */

import { createExecutors } from '../commands/executor.js';
import type { CommandContext } from '../commands/rustdoc-command.js';
import type { DocsConfig } from '../config/schema.js';
import { StoreMissError } from '../errors/index.js';
import { Logger } from '../logger/index.js';
import { convertRustdocToMarkdown } from '../rustdoc/converter.js';
import type {
  CrawlProvider,
  DocStore,
  Fs,
  HttpBody,
  HttpClient,
  HttpResponse,
  RustdocItem,
} from '../types/docs.js';

export const testDocsConfig: DocsConfig = {
  remoteHost: 'docs.rs',
  version: 'latest',
  manifestFile: 'Cargo.toml',
  buildDocDir: 'target/doc',
};

export function createTestLogger(): Logger {
  return new Logger({ level: 'error', format: 'simple', maxFiles: 1, maxSize: '1m' });
}

/**
 * Filesystem backed by a path -> contents map
 */
export class MemoryFs implements Fs {
  readonly loads: string[] = [];
  private readonly files: Map<string, Buffer>;

  constructor(files: Record<string, string> = {}) {
    this.files = new Map(Object.entries(files).map(([path, text]) => [path, Buffer.from(text, 'utf-8')]));
  }

  setFile(path: string, contents: string | Buffer): void {
    this.files.set(path, typeof contents === 'string' ? Buffer.from(contents, 'utf-8') : contents);
  }

  async load(path: string): Promise<Buffer> {
    this.loads.push(path);
    const contents = this.files.get(path);
    if (!contents) {
      throw Object.assign(new Error(`ENOENT: no such file, open '${path}'`), { code: 'ENOENT' });
    }
    return contents;
  }

  async isFile(path: string): Promise<boolean> {
    return this.files.has(path);
  }
}

export interface RecordedRequest {
  url: string;
  body: HttpBody;
  followRedirects: boolean;
}

/**
 * HTTP client that answers every GET with one canned response
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  /** When set, `get` rejects with it instead of answering */
  requestError: Error | null = null;

  constructor(
    private status = 200,
    private body: string | Error = ''
  ) {}

  respond(status: number, body: string | Error): void {
    this.status = status;
    this.body = body;
  }

  async get(url: string, body: HttpBody, followRedirects: boolean): Promise<HttpResponse> {
    this.requests.push({ url, body, followRedirects });
    if (this.requestError) {
      throw this.requestError;
    }
    return { status: this.status, body: bodyStream(this.body) };
  }
}

async function* bodyStream(body: string | Error): AsyncGenerator<Uint8Array> {
  if (body instanceof Error) {
    throw body;
  }
  yield Buffer.from(body, 'utf-8');
}

export interface IndexCall {
  crateName: string;
  provider: CrawlProvider;
}

/**
 * Store keyed by `crate` / `crate::path`, recording every call
 */
export class FakeStore implements DocStore {
  readonly loads: Array<[string, string | undefined]> = [];
  readonly indexCalls: IndexCall[] = [];
  readonly searches: string[] = [];
  loadError: Error | null = null;
  indexError: Error | null = null;

  constructor(
    private readonly docs: Record<string, string> = {},
    private readonly results: Array<[string, RustdocItem]> = []
  ) {}

  async load(crateName: string, itemPath?: string): Promise<string> {
    this.loads.push([crateName, itemPath]);
    if (this.loadError) {
      throw this.loadError;
    }
    const key = itemPath ? `${crateName}::${itemPath}` : crateName;
    const text = this.docs[key];
    if (text === undefined) {
      throw new StoreMissError(crateName, itemPath ?? '');
    }
    return text;
  }

  async search(query: string): Promise<Array<[string, RustdocItem]>> {
    this.searches.push(query);
    return this.results;
  }

  async index(crateName: string, provider: CrawlProvider): Promise<void> {
    this.indexCalls.push({ crateName, provider });
    if (this.indexError) {
      throw this.indexError;
    }
  }
}

export interface TestContextOptions {
  store?: FakeStore;
  fs?: MemoryFs;
  http?: FakeHttpClient;
  worktrees?: string[];
}

export interface TestContext extends CommandContext {
  store: FakeStore;
  fs: MemoryFs;
  http: FakeHttpClient;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  return {
    store: options.store ?? new FakeStore(),
    fs: options.fs ?? new MemoryFs(),
    http: options.http ?? new FakeHttpClient(),
    convert: convertRustdocToMarkdown,
    docs: testDocsConfig,
    logger: createTestLogger(),
    worktrees: options.worktrees ?? ['/work/app'],
    executors: createExecutors(),
  };
}

/**
 * Minimal rustdoc page: a heading, one paragraph and optional item links
 */
export function rustdocPage(title: string, body: string, items: Array<{ kind: string; name: string }> = []): string {
  const links = items
    .map(({ kind, name }) => {
      const href = kind === 'mod' ? `${name}/index.html` : `${kind}.${name}.html`;
      return `<li><div><a class="${kind}" href="${href}">${name}</a></div></li>`;
    })
    .join('');
  const list = links ? `<ul>${links}</ul>` : '';
  return `<html><body><nav class="sidebar">sidebar</nav><main><section id="main-content"><h1>${title}</h1><p>${body}</p>${list}</section></main></body></html>`;
}

/**
 * Wait for a condition to be true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout = 2000,
  interval = 10
): Promise<void> {
  const startTime = Date.now();
  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, interval));
  }
  throw new Error(`Condition not met within ${timeout}ms`);
}
