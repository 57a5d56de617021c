/**
 * Type definitions for rustdoc resolution
 */

/**
 * Parsed `rustdoc <crate>::<path>` invocation
 */
export interface LookupRequest {
  kind: 'lookup';
  crateName: string;
  itemPath: string[];
}

/**
 * Parsed `rustdoc --index <crate>` invocation
 */
export interface IndexRequest {
  kind: 'index';
  crateName: string;
}

export type ParsedCommand = LookupRequest | IndexRequest;

/**
 * Where resolved docs came from: the store or a local `cargo doc` build,
 * or the remote documentation host
 */
export type RustdocSource = 'local' | 'docs.rs';

export interface ResolutionResult {
  source: RustdocSource;
  text: string;
}

/**
 * Render-agnostic description of a section; adapters decide how to draw it
 */
export type PlaceholderDescriptor =
  | {
      kind: 'rustdoc';
      source: RustdocSource;
      crateName: string;
      modulePath?: string;
    }
  | {
      kind: 'rustdoc-index';
      source: RustdocSource;
      crateName: string;
    };

/**
 * Half-open UTF-8 byte range over the output text
 */
export interface ByteRange {
  start: number;
  end: number;
}

export interface OutputSection {
  range: ByteRange;
  placeholder: PlaceholderDescriptor;
}

export interface CommandOutput {
  text: string;
  sections: OutputSection[];
  runCommandsInText: boolean;
}

export type RustdocItemKind =
  | 'mod'
  | 'macro'
  | 'struct'
  | 'enum'
  | 'constant'
  | 'trait'
  | 'fn'
  | 'type'
  | 'static'
  | 'union'
  | 'attr'
  | 'derive'
  | 'primitive';

/**
 * An item linked from a rustdoc page. `path` is the chain of modules
 * between the crate root and the item.
 */
export interface RustdocItem {
  kind: RustdocItemKind;
  name: string;
  path: string[];
}

export interface ConversionResult {
  markdown: string;
  items: RustdocItem[];
}

/**
 * Turns raw rustdoc HTML into Markdown; throws ConversionError on bad input
 */
export type MarkupConverter = (html: Uint8Array | string) => ConversionResult;

/**
 * Filesystem collaborator
 */
export interface Fs {
  /** Rejects when the file is missing or unreadable */
  load(path: string): Promise<Buffer>;
  isFile(path: string): Promise<boolean>;
}

export type HttpBody = string | undefined;

export interface HttpResponse {
  status: number;
  body: AsyncIterable<Uint8Array>;
}

/**
 * HTTP collaborator
 */
export interface HttpClient {
  get(url: string, body: HttpBody, followRedirects: boolean): Promise<HttpResponse>;
}

/**
 * A source of rustdoc pages for the store's crawler
 */
export interface CrawlProvider {
  /**
   * Page for `item` inside `crateName`, or the crate root page when no item
   * is given. Resolves to null when the page does not exist.
   */
  fetchPage(crateName: string, item?: RustdocItem): Promise<string | null>;
}

/**
 * Persistent cache and search index of rustdoc pages
 */
export interface DocStore {
  /** Rejects with StoreMissError when nothing is stored for the item */
  load(crateName: string, itemPath?: string): Promise<string>;
  search(query: string): Promise<Array<[string, RustdocItem]>>;
  index(crateName: string, provider: CrawlProvider): Promise<void>;
}
