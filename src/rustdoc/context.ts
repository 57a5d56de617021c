import type { DocsConfig } from '../config/schema.js';
import type { Logger } from '../logger/index.js';
import type { DocStore, Fs, HttpClient, MarkupConverter } from '../types/docs.js';

/**
 * Collaborators shared by the resolver and the index dispatcher.
 * The store is one instance per process, handed in by reference.
 */
export interface RustdocContext {
  store: DocStore;
  fs: Fs;
  http: HttpClient;
  convert: MarkupConverter;
  docs: DocsConfig;
  logger: Logger;
}
