/**
 * Remote documentation fetcher (docs.rs by default)
 */

import { RemoteStatusError, TransportError, toError } from '../errors/index.js';
import type { ResolutionResult } from '../types/docs.js';
import { readToEnd } from '../utils/http.js';
import type { DocsConfig } from '../config/schema.js';
import type { RustdocContext } from './context.js';

const SNIPPET_LENGTH = 200;

/**
 * `https://docs.rs/<crate>/latest/<crate>/<a>/<b>`
 */
export function remoteDocUrl(docs: DocsConfig, crateName: string, itemPath: readonly string[]): string {
  return `https://${docs.remoteHost}/${crateName}/${docs.version}/${crateName}/${itemPath.join('/')}`;
}

/**
 * Fetch the page once, following redirects. Client errors become a
 * RemoteStatusError; every other status is handed to the converter.
 */
export async function fetchRemoteDocs(
  ctx: RustdocContext,
  crateName: string,
  itemPath: readonly string[]
): Promise<ResolutionResult> {
  const url = remoteDocUrl(ctx.docs, crateName, itemPath);
  const response = await ctx.http.get(url, undefined, true);

  let body: Buffer;
  try {
    body = await readToEnd(response.body);
  } catch (error) {
    throw new TransportError(`error reading ${ctx.docs.remoteHost} response body`, { url }, toError(error));
  }

  if (response.status >= 400 && response.status < 500) {
    const text = new TextDecoder().decode(body);
    // Cut on code points so a surrogate pair is never split
    const snippet = Array.from(text).slice(0, SNIPPET_LENGTH).join('');
    throw new RemoteStatusError(response.status, snippet, url);
  }

  const { markdown } = ctx.convert(body);
  return { source: 'docs.rs', text: markdown };
}
