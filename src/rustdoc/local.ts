/**
 * Local `cargo doc` output lookup
 */

import { join } from 'path';
import { LocalReadMissError, toError } from '../errors/index.js';
import type { ResolutionResult } from '../types/docs.js';
import type { RustdocContext } from './context.js';

/**
 * `<root>/target/doc/<crate>/<a>/<b>/index.html`
 */
export function localDocPath(
  workspaceRoot: string,
  buildDocDir: string,
  crateName: string,
  itemPath: readonly string[]
): string {
  const segments = itemPath.length > 0 ? [itemPath.join('/')] : [];
  return join(workspaceRoot, buildDocDir, crateName, ...segments, 'index.html');
}

/**
 * Read and convert the locally built page. A read failure is a
 * LocalReadMissError; a conversion failure propagates as is.
 */
export async function loadLocalBuildDocs(
  ctx: RustdocContext,
  workspaceRoot: string,
  crateName: string,
  itemPath: readonly string[]
): Promise<ResolutionResult> {
  const path = localDocPath(workspaceRoot, ctx.docs.buildDocDir, crateName, itemPath);

  let contents: Buffer;
  try {
    contents = await ctx.fs.load(path);
  } catch (error) {
    throw new LocalReadMissError(path, toError(error));
  }

  const { markdown } = ctx.convert(contents);
  return { source: 'local', text: markdown };
}
