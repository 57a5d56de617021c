import { WorkspaceRootNotFoundError } from '../errors/index.js';
import type { RustdocContext } from '../rustdoc/context.js';
import { LocalProvider } from '../rustdoc/crawler.js';

/**
 * Crawl a crate's local `cargo doc` output into the store
 */
export async function dispatchIndex(
  ctx: RustdocContext,
  crateName: string,
  workspaceRoot: string | null
): Promise<string> {
  if (!workspaceRoot) {
    throw new WorkspaceRootNotFoundError(ctx.docs.manifestFile);
  }

  const provider = new LocalProvider(ctx.fs, workspaceRoot, ctx.docs.buildDocDir);
  ctx.logger.info('Indexing crate', { crateName, workspaceRoot });

  await ctx.store.index(crateName, provider);

  return `Indexed ${crateName}`;
}
