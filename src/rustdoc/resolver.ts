/**
 * Rustdoc resolution: store, then local build output, then the remote host.
 * Stages run one after another; only the two miss errors move on to the next.
 */

import { LocalReadMissError, StoreMissError } from '../errors/index.js';
import type { LookupRequest, ResolutionResult } from '../types/docs.js';
import { throwIfCancelled } from '../utils/cancellation.js';
import type { RustdocContext } from './context.js';
import { loadLocalBuildDocs } from './local.js';
import { fetchRemoteDocs } from './remote.js';

export async function resolveDocs(
  ctx: RustdocContext,
  request: LookupRequest,
  workspaceRoot: string | null,
  signal?: AbortSignal
): Promise<ResolutionResult> {
  const { crateName, itemPath } = request;
  const meta = { crateName, itemPath: itemPath.join('::') };

  try {
    const text = await ctx.store.load(crateName, itemPath.join('::'));
    ctx.logger.debug('Resolved docs from store', meta);
    return { source: 'local', text };
  } catch (error) {
    if (!(error instanceof StoreMissError)) {
      throw error;
    }
    ctx.logger.debug('Store miss, trying local build', meta);
  }

  if (workspaceRoot) {
    throwIfCancelled(signal, 'local lookup');
    try {
      const result = await loadLocalBuildDocs(ctx, workspaceRoot, crateName, itemPath);
      ctx.logger.debug('Resolved docs from local build', meta);
      return result;
    } catch (error) {
      if (!(error instanceof LocalReadMissError)) {
        throw error;
      }
      ctx.logger.debug('Local build miss, fetching remote docs', { ...meta, path: error.context?.['path'] });
    }
  }

  throwIfCancelled(signal, 'remote fetch');
  const result = await fetchRemoteDocs(ctx, crateName, itemPath);
  ctx.logger.debug('Resolved docs from remote host', { ...meta, host: ctx.docs.remoteHost });
  return result;
}
