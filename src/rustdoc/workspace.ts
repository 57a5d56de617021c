import { dirname, join } from 'path';
import type { Fs } from '../types/docs.js';

/**
 * Find the Cargo workspace root: the directory of the build manifest in the
 * project's first worktree. Null when there is none.
 */
export async function locateWorkspaceRoot(
  fs: Fs,
  worktrees: readonly string[],
  manifestFile: string = 'Cargo.toml'
): Promise<string | null> {
  const [first] = worktrees;
  if (!first) {
    return null;
  }

  const manifestPath = join(first, manifestFile);
  return (await fs.isFile(manifestPath)) ? dirname(manifestPath) : null;
}
