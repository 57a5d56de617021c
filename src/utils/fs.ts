/**
 * Filesystem collaborator backed by fs/promises
 */

import * as fs from 'fs/promises';
import type { Fs } from '../types/docs.js';

export class NodeFs implements Fs {
  async load(path: string): Promise<Buffer> {
    return fs.readFile(path);
  }

  async isFile(path: string): Promise<boolean> {
    try {
      const stats = await fs.stat(path);
      return stats.isFile();
    } catch {
      return false;
    }
  }
}
