import fs from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import type { ResourceSnapshot, ResourceStore } from './types.js';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR']);

function isMissingFileError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return typeof error.code === 'string' && MISSING_CODES.has(error.code);
}

export function computeEtag(size: number, mtimeMs: number): string {
  return `W/"${size.toString(16)}-${Math.floor(mtimeMs).toString(16)}"`;
}

export class LocalResourceStore implements ResourceStore {
  kind: 'local' = 'local';

  constructor(public readonly location: string) {}

  async read(): Promise<ResourceSnapshot | null> {
    let handle: FileHandle;
    try {
      handle = await fs.open(this.location, 'r');
    } catch (error) {
      if (isMissingFileError(error)) return null;
      throw error;
    }

    // stat and read through one handle: the export pipeline may swap the file between calls.
    try {
      const stats = await handle.stat();
      if (!stats.isFile()) return null;
      const bytes = await handle.readFile();
      return {
        bytes,
        size: bytes.length,
        modifiedAt: stats.mtime,
        etag: computeEtag(bytes.length, stats.mtimeMs),
      };
    } catch (error) {
      if (isMissingFileError(error)) return null;
      throw error;
    } finally {
      await handle.close();
    }
  }
}
