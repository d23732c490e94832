import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * The file operations storage needs. Tests swap in an in-memory port.
 */
export type FileSystemPort = {
  /** Resolves to `undefined` when the file does not exist */
  read(path: string): Promise<string | undefined>;
  /** Creates missing parent directories */
  write(path: string, data: string): Promise<void>;
};

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export const nodeFileSystem: FileSystemPort = {
  async read(path) {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return undefined;
      }
      throw error;
    }
  },

  async write(path, data) {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, data, 'utf-8');
  },
};
