import { readFile, realpath, stat } from 'fs/promises';

/**
 * A configuration source: a path relative to the root (or a logical name
 * for in-memory text) and its UTF-8 content.
 */
export interface RawSource {
  id: string;
  text: string;
}

/**
 * Reads configuration text by absolute path. The include resolver only ever
 * calls it with paths already confined to the configured root.
 */
export interface ISourceReader {
  read(path: string): Promise<string>;
  exists(path: string): Promise<boolean>;
  /** Canonical path with every symbolic link resolved. */
  realpath(path: string): Promise<string>;
}

export class FileSystemSourceReader implements ISourceReader {
  async read(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async exists(path: string): Promise<boolean> {
    try {
      const info = await stat(path);
      return info.isFile();
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  async realpath(path: string): Promise<string> {
    return realpath(path);
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
