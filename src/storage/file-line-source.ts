/**
 * Read-only file source using positioned reads
 */

import { promises as fs } from 'fs';
import { type FileHandle } from 'fs/promises';
import { LineSource } from './line-source';
import { ErrorCategory, LogrokError } from '../utils/errors';

class FileLineSource extends LineSource {
  public readonly name: string;
  private handle: FileHandle | null;
  private size: number;

  private constructor(filename: string, handle: FileHandle, size: number) {
    super();
    this.name = filename;
    this.handle = handle;
    this.size = size;
  }

  /**
   * Open a file for reading
   * @throws LogrokError(IO) when the file cannot be opened
   */
  static async open(filename: string): Promise<FileLineSource> {
    let handle: FileHandle;
    try {
      handle = await fs.open(filename, 'r');
    } catch (error) {
      throw new LogrokError(ErrorCategory.IO, `Failed to open file: ${_describe(error)}`, { filename });
    }

    try {
      const stats = await handle.stat();
      if (!stats.isFile()) {
        throw new LogrokError(ErrorCategory.IO, `Not a regular file: ${filename}`, { filename });
      }
      return new FileLineSource(filename, handle, stats.size);
    } catch (error) {
      await handle.close();
      if (error instanceof LogrokError) throw error;
      throw new LogrokError(ErrorCategory.IO, `Failed to stat file: ${_describe(error)}`, { filename });
    }
  }

  async getSize(): Promise<number> {
    return this.size;
  }

  async read(offset: number, length: number): Promise<Buffer> {
    if (!this.handle) {
      throw new LogrokError(ErrorCategory.IO, `File is closed: ${this.name}`);
    }

    const wanted = Math.max(0, Math.min(length, this.size - offset));
    const buffer = Buffer.alloc(wanted);
    let filled = 0;

    try {
      while (filled < wanted) {
        const { bytesRead } = await this.handle.read(buffer, filled, wanted - filled, offset + filled);
        if (bytesRead === 0) break;
        filled += bytesRead;
      }
    } catch (error) {
      throw new LogrokError(ErrorCategory.IO, `Failed to read ${this.name} at ${offset}: ${_describe(error)}`, {
        offset,
        length
      });
    }

    return filled === wanted ? buffer : buffer.subarray(0, filled);
  }

  async close(): Promise<void> {
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await handle.close();
    }
  }
}

function _describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export { FileLineSource };
