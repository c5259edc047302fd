/**
 * In-memory line source
 */

import { LineSource } from './line-source';

class MemoryLineSource extends LineSource {
  public readonly name: string | null;
  private data: Buffer;

  constructor(content: Buffer | string, name: string | null = null) {
    super();
    this.data = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
    this.name = name;
  }

  async getSize(): Promise<number> {
    return this.data.length;
  }

  async read(offset: number, length: number): Promise<Buffer> {
    const start = Math.max(0, Math.min(offset, this.data.length));
    return this.data.subarray(start, Math.min(this.data.length, start + length));
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}

export { MemoryLineSource };
