/**
 * @fileoverview Line index over a large log file
 * @description One pass over the source records the byte offset of every line
 * start in a flat offset table and groups lines into splits of roughly
 * `splitBytes` bytes. The index is immutable once built.
 */

import { LineSource } from './storage/line-source';
import { scoped } from './utils/logger';
import { ErrorCategory, LogrokError, throwIfAborted } from './utils/errors';
import { yieldToEventLoop } from './utils/background-task';
import { type LineSpan, type SplitRange } from './types/common';

const log = scoped('LineIndex');

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export interface IndexOptions {
  /** Bytes read per scan step */
  chunkBytes?: number;
  /** A split closes at the first line start at least this many bytes past its own */
  splitBytes?: number;
  signal?: AbortSignal;
  /** Receives the fraction of bytes scanned */
  onProgress?: (fraction: number) => void;
}

/**
 * Growable offset table backed by a Float64Array (offsets may exceed 2^32)
 */
class OffsetTable {
  private data: Float64Array;
  public length: number = 0;

  constructor(initialCapacity: number = 1024) {
    this.data = new Float64Array(Math.max(1, initialCapacity));
  }

  push(value: number): void {
    if (this.length === this.data.length) {
      const grown = new Float64Array(this.data.length * 2);
      grown.set(this.data);
      this.data = grown;
    }
    this.data[this.length++] = value;
  }

  get(index: number): number {
    return this.data[index];
  }

  /**
   * Drop spare capacity once building is finished
   */
  seal(): void {
    if (this.data.length !== this.length) {
      this.data = this.data.slice(0, Math.max(1, this.length));
    }
  }

  get byteSize(): number {
    return this.data.byteLength;
  }
}

class LineIndex {
  public readonly fileSize: number;
  public readonly endsWithNewline: boolean;
  private lineStarts: OffsetTable;
  private splitStarts: number[];

  private constructor(fileSize: number, endsWithNewline: boolean, lineStarts: OffsetTable, splitStarts: number[]) {
    this.fileSize = fileSize;
    this.endsWithNewline = endsWithNewline;
    this.lineStarts = lineStarts;
    this.splitStarts = splitStarts;
  }

  /**
   * Scan a source and build its line index
   * @throws LogrokError(IO) on read failure, LogrokError(Cancelled) when the signal fires
   */
  static async build(source: LineSource, options: IndexOptions = {}): Promise<LineIndex> {
    const chunkBytes = Math.max(1, options.chunkBytes ?? 1024 * 1024);
    const splitBytes = Math.max(1, options.splitBytes ?? 1024 * 1024);
    const fileSize = await source.getSize();

    const lineStarts = new OffsetTable(Math.max(1024, Math.ceil(fileSize / 80)));
    const splitStarts: number[] = [0];
    lineStarts.push(0);

    let splitOffset = 0;
    let position = 0;
    let lastByte = -1;

    while (position < fileSize) {
      throwIfAborted(options.signal, 'Indexing');

      const chunk = await source.read(position, Math.min(chunkBytes, fileSize - position));
      if (chunk.length === 0) {
        throw new LogrokError(ErrorCategory.IO, `Unexpected end of data at byte ${position} of ${fileSize}`);
      }

      let newline = chunk.indexOf(NEWLINE);
      while (newline !== -1) {
        const nextStart = position + newline + 1;
        if (nextStart < fileSize) {
          if (nextStart - splitOffset >= splitBytes) {
            splitStarts.push(lineStarts.length);
            splitOffset = nextStart;
          }
          lineStarts.push(nextStart);
        }
        newline = chunk.indexOf(NEWLINE, newline + 1);
      }

      lastByte = chunk[chunk.length - 1];
      position += chunk.length;

      options.onProgress?.(position / fileSize);
      await yieldToEventLoop();
    }

    lineStarts.seal();
    log.debug(`${lineStarts.length} lines in ${splitStarts.length} splits (${fileSize} bytes)`);

    return new LineIndex(fileSize, lastByte === NEWLINE, lineStarts, splitStarts);
  }

  get lineCount(): number {
    return this.lineStarts.length;
  }

  get splitCount(): number {
    return this.splitStarts.length;
  }

  get memoryBytes(): number {
    return this.lineStarts.byteSize + this.splitStarts.length * 8;
  }

  /**
   * Byte span of line n, excluding its newline
   */
  lineAt(n: number): LineSpan {
    this._checkLine(n);
    const offset = this.lineStarts.get(n);
    let end: number;
    if (n + 1 < this.lineStarts.length) {
      end = this.lineStarts.get(n + 1) - 1;
    } else {
      end = this.endsWithNewline ? this.fileSize - 1 : this.fileSize;
    }
    return { offset, length: end - offset };
  }

  /**
   * Line containing a byte offset. A newline byte belongs to the line it ends.
   */
  lineNumberForOffset(offset: number): number {
    if (offset <= 0) return 0;
    if (offset >= this.fileSize) return this.lineStarts.length - 1;

    let left = 0;
    let right = this.lineStarts.length - 1;
    let result = 0;

    while (left <= right) {
      const mid = Math.floor((left + right) / 2);
      if (this.lineStarts.get(mid) <= offset) {
        result = mid;
        left = mid + 1;
      } else {
        right = mid - 1;
      }
    }

    return result;
  }

  splitForLine(n: number): number {
    this._checkLine(n);

    let left = 0;
    let right = this.splitStarts.length - 1;
    let result = 0;

    while (left <= right) {
      const mid = Math.floor((left + right) / 2);
      if (this.splitStarts[mid] <= n) {
        result = mid;
        left = mid + 1;
      } else {
        right = mid - 1;
      }
    }

    return result;
  }

  splitRange(splitId: number): SplitRange {
    if (!Number.isInteger(splitId) || splitId < 0 || splitId >= this.splitStarts.length) {
      throw new LogrokError(ErrorCategory.InvalidArgument, `Split ${splitId} out of range`);
    }

    const startLine = this.splitStarts[splitId];
    const endLine = splitId + 1 < this.splitStarts.length ? this.splitStarts[splitId + 1] : this.lineStarts.length;
    const byteOffset = this.lineStarts.get(startLine);
    const byteEnd = endLine < this.lineStarts.length ? this.lineStarts.get(endLine) : this.fileSize;

    return { splitId, startLine, endLine, byteOffset, byteLength: byteEnd - byteOffset };
  }

  /**
   * Decode every line of a split from the raw bytes of its range
   */
  decodeSplit(range: SplitRange, data: Buffer): string[] {
    const lines: string[] = [];
    for (let n = range.startLine; n < range.endLine; n++) {
      const span = this.lineAt(n);
      const start = span.offset - range.byteOffset;
      let end = start + span.length;
      if (end > start && data[end - 1] === CARRIAGE_RETURN) {
        end--;
      }
      lines.push(data.toString('utf8', start, end));
    }
    return lines;
  }

  private _checkLine(n: number): void {
    if (!Number.isInteger(n) || n < 0 || n >= this.lineStarts.length) {
      throw new LogrokError(ErrorCategory.InvalidArgument, `Line ${n} out of range (0-${this.lineStarts.length - 1})`);
    }
  }
}

export { LineIndex };
