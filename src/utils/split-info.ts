/**
 * Decoded split: a contiguous run of lines held in memory by the split cache
 */

import { type SplitMemoryStats, type SplitRange } from '../types/common';

class SplitInfo {
  public readonly splitId: number;
  public readonly startLine: number;
  public readonly lines: string[];
  public readonly byteLength: number;
  public lastAccess: number;

  constructor(range: SplitRange, lines: string[]) {
    this.splitId = range.splitId;
    this.startLine = range.startLine;
    this.lines = lines;
    this.byteLength = range.byteLength;
    this.lastAccess = Date.now();
  }

  get endLine(): number {
    return this.startLine + this.lines.length;
  }

  contains(lineNumber: number): boolean {
    return lineNumber >= this.startLine && lineNumber < this.endLine;
  }

  getLine(lineNumber: number): string {
    if (!this.contains(lineNumber)) {
      throw new RangeError(`Line ${lineNumber} is not in split ${this.splitId}`);
    }
    return this.lines[lineNumber - this.startLine];
  }

  touch(): void {
    this.lastAccess = Date.now();
  }

  getMemoryStats(): SplitMemoryStats {
    return {
      lines: this.lines.length,
      bytes: this.byteLength
    };
  }
}

export { SplitInfo };
