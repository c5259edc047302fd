/**
 * @fileoverview LRU cache of decoded splits
 * @description Splits are read from the line source on demand, decoded in one
 * piece and only then made visible to readers. Least-recently used splits are
 * evicted once the resident byte total exceeds the budget.
 */

import { LineSource } from './storage/line-source';
import { LineIndex } from './line-index';
import { SplitInfo } from './utils/split-info';
import { scoped } from './utils/logger';
import { type CacheMemoryStats } from './types/common';

const log = scoped('SplitCache');

export interface SplitCacheOptions {
  /** Byte budget for resident splits */
  cacheBytes?: number;
  onEvict?: (splitId: number, byteLength: number) => void;
}

class SplitCache {
  private source: LineSource;
  private index: LineIndex;
  private cacheBytes: number;
  private onEvict: ((splitId: number, byteLength: number) => void) | null;

  private splits: Map<number, SplitInfo> = new Map();
  private inflight: Map<number, Promise<SplitInfo>> = new Map();
  private lruOrder: number[] = [];
  private residentBytes: number = 0;
  // Bumped by clear() so loads started earlier are not inserted afterwards
  private epoch: number = 0;

  constructor(source: LineSource, index: LineIndex, options: SplitCacheOptions = {}) {
    this.source = source;
    this.index = index;
    this.cacheBytes = Math.max(1, options.cacheBytes ?? 64 * 1024 * 1024);
    this.onEvict = options.onEvict ?? null;
  }

  /**
   * Return a split, reading it if it is not resident
   */
  async fetch(splitId: number): Promise<SplitInfo> {
    const resident = this.splits.get(splitId);
    if (resident) {
      resident.touch();
      this._updateLRU(splitId);
      return resident;
    }

    const pending = this.inflight.get(splitId);
    if (pending) {
      return pending;
    }

    const load = this._load(splitId);
    this.inflight.set(splitId, load);
    try {
      return await load;
    } finally {
      if (this.inflight.get(splitId) === load) {
        this.inflight.delete(splitId);
      }
    }
  }

  /**
   * Start loading a split without waiting for it
   */
  prefetch(splitId: number): void {
    if (splitId < 0 || splitId >= this.index.splitCount) return;
    if (this.splits.has(splitId) || this.inflight.has(splitId)) return;

    this.fetch(splitId).catch((error: unknown) => {
      log.warn(`Prefetch of split ${splitId} failed:`, error);
    });
  }

  async getLine(lineNumber: number): Promise<string> {
    const split = await this.fetch(this.index.splitForLine(lineNumber));
    return split.getLine(lineNumber);
  }

  /**
   * Resident split for a line, without reading
   */
  peek(lineNumber: number): SplitInfo | null {
    return this.splits.get(this.index.splitForLine(lineNumber)) ?? null;
  }

  isResident(splitId: number): boolean {
    return this.splits.has(splitId);
  }

  configure(options: SplitCacheOptions): void {
    if (options.cacheBytes !== undefined) {
      this.cacheBytes = Math.max(1, options.cacheBytes);
      this._evictIfNeeded();
    }
    if (options.onEvict !== undefined) {
      this.onEvict = options.onEvict;
    }
  }

  clear(): void {
    this.splits.clear();
    this.inflight.clear();
    this.lruOrder = [];
    this.residentBytes = 0;
    this.epoch++;
  }

  getMemoryStats(): CacheMemoryStats {
    return {
      residentSplits: this.splits.size,
      totalSplits: this.index.splitCount,
      residentBytes: this.residentBytes,
      cacheBytes: this.cacheBytes,
      inflightLoads: this.inflight.size
    };
  }

  private async _load(splitId: number): Promise<SplitInfo> {
    const epoch = this.epoch;
    const range = this.index.splitRange(splitId);
    const data = await this.source.read(range.byteOffset, range.byteLength);
    const split = new SplitInfo(range, this.index.decodeSplit(range, data));

    if (epoch !== this.epoch) {
      return split;
    }

    this.splits.set(splitId, split);
    this.residentBytes += split.byteLength;
    this._updateLRU(splitId);
    this._evictIfNeeded();

    log.debug(`Loaded split ${splitId} (lines ${range.startLine}-${range.endLine - 1})`);
    return split;
  }

  private _updateLRU(splitId: number): void {
    const index = this.lruOrder.indexOf(splitId);
    if (index !== -1) {
      this.lruOrder.splice(index, 1);
    }
    this.lruOrder.push(splitId);
  }

  /**
   * Evict least-recently used splits; the most recent one always stays
   */
  private _evictIfNeeded(): void {
    while (this.residentBytes > this.cacheBytes && this.lruOrder.length > 1) {
      const splitId = this.lruOrder.shift();
      if (splitId === undefined) break;

      const split = this.splits.get(splitId);
      if (!split) continue;

      this.splits.delete(splitId);
      this.residentBytes -= split.byteLength;
      log.debug(`Evicted split ${splitId}`);

      if (this.onEvict) {
        this.onEvict(splitId, split.byteLength);
      }
    }
  }
}

export { SplitCache };
