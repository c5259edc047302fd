/**
 * @fileoverview Per-line state: manual flags, folds and lazily derived flags
 * @description Manual tag/hide flags and fold states are stored sparsely.
 * Mark- and search-derived flags are computed a split at a time, the first
 * time any line of the split is queried, and stamped with the mark and search
 * generations they were computed against. A stale stamp means recompute on the
 * next query; no mutation ever triggers a whole-file pass.
 */

import { LineIndex } from './line-index';
import { SplitCache } from './split-cache';
import { MarkStore } from './mark-store';
import { MarkRole } from './types/session-types';
import { type FoldState, type LineFlags, type LineStatus } from './types/common';

export const FLAG_MARK_TAG = 1;
export const FLAG_MARK_HIDE = 2;
export const FLAG_SEARCH = 4;

/**
 * What the table needs to know about the active search
 */
export interface SearchProbe {
  readonly generation: number;
  readonly active: boolean;
  hasMatchInLine(content: string): boolean;
}

interface DerivedSplit {
  markGeneration: number;
  searchGeneration: number;
  flags: Uint8Array;
}

class LineStateTable {
  private index: LineIndex;
  private cache: SplitCache;
  private marks: MarkStore;
  private search: SearchProbe;

  private manualTags: Set<number> = new Set();
  private manualHides: Set<number> = new Set();
  private folds: Map<number, FoldState> = new Map();
  private derived: Map<number, DerivedSplit> = new Map();

  constructor(index: LineIndex, cache: SplitCache, marks: MarkStore, search: SearchProbe) {
    this.index = index;
    this.cache = cache;
    this.marks = marks;
    this.search = search;
  }

  // =================== MANUAL FLAGS ===================

  setManualTag(line: number, value: boolean): void {
    this._checkLine(line);
    if (value) this.manualTags.add(line);
    else this.manualTags.delete(line);
  }

  setManualHide(line: number, value: boolean): void {
    this._checkLine(line);
    if (value) this.manualHides.add(line);
    else this.manualHides.delete(line);
  }

  /**
   * @returns the new value
   */
  toggleManualTag(line: number): boolean {
    const value = !this.manualTags.has(line);
    this.setManualTag(line, value);
    return value;
  }

  toggleManualHide(line: number): boolean {
    const value = !this.manualHides.has(line);
    this.setManualHide(line, value);
    return value;
  }

  isManualTag(line: number): boolean {
    return this.manualTags.has(line);
  }

  isManualHide(line: number): boolean {
    return this.manualHides.has(line);
  }

  hasManualTags(): boolean {
    return this.manualTags.size > 0;
  }

  hasManualHides(): boolean {
    return this.manualHides.size > 0;
  }

  // =================== FOLDS ===================

  getFold(line: number): FoldState | null {
    return this.folds.get(line) ?? null;
  }

  setFold(line: number, state: FoldState | null): void {
    this._checkLine(line);
    if (state) this.folds.set(line, state);
    else this.folds.delete(line);
  }

  // =================== DERIVED FLAGS ===================

  /**
   * Derived flag bits for every line of a split, recomputed if stale
   */
  async getSplitFlags(splitId: number): Promise<Uint8Array> {
    const current = this.derived.get(splitId);
    if (current && this._isCurrent(current)) {
      return current.flags;
    }

    const markGeneration = this.marks.generation;
    const searchGeneration = this.search.generation;
    const split = await this.cache.fetch(splitId);

    const flags = new Uint8Array(split.lines.length);
    const checkTags = this.marks.hasRole(MarkRole.TAG);
    const checkHides = this.marks.hasRole(MarkRole.HIDE);
    const checkSearch = this.search.active;

    if (checkTags || checkHides || checkSearch) {
      for (let i = 0; i < split.lines.length; i++) {
        const content = split.lines[i];
        let bits = 0;
        if (checkTags && this.marks.lineHasRole(content, MarkRole.TAG)) bits |= FLAG_MARK_TAG;
        if (checkHides && this.marks.lineHasRole(content, MarkRole.HIDE)) bits |= FLAG_MARK_HIDE;
        if (checkSearch && this.search.hasMatchInLine(content)) bits |= FLAG_SEARCH;
        flags[i] = bits;
      }
    }

    // Marks or search may have changed while the split was being read
    if (markGeneration === this.marks.generation && searchGeneration === this.search.generation) {
      this.derived.set(splitId, { markGeneration, searchGeneration, flags });
    }
    return flags;
  }

  async getFlags(line: number): Promise<LineFlags> {
    const splitId = this.index.splitForLine(line);
    const flags = await this.getSplitFlags(splitId);
    const start = this.index.splitRange(splitId).startLine;
    return this.combine(line, flags[line - start]);
  }

  async getStatus(line: number): Promise<LineStatus> {
    const flags = await this.getFlags(line);
    return { ...flags, fold: this.getFold(line) };
  }

  /**
   * Merge a line's derived bits with its manual flags
   */
  combine(line: number, bits: number): LineFlags {
    return {
      manualTag: this.manualTags.has(line),
      manualHide: this.manualHides.has(line),
      markTag: (bits & FLAG_MARK_TAG) !== 0,
      markHide: (bits & FLAG_MARK_HIDE) !== 0,
      searchMatch: (bits & FLAG_SEARCH) !== 0
    };
  }

  /**
   * Number of splits whose derived flags are current
   */
  get currentSplitCount(): number {
    let count = 0;
    for (const entry of this.derived.values()) {
      if (this._isCurrent(entry)) count++;
    }
    return count;
  }

  getStats(): { manualTags: number; manualHides: number; folds: number; derivedSplits: number } {
    return {
      manualTags: this.manualTags.size,
      manualHides: this.manualHides.size,
      folds: this.folds.size,
      derivedSplits: this.derived.size
    };
  }

  clear(): void {
    this.manualTags.clear();
    this.manualHides.clear();
    this.folds.clear();
    this.derived.clear();
  }

  private _isCurrent(entry: DerivedSplit): boolean {
    return entry.markGeneration === this.marks.generation && entry.searchGeneration === this.search.generation;
  }

  private _checkLine(line: number): void {
    // lineAt validates the range
    this.index.lineAt(line);
  }
}

export { LineStateTable };
