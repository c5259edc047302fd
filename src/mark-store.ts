/**
 * @fileoverview Keyword marks with palette slots, roles and a pending selection
 * @description Marks are keyed by pattern; toggling a known pattern removes it.
 * Every mutation bumps `generation` so derived per-line state can tell when it
 * is stale.
 */

import { MarkRole, MatchType } from './types/session-types';
import { buildMarkRegExp, findMatches, hasMatch, spanCovers } from './utils/pattern';
import { ErrorCategory, LogrokError } from './utils/errors';
import { scoped } from './utils/logger';
import {
  type MarkMatch,
  type MarkSnapshot,
  type PendingSelection,
  type Span,
  type ToggleResult
} from './types/common';

const log = scoped('MarkStore');

interface Mark extends MarkSnapshot {
  regex: RegExp;
}

export type SelectionEdge = 'start' | 'end';

class MarkStore {
  public generation: number = 0;

  private marks: Map<string, Mark> = new Map();
  private paletteSize: number;
  private slotAssignedAt: number[];
  private assignCounter: number = 0;
  private nextId: number = 1;
  private pending: PendingSelection | null = null;

  constructor(paletteSize: number = 8) {
    this.paletteSize = Math.max(1, paletteSize);
    this.slotAssignedAt = new Array<number>(this.paletteSize).fill(0);
  }

  // =================== MEMBERSHIP ===================

  /**
   * Add the pattern as a mark, or remove it if it is already marked
   */
  toggleMark(pattern: string, matchType: MatchType = MatchType.TEXT): ToggleResult {
    const existing = this.marks.get(pattern);
    if (existing) {
      this.marks.delete(pattern);
      this.generation++;
      log.debug(`Removed mark "${pattern}"`);
      return { kind: 'removed', mark: this._snapshot(existing) };
    }

    const mark: Mark = {
      id: this.nextId++,
      pattern,
      matchType,
      slot: this._allocateSlot(),
      role: MarkRole.MARK,
      regex: buildMarkRegExp(pattern, matchType)
    };
    this.marks.set(pattern, mark);
    this.generation++;
    log.debug(`Added mark "${pattern}" (${matchType}) in slot ${mark.slot}`);
    return { kind: 'added', mark: this._snapshot(mark) };
  }

  /**
   * Reinstate a mark exactly as snapshotted
   */
  restoreMark(snapshot: MarkSnapshot): void {
    this.marks.set(snapshot.pattern, {
      ...snapshot,
      regex: buildMarkRegExp(snapshot.pattern, snapshot.matchType)
    });
    this.nextId = Math.max(this.nextId, snapshot.id + 1);
    this.generation++;
  }

  removeMark(pattern: string): MarkSnapshot | null {
    const existing = this.marks.get(pattern);
    if (!existing) return null;
    this.marks.delete(pattern);
    this.generation++;
    return this._snapshot(existing);
  }

  getMark(pattern: string): MarkSnapshot | null {
    const mark = this.marks.get(pattern);
    return mark ? this._snapshot(mark) : null;
  }

  hasMark(pattern: string): boolean {
    return this.marks.has(pattern);
  }

  /**
   * All marks in creation order
   */
  getMarks(): MarkSnapshot[] {
    return [...this.marks.values()]
      .sort((a, b) => a.id - b.id)
      .map(mark => this._snapshot(mark));
  }

  get size(): number {
    return this.marks.size;
  }

  hasRole(role: MarkRole): boolean {
    for (const mark of this.marks.values()) {
      if (mark.role === role) return true;
    }
    return false;
  }

  // =================== ROLE & COLOUR ===================

  /**
   * @returns the previous role
   */
  setRole(pattern: string, role: MarkRole): MarkRole {
    const mark = this._require(pattern);
    const previous = mark.role;
    if (previous !== role) {
      mark.role = role;
      this.generation++;
    }
    return previous;
  }

  /**
   * Move a mark to a neighbouring palette slot
   * @returns the new slot
   */
  cycleColor(pattern: string, direction: 1 | -1 = 1): number {
    const mark = this._require(pattern);
    mark.slot = (mark.slot + direction + this.paletteSize) % this.paletteSize;
    this.slotAssignedAt[mark.slot] = ++this.assignCounter;
    return mark.slot;
  }

  // =================== MATCHING ===================

  matches(pattern: string, content: string): Span[] {
    const mark = this.marks.get(pattern);
    return mark ? findMatches(mark.regex, content) : [];
  }

  /**
   * Every match of every mark in a line, marks in creation order
   */
  matchesInLine(content: string): MarkMatch[] {
    const result: MarkMatch[] = [];
    for (const mark of this._ordered()) {
      for (const span of findMatches(mark.regex, content)) {
        result.push({ ...span, mark: this._snapshot(mark) });
      }
    }
    return result;
  }

  /**
   * Matches covering a column; at most one per mark
   */
  marksAt(content: string, column: number): MarkMatch[] {
    const result: MarkMatch[] = [];
    for (const mark of this._ordered()) {
      const span = findMatches(mark.regex, content).find(candidate => spanCovers(candidate, column));
      if (span) {
        result.push({ ...span, mark: this._snapshot(mark) });
      }
    }
    return result;
  }

  /**
   * The single match under a column
   * @throws LogrokError(AmbiguousSelection) when several marks cover it
   */
  markAt(content: string, column: number): MarkMatch | null {
    const found = this.marksAt(content, column);
    if (found.length > 1) {
      throw new LogrokError(
        ErrorCategory.AmbiguousSelection,
        `${found.length} marks under column ${column}`,
        { patterns: found.map(match => match.mark.pattern) }
      );
    }
    return found[0] ?? null;
  }

  lineHasRole(content: string, role: MarkRole): boolean {
    for (const mark of this.marks.values()) {
      if (mark.role === role && hasMatch(mark.regex, content)) {
        return true;
      }
    }
    return false;
  }

  // =================== PENDING SELECTION ===================

  beginSelection(line: number, content: string, start: number, end: number, replaces: string | null = null): PendingSelection {
    if (start < 0 || end > content.length || end <= start) {
      throw new LogrokError(ErrorCategory.InvalidArgument, `Empty selection at ${line}:${start}`);
    }
    this.pending = { line, content, start, end, replaces };
    return { ...this.pending };
  }

  get pendingSelection(): PendingSelection | null {
    return this.pending ? { ...this.pending } : null;
  }

  /**
   * Grow the selection by one character; no-op at the line bounds
   */
  extendSelection(edge: SelectionEdge): PendingSelection {
    const pending = this._requirePending();
    if (edge === 'start') {
      pending.start = Math.max(0, pending.start - 1);
    } else {
      pending.end = Math.min(pending.content.length, pending.end + 1);
    }
    return { ...pending };
  }

  /**
   * Shrink the selection by one character; never below one character
   */
  shrinkSelection(edge: SelectionEdge): PendingSelection {
    const pending = this._requirePending();
    if (pending.end - pending.start > 1) {
      if (edge === 'start') {
        pending.start++;
      } else {
        pending.end--;
      }
    }
    return { ...pending };
  }

  cancelSelection(): void {
    this.pending = null;
  }

  /**
   * Turn the selected text into a literal mark
   */
  commitSelection(): { result: ToggleResult | null; replaced: MarkSnapshot | null } {
    const pending = this._requirePending();
    const text = pending.content.slice(pending.start, pending.end);

    if (pending.replaces === null) {
      this.pending = null;
      return { result: this.toggleMark(text, MatchType.TEXT), replaced: null };
    }

    if (pending.replaces === text) {
      // Reshaped back to where it started
      this.pending = null;
      return { result: null, replaced: null };
    }

    if (this.marks.has(text)) {
      throw new LogrokError(ErrorCategory.InvalidArgument, `"${text}" is already marked`);
    }

    this.pending = null;
    const replaced = this.removeMark(pending.replaces);
    return { result: this.toggleMark(text, MatchType.TEXT), replaced };
  }

  // =================== INTERNALS ===================

  private _allocateSlot(): number {
    const used = new Set<number>();
    for (const mark of this.marks.values()) {
      used.add(mark.slot);
    }

    let slot = -1;
    for (let candidate = 0; candidate < this.paletteSize; candidate++) {
      if (!used.has(candidate)) {
        slot = candidate;
        break;
      }
    }

    if (slot === -1) {
      // Palette exhausted: reuse the slot assigned longest ago
      slot = 0;
      for (let candidate = 1; candidate < this.paletteSize; candidate++) {
        if (this.slotAssignedAt[candidate] < this.slotAssignedAt[slot]) {
          slot = candidate;
        }
      }
    }

    this.slotAssignedAt[slot] = ++this.assignCounter;
    return slot;
  }

  private _ordered(): Mark[] {
    return [...this.marks.values()].sort((a, b) => a.id - b.id);
  }

  private _require(pattern: string): Mark {
    const mark = this.marks.get(pattern);
    if (!mark) {
      throw new LogrokError(ErrorCategory.InvalidArgument, `No mark for "${pattern}"`);
    }
    return mark;
  }

  private _requirePending(): PendingSelection {
    if (!this.pending) {
      throw new LogrokError(ErrorCategory.InvalidArgument, 'No selection in progress');
    }
    return this.pending;
  }

  private _snapshot(mark: Mark): MarkSnapshot {
    return {
      id: mark.id,
      pattern: mark.pattern,
      matchType: mark.matchType,
      slot: mark.slot,
      role: mark.role
    };
  }
}

export { MarkStore };
