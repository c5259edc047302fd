/**
 * @fileoverview Undo stack of inverse-applicable session mutations
 * @description Entries form a closed union; undoing one dispatches through an
 * exhaustive switch to the applier, which performs the inverse mutation.
 */

import { scoped } from './utils/logger';
import { ErrorCategory, LogrokError } from './utils/errors';
import { MarkRole } from './types/session-types';
import { type FoldState, type MarkSnapshot, type UndoEntry } from './types/common';

const log = scoped('UndoStack');

/**
 * Mutations the undo stack needs from its owner
 */
export interface UndoApplier {
  restoreMark(mark: MarkSnapshot): void;
  removeMark(pattern: string): void;
  setMarkRole(pattern: string, role: MarkRole): void;
  toggleManualTag(line: number): void;
  toggleManualHide(line: number): void;
  setIndentColumn(column: number): void;
  setFold(line: number, state: FoldState | null): void;
}

interface UndoStats {
  entries: number;
  byKind: Partial<Record<UndoEntry['kind'], number>>;
}

class UndoStack {
  private entries: UndoEntry[] = [];

  push(entry: UndoEntry): void {
    this.entries.push(entry);
    log.debug(`Recorded ${entry.kind} (${this.entries.length} entries)`);
  }

  /**
   * Apply the inverse of the newest entry and drop it
   * @throws LogrokError(EmptyStack)
   */
  undo(applier: UndoApplier): UndoEntry {
    const entry = this.entries.pop();
    if (!entry) {
      throw new LogrokError(ErrorCategory.EmptyStack, 'Nothing to undo');
    }

    applyInverse(entry, applier);
    log.debug(`Undid ${entry.kind}`);
    return entry;
  }

  canUndo(): boolean {
    return this.entries.length > 0;
  }

  peek(): UndoEntry | null {
    return this.entries[this.entries.length - 1] ?? null;
  }

  get size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }

  getStats(): UndoStats {
    const byKind: Partial<Record<UndoEntry['kind'], number>> = {};
    for (const entry of this.entries) {
      byKind[entry.kind] = (byKind[entry.kind] ?? 0) + 1;
    }
    return { entries: this.entries.length, byKind };
  }
}

function applyInverse(entry: UndoEntry, applier: UndoApplier): void {
  switch (entry.kind) {
    case 'markToggle':
      if (entry.added) {
        applier.removeMark(entry.mark.pattern);
      } else {
        applier.restoreMark(entry.mark);
      }
      return;
    case 'markReplace':
      applier.removeMark(entry.added.pattern);
      applier.restoreMark(entry.removed);
      return;
    case 'markRoleChange':
      applier.setMarkRole(entry.pattern, entry.oldRole);
      return;
    case 'tagToggle':
      applier.toggleManualTag(entry.line);
      return;
    case 'hideToggle':
      applier.toggleManualHide(entry.line);
      return;
    case 'indentChange':
      applier.setIndentColumn(entry.oldColumn);
      return;
    case 'foldChange':
      applier.setFold(entry.line, entry.oldState);
      return;
    default: {
      const unreachable: never = entry;
      throw new Error(`Unknown undo entry: ${JSON.stringify(unreachable)}`);
    }
  }
}

export { UndoStack, applyInverse, type UndoStats };
