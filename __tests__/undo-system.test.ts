/**
 * Undo stack dispatch of inverse operations
 */

import { UndoStack, type UndoApplier } from '../src/undo-system';
import { MarkRole, MatchType } from '../src/types/session-types';
import { ErrorCategory } from '../src/utils/errors';
import { type MarkSnapshot } from '../src/types/common';

function createApplier(): UndoApplier & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    restoreMark: (mark: MarkSnapshot) => calls.push(`restore ${mark.pattern}`),
    removeMark: (pattern: string) => calls.push(`remove ${pattern}`),
    setMarkRole: (pattern: string, role: MarkRole) => calls.push(`role ${pattern} ${role}`),
    toggleManualTag: (line: number) => calls.push(`tag ${line}`),
    toggleManualHide: (line: number) => calls.push(`hide ${line}`),
    setIndentColumn: (column: number) => calls.push(`indent ${column}`),
    setFold: (line, state) => calls.push(`fold ${line} ${state ? state.kind : 'default'}`)
  };
}

const SNAPSHOT: MarkSnapshot = { id: 1, pattern: 'ERROR', matchType: MatchType.WORD, slot: 0, role: MarkRole.MARK };

describe('UndoStack', () => {
  let stack: UndoStack;

  beforeEach(() => {
    stack = new UndoStack();
  });

  test('should fail with EmptyStack when there is nothing to undo', () => {
    expect(stack.canUndo()).toBe(false);
    expect(() => stack.undo(createApplier())).toThrow(expect.objectContaining({ category: ErrorCategory.EmptyStack }));
  });

  test('should undo in last-in first-out order', () => {
    const applier = createApplier();
    stack.push({ kind: 'tagToggle', line: 5 });
    stack.push({ kind: 'hideToggle', line: 6 });
    stack.push({ kind: 'indentChange', oldColumn: 8, newColumn: 12 });

    stack.undo(applier);
    stack.undo(applier);
    stack.undo(applier);

    expect(applier.calls).toEqual(['indent 8', 'hide 6', 'tag 5']);
    expect(stack.size).toBe(0);
  });

  test('should invert every entry kind', () => {
    const applier = createApplier();
    const added: MarkSnapshot = { ...SNAPSHOT, id: 2, pattern: 'ERRORS', matchType: MatchType.TEXT };
    stack.push({ kind: 'markToggle', mark: SNAPSHOT, added: true });
    stack.push({ kind: 'markToggle', mark: SNAPSHOT, added: false });
    stack.push({ kind: 'markReplace', removed: SNAPSHOT, added });
    stack.push({ kind: 'markRoleChange', pattern: 'ERROR', oldRole: MarkRole.MARK, newRole: MarkRole.TAG });
    stack.push({ kind: 'foldChange', line: 3, oldState: null, newState: { kind: 'collapsed', rowCount: 2 } });
    stack.push({
      kind: 'foldChange',
      line: 3,
      oldState: { kind: 'collapsed', rowCount: 2 },
      newState: { kind: 'expanded', scrollOffset: 0, previousRowCount: 2 }
    });

    while (stack.canUndo()) {
      stack.undo(applier);
    }

    expect(applier.calls).toEqual([
      'fold 3 collapsed',
      'fold 3 default',
      'role ERROR mark',
      'remove ERRORS',
      'restore ERROR',
      'restore ERROR',
      'remove ERROR'
    ]);
  });

  test('should count entries by kind and clear', () => {
    stack.push({ kind: 'tagToggle', line: 1 });
    stack.push({ kind: 'tagToggle', line: 2 });
    stack.push({ kind: 'hideToggle', line: 2 });

    expect(stack.getStats()).toEqual({ entries: 3, byKind: { tagToggle: 2, hideToggle: 1 } });
    expect(stack.peek()).toEqual({ kind: 'hideToggle', line: 2 });

    stack.clear();
    expect(stack.canUndo()).toBe(false);
    expect(stack.peek()).toBeNull();
  });
});
