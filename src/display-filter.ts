/**
 * @fileoverview Mode-dependent visibility of lines
 */

import { LineIndex } from './line-index';
import { LineStateTable, type SearchProbe } from './line-state-table';
import { MarkStore } from './mark-store';
import { DisplayMode, MarkRole, SearchDirection } from './types/session-types';
import { type LineFlags } from './types/common';
import { throwIfAborted } from './utils/errors';
import { yieldToEventLoop } from './utils/background-task';

/**
 * Visibility rule for one line in one mode
 */
export function isVisible(mode: DisplayMode, flags: LineFlags): boolean {
  if (mode === DisplayMode.ALL) return true;

  if ((flags.manualHide || flags.markHide) && !flags.searchMatch) return false;

  switch (mode) {
    case DisplayMode.NORMAL:
      return true;
    case DisplayMode.TAGGED:
      return flags.manualTag || flags.markTag || flags.searchMatch;
    case DisplayMode.MANUAL:
      return flags.manualTag || flags.searchMatch;
  }
}

class DisplayFilter {
  private index: LineIndex;
  private state: LineStateTable;
  private marks: MarkStore;
  private search: SearchProbe;

  constructor(index: LineIndex, state: LineStateTable, marks: MarkStore, search: SearchProbe) {
    this.index = index;
    this.state = state;
    this.marks = marks;
    this.search = search;
  }

  async isLineVisible(line: number, mode: DisplayMode): Promise<boolean> {
    if (mode === DisplayMode.ALL) return true;
    return isVisible(mode, await this.state.getFlags(line));
  }

  /**
   * Visible lines starting at `from` (inclusive), produced lazily split by split
   */
  async *visibleLines(
    mode: DisplayMode,
    from: number = 0,
    direction: SearchDirection = SearchDirection.FORWARD,
    signal?: AbortSignal
  ): AsyncGenerator<number> {
    const lineCount = this.index.lineCount;
    if (from < 0 || from >= lineCount) return;

    const forward = direction === SearchDirection.FORWARD;
    let splitId = this.index.splitForLine(from);
    let first = true;

    while (splitId >= 0 && splitId < this.index.splitCount) {
      throwIfAborted(signal, 'Filtering');

      const range = this.index.splitRange(splitId);
      const flags = mode === DisplayMode.ALL ? null : await this.state.getSplitFlags(splitId);

      const begin = first ? from : forward ? range.startLine : range.endLine - 1;
      first = false;

      for (let line = begin; forward ? line < range.endLine : line >= range.startLine; line += forward ? 1 : -1) {
        if (!flags || isVisible(mode, this.state.combine(line, flags[line - range.startLine]))) {
          yield line;
        }
      }

      splitId += forward ? 1 : -1;
      if (flags) {
        await yieldToEventLoop();
      }
    }
  }

  /**
   * First visible line from `from` in a direction, inclusive
   */
  async nextVisible(from: number, mode: DisplayMode, direction: SearchDirection, signal?: AbortSignal): Promise<number | null> {
    for await (const line of this.visibleLines(mode, from, direction, signal)) {
      return line;
    }
    return null;
  }

  /**
   * The line itself if visible, else the closest visible line after it, else before it
   */
  async nearestVisible(line: number, mode: DisplayMode, signal?: AbortSignal): Promise<number | null> {
    const after = await this.nextVisible(line, mode, SearchDirection.FORWARD, signal);
    if (after !== null) return after;
    return this.nextVisible(line, mode, SearchDirection.BACKWARD, signal);
  }

  /**
   * Whether a mode shows at least one line
   */
  async hasVisible(mode: DisplayMode, signal?: AbortSignal): Promise<boolean> {
    if (mode === DisplayMode.ALL) return true;

    const searching = this.search.active;
    if (mode === DisplayMode.MANUAL && !this.state.hasManualTags() && !searching) {
      return false;
    }
    if (mode === DisplayMode.TAGGED && !this.state.hasManualTags() && !this.marks.hasRole(MarkRole.TAG) && !searching) {
      return false;
    }
    if (mode === DisplayMode.NORMAL && !this.state.hasManualHides() && !this.marks.hasRole(MarkRole.HIDE)) {
      return true;
    }

    return (await this.nextVisible(0, mode, SearchDirection.FORWARD, signal)) !== null;
  }
}

export { DisplayFilter };
