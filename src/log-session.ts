/**
 * @fileoverview Session controller for the log viewer core
 * @description Owns the loaded document, the marks, cursor, display mode,
 * indent column and undo history, and exposes the command and query surface
 * used by a terminal front end. Commands resolve to `true` when they changed
 * something; recoverable failures resolve to `false` and leave a status
 * message. Only I/O failures while loading are thrown.
 *
 * @example
 * import { LogSession } from 'logrok-core';
 *
 * const session = new LogSession({ indentColumn: 4 });
 * await session.loadFile('/var/log/app.log');
 * session.moveCursor(120, 8);
 * await session.toggleMark();           // mark the word under the cursor
 * await session.tagLine(120, false);    // that mark now tags its lines
 * await session.setMode(1);             // switch to the tagged view
 * const rows = await session.visibleRowsForViewport(0, 40, 120);
 */

import { LineSource } from './storage/line-source';
import { FileLineSource } from './storage/file-line-source';
import { MemoryLineSource } from './storage/memory-line-source';
import { LineIndex } from './line-index';
import { SplitCache } from './split-cache';
import { MarkStore, type SelectionEdge } from './mark-store';
import { LineStateTable } from './line-state-table';
import { DisplayFilter } from './display-filter';
import { SearchEngine, type SearchOptions, type SearchState } from './search-engine';
import { countRows, defaultRowCount, layout, minimumWidth, resolveHighlights } from './reflow-engine';
import { UndoStack, type UndoApplier } from './undo-system';
import { BackgroundTask } from './utils/background-task';
import { ErrorCategory, LogrokError, isLogrokError } from './utils/errors';
import { compileSearchPattern, spanCovers, wordAt } from './utils/pattern';
import { logger } from './utils/logger';
import {
  DEFAULT_SESSION_CONFIG,
  DISPLAY_MODE_NAMES,
  DisplayMode,
  MarkRole,
  MatchType,
  NotificationType,
  SearchDirection,
  StatusMessage,
  type SessionConfig
} from './types/session-types';
import {
  type DisplayRow,
  type FoldState,
  type HighlightSpan,
  type LineStatus,
  type MarkSnapshot,
  type MemoryStats,
  type NotificationSeverity,
  type PendingSelection,
  type Position,
  type SearchMatch,
  type SessionNotification,
  type ToggleResult,
  type UndoEntry
} from './types/common';

const log = logger.scoped('LogSession');

const MODE_ORDER: DisplayMode[] = [DisplayMode.ALL, DisplayMode.NORMAL, DisplayMode.TAGGED, DisplayMode.MANUAL];

export type ModeDelta = 1 | -1;

export interface LoadOptions {
  signal?: AbortSignal;
  onProgress?: (fraction: number) => void;
}

export interface MarkSelection {
  pattern: string;
  matchType?: MatchType;
}

interface LoadedDocument {
  source: LineSource;
  index: LineIndex;
  cache: SplitCache;
  search: SearchEngine;
  lineState: LineStateTable;
  filter: DisplayFilter;
}

class SessionNotificationImpl implements SessionNotification {
  public timestamp: Date;

  constructor(
    public type: string,
    public severity: NotificationSeverity,
    public message: string,
    public metadata: Record<string, unknown> = {}
  ) {
    this.timestamp = new Date();
  }
}

class LogSession {
  public config: SessionConfig;

  private document: LoadedDocument | null = null;
  private marks: MarkStore;
  private undoStack: UndoStack = new UndoStack();

  private mode: DisplayMode = DisplayMode.NORMAL;
  private cursor: Position = { line: 0, column: 0 };
  // Cursor held in each mode before switching away; dropped when the cursor moves
  private modeAnchors: Map<DisplayMode, Position> = new Map();
  private indentColumn: number;
  private lastWidth: number | null = null;
  private status: string | null = null;

  private indexTask: BackgroundTask<LineIndex> | null = null;
  private searchTask: BackgroundTask<SearchMatch> | null = null;

  private notifications: SessionNotification[] = [];
  private notificationCallbacks: Array<(notification: SessionNotification) => void> = [];

  private readonly applier: UndoApplier = {
    restoreMark: mark => this.marks.restoreMark(mark),
    removeMark: pattern => {
      this.marks.removeMark(pattern);
    },
    setMarkRole: (pattern, role) => {
      this.marks.setRole(pattern, role);
    },
    toggleManualTag: line => {
      this._requireDocument().lineState.toggleManualTag(line);
    },
    toggleManualHide: line => {
      this._requireDocument().lineState.toggleManualHide(line);
    },
    setIndentColumn: column => {
      this.indentColumn = column;
    },
    setFold: (line, state) => this._requireDocument().lineState.setFold(line, state)
  };

  constructor(config: Partial<SessionConfig> = {}) {
    this.config = { ...DEFAULT_SESSION_CONFIG, ...config };
    this.marks = new MarkStore(this.config.paletteSize);
    this.indentColumn = this.config.indentColumn;
    logger.setDebug(this.config.debug);
  }

  /**
   * Update configuration. Split and chunk sizes apply from the next load.
   */
  configure(config: Partial<SessionConfig>): void {
    this.config = { ...this.config, ...config };
    if (config.debug !== undefined) {
      logger.setDebug(config.debug);
    }
    if (config.indentColumn !== undefined) {
      this.indentColumn = config.indentColumn;
    }
    if (config.cacheBytes !== undefined && this.document) {
      this.document.cache.configure({ cacheBytes: config.cacheBytes });
    }
  }

  // =================== NOTIFICATIONS ===================

  onNotification(callback: (notification: SessionNotification) => void): void {
    this.notificationCallbacks.push(callback);
  }

  getNotifications(): SessionNotification[] {
    return [...this.notifications];
  }

  clearNotifications(): void {
    this.notifications = [];
  }

  _notify(type: string, severity: NotificationSeverity, message: string, metadata: Record<string, unknown> = {}): void {
    const notification = new SessionNotificationImpl(type, severity, message, metadata);
    if (severity !== 'debug') {
      this.notifications.push(notification);
      const excess = this.notifications.length - Math.max(0, this.config.notificationLimit);
      if (excess > 0) {
        this.notifications.splice(0, excess);
      }
    }

    for (const callback of this.notificationCallbacks) {
      try {
        callback(notification);
      } catch (error) {
        log.error('Notification callback error:', error);
      }
    }
  }

  // =================== LOADING ===================

  /**
   * Open and index a file. Resolves to false if the load was cancelled.
   * @throws LogrokError(IO) when the file cannot be opened or read
   */
  async loadFile(filename: string, options: LoadOptions = {}): Promise<boolean> {
    const source = await FileLineSource.open(filename);
    return this._loadSource(source, options);
  }

  /**
   * Index in-memory content as if it were a file
   */
  async loadContent(content: string | Buffer, options: LoadOptions = {}): Promise<boolean> {
    return this._loadSource(new MemoryLineSource(content), options);
  }

  private async _loadSource(source: LineSource, options: LoadOptions): Promise<boolean> {
    this.indexTask?.cancel();

    const task = new BackgroundTask<LineIndex>(
      'index',
      context => LineIndex.build(source, {
        chunkBytes: this.config.indexChunkBytes,
        splitBytes: this.config.splitBytes,
        signal: context.signal,
        onProgress: fraction => context.reportProgress(fraction)
      }),
      options.signal
    );
    task.onProgress(fraction => {
      options.onProgress?.(fraction);
      this._notify(NotificationType.INDEX_PROGRESS, 'debug', `Indexed ${Math.round(fraction * 100)}%`, { fraction });
    });
    this.indexTask = task;

    let index: LineIndex;
    try {
      index = await task.promise;
    } catch (error) {
      await source.close();
      if (isLogrokError(error, ErrorCategory.Cancelled)) {
        this._notify(NotificationType.TASK_CANCELLED, 'info', 'Load cancelled', { source: source.name });
        return false;
      }
      throw error;
    } finally {
      if (this.indexTask === task) {
        this.indexTask = null;
      }
    }

    await this._closeDocument();

    const cache = new SplitCache(source, index, {
      cacheBytes: this.config.cacheBytes,
      onEvict: (splitId, byteLength) => {
        this._notify(NotificationType.SPLIT_EVICTED, 'debug', `Evicted split ${splitId}`, { splitId, byteLength });
      }
    });
    const search = new SearchEngine(index, cache, { yieldEvery: this.config.yieldEvery });
    const lineState = new LineStateTable(index, cache, this.marks, search);
    const filter = new DisplayFilter(index, lineState, this.marks, search);
    this.document = { source, index, cache, search, lineState, filter };

    this.undoStack.clear();
    this.marks.cancelSelection();
    this.mode = DisplayMode.NORMAL;
    this.cursor = { line: 0, column: 0 };
    this.modeAnchors.clear();
    this.status = null;

    this._notify(
      NotificationType.FILE_LOADED,
      'info',
      `Loaded ${source.name ?? 'content'}: ${index.lineCount} lines`,
      { source: source.name, lines: index.lineCount, bytes: index.fileSize, splits: index.splitCount }
    );
    return true;
  }

  /**
   * Cancel background work and release the file
   */
  async close(): Promise<void> {
    this.indexTask?.cancel();
    this.searchTask?.cancel();
    await this._closeDocument();
  }

  private async _closeDocument(): Promise<void> {
    const document = this.document;
    if (!document) return;
    this.document = null;
    this.searchTask?.cancel();
    document.cache.clear();
    await document.source.close();
  }

  // =================== CURSOR ===================

  /**
   * Move the cursor, clamped to the file
   */
  moveCursor(line: number, column: number = 0): boolean {
    const document = this._requireDocument();
    const target = {
      line: Math.max(0, Math.min(document.index.lineCount - 1, Math.floor(line))),
      column: Math.max(0, Math.floor(column))
    };
    if (target.line === this.cursor.line && target.column === this.cursor.column) {
      return false;
    }
    this.cursor = target;
    this.modeAnchors.clear();
    this.marks.cancelSelection();
    return true;
  }

  cursorPosition(): Position {
    return { ...this.cursor };
  }

  // =================== MARKS ===================

  /**
   * Toggle a mark. Without a selection, acts on the cursor: removes the mark
   * under it, turns the search match under it into a mark, or marks the word
   * under it.
   */
  async toggleMark(selection?: MarkSelection): Promise<boolean> {
    return this._command('toggleMark', async () => {
      if (selection) {
        return this._recordToggle(this.marks.toggleMark(selection.pattern, selection.matchType ?? MatchType.TEXT));
      }

      const document = this._requireDocument();
      const content = await document.cache.getLine(this.cursor.line);
      const match = this.marks.markAt(content, this.cursor.column);
      if (match) {
        return this._recordToggle(this.marks.toggleMark(match.mark.pattern));
      }

      const hit = this._searchHitAtCursor(document, content);
      if (hit) {
        const result = this.marks.toggleMark(hit, MatchType.TEXT);
        document.search.clear();
        return this._recordToggle(result);
      }

      const word = wordAt(content, this.cursor.column, MatchType.WORD);
      if (!word) {
        throw new LogrokError(ErrorCategory.InvalidArgument, 'no word under cursor');
      }
      return this._recordToggle(this.marks.toggleMark(word.text, MatchType.WORD));
    });
  }

  /**
   * Start composing a literal mark at the cursor, seeded from the mark under it if any
   */
  async beginSelection(): Promise<boolean> {
    return this._command('beginSelection', async () => {
      const document = this._requireDocument();
      const content = await document.cache.getLine(this.cursor.line);
      const match = this.marks.markAt(content, this.cursor.column);
      if (match) {
        this.marks.beginSelection(this.cursor.line, content, match.start, match.end, match.mark.pattern);
      } else {
        this.marks.beginSelection(this.cursor.line, content, this.cursor.column, this.cursor.column + 1);
      }
      return true;
    });
  }

  /**
   * Grow (positive delta) or shrink (negative delta) the pending selection at one edge
   */
  async extendSelection(edge: SelectionEdge, delta: number): Promise<boolean> {
    if (!this.marks.pendingSelection) {
      const begun = await this.beginSelection();
      if (!begun) return false;
    }

    return this._command('extendSelection', async () => {
      for (let i = 0; i < Math.abs(delta); i++) {
        if (delta > 0) this.marks.extendSelection(edge);
        else this.marks.shrinkSelection(edge);
      }
      return delta !== 0;
    });
  }

  async commitSelection(): Promise<boolean> {
    return this._command('commitSelection', async () => {
      const { result, replaced } = this.marks.commitSelection();
      if (!result) return false;
      if (replaced) {
        this.undoStack.push({ kind: 'markReplace', removed: replaced, added: result.mark });
        await this._settleCursor();
        return true;
      }
      return this._recordToggle(result);
    });
  }

  cancelSelection(): void {
    this.marks.cancelSelection();
  }

  getPendingSelection(): PendingSelection | null {
    return this.marks.pendingSelection;
  }

  /**
   * Move the mark under the cursor to the next (1) or previous (-1) colour
   */
  async cycleColor(direction: 1 | -1 = 1): Promise<boolean> {
    return this._command('cycleColor', async () => {
      const document = this._requireDocument();
      const content = await document.cache.getLine(this.cursor.line);
      const match = this.marks.markAt(content, this.cursor.column);
      if (!match) {
        throw new LogrokError(ErrorCategory.InvalidArgument, 'no mark under cursor');
      }
      this.marks.cycleColor(match.mark.pattern, direction);
      return true;
    });
  }

  getMarks(): MarkSnapshot[] {
    return this.marks.getMarks();
  }

  // =================== TAG / HIDE ===================

  /**
   * Tag a line. With manual=false the mark under the cursor becomes a tag mark
   * (or back to a plain mark); when there is none, the line itself is toggled.
   */
  async tagLine(line: number, manual: boolean): Promise<boolean> {
    return this._command('tagLine', () => this._applyRole(line, manual, MarkRole.TAG));
  }

  /**
   * Hide a line; same rules as tagLine
   */
  async hideLine(line: number, manual: boolean): Promise<boolean> {
    return this._command('hideLine', () => this._applyRole(line, manual, MarkRole.HIDE));
  }

  private async _applyRole(line: number, manual: boolean, role: MarkRole.TAG | MarkRole.HIDE): Promise<boolean> {
    const document = this._requireDocument();
    document.index.lineAt(line);

    if (!manual) {
      const content = await document.cache.getLine(line);
      const match = this.marks.markAt(content, this.cursor.column);
      if (match) {
        const newRole = match.mark.role === role ? MarkRole.MARK : role;
        const oldRole = this.marks.setRole(match.mark.pattern, newRole);
        this.undoStack.push({ kind: 'markRoleChange', pattern: match.mark.pattern, oldRole, newRole });
        await this._settleCursor();
        return true;
      }

      const hit = this._searchHitAtCursor(document, content);
      if (hit && !this.marks.hasMark(hit)) {
        const result = this.marks.toggleMark(hit, MatchType.TEXT);
        this.marks.setRole(result.mark.pattern, role);
        document.search.clear();
        return this._recordToggle({ kind: 'added', mark: { ...result.mark, role } });
      }
    }

    if (role === MarkRole.TAG) {
      document.lineState.toggleManualTag(line);
      this.undoStack.push({ kind: 'tagToggle', line });
    } else {
      document.lineState.toggleManualHide(line);
      this.undoStack.push({ kind: 'hideToggle', line });
    }
    await this._settleCursor();
    return true;
  }

  // =================== DISPLAY MODE ===================

  /**
   * Move to the next (1) or previous (-1) display mode
   */
  async setMode(delta: ModeDelta): Promise<boolean> {
    return this._command('setMode', async () => {
      const document = this._requireDocument();
      const position = MODE_ORDER.indexOf(this.mode) + delta;
      if (position < 0 || position >= MODE_ORDER.length) {
        return false;
      }
      const target = MODE_ORDER[position];

      if (!(await document.filter.hasVisible(target))) {
        throw new LogrokError(ErrorCategory.EmptyVisibleSet, `Mode ${DISPLAY_MODE_NAMES[target]} shows no lines`);
      }

      let next: Position;
      const remembered = this.modeAnchors.get(target);
      if (remembered && (await document.filter.isLineVisible(remembered.line, target))) {
        next = remembered;
      } else {
        const line = await document.filter.nearestVisible(this.cursor.line, target);
        if (line === null) {
          throw new LogrokError(ErrorCategory.EmptyVisibleSet, `Mode ${DISPLAY_MODE_NAMES[target]} shows no lines`);
        }
        next = line === this.cursor.line ? { ...this.cursor } : { line, column: 0 };
      }

      const previous = this.mode;
      this.modeAnchors.set(previous, { ...this.cursor });
      this.mode = target;
      this.cursor = { ...next };

      this._notify(
        NotificationType.MODE_CHANGED,
        'info',
        `Mode ${DISPLAY_MODE_NAMES[previous]} -> ${DISPLAY_MODE_NAMES[target]}`,
        { from: previous, to: target, line: next.line }
      );
      return true;
    });
  }

  getMode(): DisplayMode {
    return this.mode;
  }

  /**
   * Visible lines of the current mode from a line onwards
   */
  visibleLines(from: number = 0, direction: SearchDirection = SearchDirection.FORWARD): AsyncGenerator<number> {
    return this._requireDocument().filter.visibleLines(this.mode, from, direction);
  }

  // =================== SEARCH ===================

  /**
   * Search from the cursor. A running search is cancelled.
   */
  async search(pattern: string, isRegex: boolean, direction: SearchDirection = SearchDirection.FORWARD): Promise<boolean> {
    return this._command('search', async () => {
      const document = this._requireDocument();
      compileSearchPattern(pattern, isRegex);
      const from = { ...this.cursor };
      const match = await this._runSearch('search', options => document.search.search(pattern, isRegex, from, direction, options));
      return this._acceptMatch(match);
    });
  }

  async nextMatch(): Promise<boolean> {
    return this._command('nextMatch', async () => {
      const document = this._requireDocument();
      const from = { ...this.cursor };
      return this._acceptMatch(await this._runSearch('next', options => document.search.next(from, options)));
    });
  }

  async previousMatch(): Promise<boolean> {
    return this._command('previousMatch', async () => {
      const document = this._requireDocument();
      const from = { ...this.cursor };
      return this._acceptMatch(await this._runSearch('previous', options => document.search.previous(from, options)));
    });
  }

  /**
   * Toggle a literal mark for the current match's text and drop the search
   */
  async markFromSearch(): Promise<boolean> {
    return this._command('markFromSearch', async () => {
      const document = this._requireDocument();
      const match = document.search.currentMatch;
      if (!match) {
        throw new LogrokError(ErrorCategory.NoMatch, 'No current search match');
      }
      const result = this.marks.toggleMark(match.text, MatchType.TEXT);
      document.search.clear();
      return this._recordToggle(result);
    });
  }

  clearSearch(): void {
    this.searchTask?.cancel();
    this.document?.search.clear();
  }

  getSearchState(): Readonly<SearchState> | null {
    return this.document?.search.getState() ?? null;
  }

  private async _runSearch(name: string, run: (options: SearchOptions) => Promise<SearchMatch>): Promise<SearchMatch> {
    this.searchTask?.cancel();
    const task = new BackgroundTask<SearchMatch>(name, context => run({
      signal: context.signal,
      onProgress: fraction => context.reportProgress(fraction)
    }));
    this.searchTask = task;
    try {
      return await task.promise;
    } finally {
      if (this.searchTask === task) {
        this.searchTask = null;
      }
    }
  }

  private _acceptMatch(match: SearchMatch): boolean {
    this.cursor = { line: match.line, column: match.start };
    this.modeAnchors.clear();
    if (match.wrapped) {
      this.status = StatusMessage.SEARCH_WRAPPED;
      this._notify(NotificationType.SEARCH_WRAPPED, 'info', 'Search wrapped', { line: match.line, column: match.start });
    }
    return true;
  }

  private _searchHitAtCursor(document: LoadedDocument, content: string): string | null {
    const span = document.search.matchesInLine(content).find(candidate => spanCovers(candidate, this.cursor.column));
    return span ? content.slice(span.start, span.end) : null;
  }

  // =================== LAYOUT ===================

  async setIndentColumn(column: number): Promise<boolean> {
    return this._command('setIndentColumn', async () => {
      if (!Number.isInteger(column) || column < 0) {
        throw new LogrokError(ErrorCategory.InvalidArgument, `invalid indent column ${column}`);
      }
      if (column === this.indentColumn) return false;
      this.undoStack.push({ kind: 'indentChange', oldColumn: this.indentColumn, newColumn: column });
      this.indentColumn = column;
      return true;
    });
  }

  getIndentColumn(): number {
    return this.indentColumn;
  }

  /**
   * Switch an overlong line between collapsed and expanded
   */
  async toggleFold(line: number): Promise<boolean> {
    return this._command('toggleFold', async () => {
      const document = this._requireDocument();
      if (!(await this._foldMetrics(document, line))) return false;
      const oldState = document.lineState.getFold(line);

      let newState: FoldState | null;
      if (oldState?.kind === 'expanded') {
        newState = oldState.previousRowCount === null ? null : { kind: 'collapsed', rowCount: oldState.previousRowCount };
      } else {
        newState = { kind: 'expanded', scrollOffset: 0, previousRowCount: oldState ? oldState.rowCount : null };
      }

      this._recordFold(document, line, oldState, newState);
      return true;
    });
  }

  /**
   * Change the row budget of a collapsed line; minimum one row
   */
  async adjustFoldCount(line: number, delta: number): Promise<boolean> {
    return this._command('adjustFoldCount', async () => {
      const document = this._requireDocument();
      const oldState = document.lineState.getFold(line);
      if (oldState?.kind === 'expanded') return false;

      const metrics = await this._foldMetrics(document, line);
      if (!metrics) return false;
      const base = oldState ? oldState.rowCount : metrics.defaultRows;
      const rowCount = Math.max(1, Math.min(metrics.totalRows, base + delta));
      if (rowCount === base && oldState) return false;

      this._recordFold(document, line, oldState, { kind: 'collapsed', rowCount });
      return true;
    });
  }

  /**
   * Scroll an expanded line by whole rows
   */
  async scrollFold(line: number, delta: number): Promise<boolean> {
    return this._command('scrollFold', async () => {
      const document = this._requireDocument();
      const oldState = document.lineState.getFold(line);
      if (oldState?.kind !== 'expanded') return false;

      const metrics = await this._foldMetrics(document, line);
      if (!metrics) return false;
      const scrollOffset = Math.max(0, Math.min(metrics.totalRows - 1, oldState.scrollOffset + delta));
      if (scrollOffset === oldState.scrollOffset) return false;

      this._recordFold(document, line, oldState, { ...oldState, scrollOffset });
      return true;
    });
  }

  private _recordFold(document: LoadedDocument, line: number, oldState: FoldState | null, newState: FoldState | null): void {
    document.lineState.setFold(line, newState);
    this.undoStack.push({ kind: 'foldChange', line, oldState, newState });
  }

  /**
   * Default collapsed budget and total rows at the last rendered width.
   * Null before anything was rendered, or when the line fits on one row.
   */
  private async _foldMetrics(document: LoadedDocument, line: number): Promise<{ defaultRows: number; totalRows: number } | null> {
    const width = this.lastWidth;
    if (width === null || width < minimumWidth(this.indentColumn)) return null;

    const content = await document.cache.getLine(line);
    const totalRows = countRows(content.length, width, this.indentColumn);
    if (totalRows === 1) return null;

    const owners = resolveHighlights(this._highlightsFor(document, content), content.length);
    return {
      defaultRows: defaultRowCount(owners, { width, indentColumn: this.indentColumn, defaultFoldRows: this.config.defaultFoldRows }),
      totalRows
    };
  }

  // =================== UNDO ===================

  async undo(): Promise<boolean> {
    return this._command('undo', async () => {
      this.undoStack.undo(this.applier);
      await this._settleCursor();
      return true;
    });
  }

  canUndo(): boolean {
    return this.undoStack.canUndo();
  }

  peekUndo(): UndoEntry | null {
    return this.undoStack.peek();
  }

  // =================== QUERIES ===================

  /**
   * Display rows for a viewport starting at a line (or the next visible line after it)
   */
  async visibleRowsForViewport(topLine: number, height: number, width: number): Promise<DisplayRow[]> {
    const document = this.document;
    if (!document) return [];

    if (height < 1 || width < minimumWidth(this.indentColumn)) {
      this.status = StatusMessage.TERMINAL_TOO_SMALL;
      return [];
    }
    if (this.status === StatusMessage.TERMINAL_TOO_SMALL) {
      this.status = null;
    }
    this.lastWidth = width;

    const rows: DisplayRow[] = [];
    const start = Math.max(0, Math.min(document.index.lineCount - 1, topLine));
    let lastLine = start;

    for await (const line of document.filter.visibleLines(this.mode, start, SearchDirection.FORWARD)) {
      lastLine = line;
      const content = await document.cache.getLine(line);
      const flags = await document.lineState.getFlags(line);
      const lineLayout = layout({
        content,
        width,
        indentColumn: this.indentColumn,
        fold: document.lineState.getFold(line),
        highlights: this._highlightsFor(document, content),
        defaultFoldRows: this.config.defaultFoldRows
      });

      const tagGlyph = flags.manualTag ? 'T' : flags.markTag ? '*' : null;
      const hideGlyph = flags.manualHide ? 'H' : flags.markHide ? '-' : null;

      for (const row of lineLayout.rows) {
        rows.push({ ...row, line, tagGlyph, hideGlyph, glyph: hideGlyph ?? tagGlyph });
        if (rows.length >= height) break;
      }
      if (rows.length >= height) break;
    }

    if (lastLine + 1 < document.index.lineCount) {
      document.cache.prefetch(document.index.splitForLine(lastLine + 1));
    }
    return rows;
  }

  async getLine(line: number): Promise<string> {
    return this._requireDocument().cache.getLine(line);
  }

  async getLineStatus(line: number): Promise<LineStatus> {
    return this._requireDocument().lineState.getStatus(line);
  }

  getLineCount(): number {
    return this.document ? this.document.index.lineCount : 0;
  }

  statusMessage(): string | null {
    return this.status;
  }

  /**
   * Progress of the running index or search task, null when idle
   */
  progress(): number | null {
    if (this.indexTask && !this.indexTask.done) return this.indexTask.progress;
    if (this.searchTask && !this.searchTask.done) return this.searchTask.progress;
    return null;
  }

  getMemoryStats(): MemoryStats {
    const document = this._requireDocument();
    const lineStats = document.lineState.getStats();
    return {
      lineCount: document.index.lineCount,
      fileSize: document.index.fileSize,
      indexBytes: document.index.memoryBytes,
      cache: document.cache.getMemoryStats(),
      derivedSplits: lineStats.derivedSplits,
      manualTags: lineStats.manualTags,
      manualHides: lineStats.manualHides,
      folds: lineStats.folds,
      marks: this.marks.size,
      undoEntries: this.undoStack.size
    };
  }

  // =================== INTERNALS ===================

  private _highlightsFor(document: LoadedDocument, content: string): HighlightSpan[] {
    const highlights: HighlightSpan[] = this.marks.matchesInLine(content).map((match): HighlightSpan => ({
      start: match.start,
      end: match.end,
      kind: 'mark',
      slot: match.mark.slot,
      role: match.mark.role,
      order: match.mark.id
    }));
    for (const span of document.search.matchesInLine(content)) {
      highlights.push({ ...span, kind: 'search', slot: null, role: null, order: 0 });
    }
    return highlights;
  }

  private _recordToggle(result: ToggleResult): boolean {
    this.undoStack.push({ kind: 'markToggle', mark: result.mark, added: result.kind === 'added' });
    return true;
  }

  /**
   * Keep the cursor on a visible line after a mutation
   */
  private async _settleCursor(): Promise<void> {
    const document = this.document;
    if (!document || this.mode === DisplayMode.ALL) return;
    if (await document.filter.isLineVisible(this.cursor.line, this.mode)) return;

    const line = await document.filter.nearestVisible(this.cursor.line, this.mode);
    if (line !== null) {
      this.cursor = { line, column: 0 };
    }
  }

  private _requireDocument(): LoadedDocument {
    if (!this.document) {
      throw new LogrokError(ErrorCategory.InvalidArgument, 'no file loaded');
    }
    return this.document;
  }

  /**
   * Run a command; recoverable errors become a status message and `false`
   */
  private async _command(name: string, action: () => Promise<boolean>): Promise<boolean> {
    this.status = null;
    try {
      return await action();
    } catch (error) {
      return this._recover(name, error);
    }
  }

  private _recover(name: string, error: unknown): boolean {
    if (!(error instanceof LogrokError)) {
      throw error;
    }

    switch (error.category) {
      case ErrorCategory.Cancelled:
        log.debug(`${name} superseded`);
        return false;
      case ErrorCategory.IO:
        throw error;
      case ErrorCategory.InvalidPattern:
        this.status = StatusMessage.INVALID_PATTERN;
        break;
      case ErrorCategory.AmbiguousSelection:
        this.status = StatusMessage.AMBIGUOUS_SELECTION;
        break;
      case ErrorCategory.NoMatch:
        this.status = StatusMessage.NO_MATCHES;
        break;
      case ErrorCategory.EmptyStack:
        this.status = StatusMessage.NOTHING_TO_UNDO;
        break;
      case ErrorCategory.EmptyVisibleSet:
        this.status = StatusMessage.NOTHING_TO_DISPLAY;
        break;
      case ErrorCategory.InvalidArgument:
        this.status = error.message;
        break;
    }

    log.debug(`${name} failed: ${error.message}`);
    this._notify(NotificationType.COMMAND_FAILED, 'warning', error.message, { command: name, category: error.category });
    return false;
  }
}

export { LogSession };
