/**
 * @fileoverview Common types shared across the viewer core
 * @description Centralized type definitions to avoid duplication
 */

import { type MarkRole, type MatchType } from './session-types';

// =================== POSITIONS & SPANS ===================

export interface Position {
  line: number;
  column: number;
}

/**
 * Half-open character range [start, end) within one line
 */
export interface Span {
  start: number;
  end: number;
}

export interface LineSpan {
  /** Byte offset of the first character */
  offset: number;
  /** Byte length without the terminating newline */
  length: number;
}

export interface SplitRange {
  splitId: number;
  startLine: number;
  /** Exclusive */
  endLine: number;
  byteOffset: number;
  byteLength: number;
}

// =================== MARKS ===================

/**
 * Immutable view of a mark, also what the undo stack records
 */
export interface MarkSnapshot {
  /** Creation sequence number, also the highlight tie-breaker */
  id: number;
  pattern: string;
  matchType: MatchType;
  slot: number;
  role: MarkRole;
}

export interface MarkMatch extends Span {
  mark: MarkSnapshot;
}

export type ToggleResult =
  | { kind: 'added'; mark: MarkSnapshot }
  | { kind: 'removed'; mark: MarkSnapshot };

export interface PendingSelection {
  line: number;
  content: string;
  start: number;
  end: number;
  /** Pattern of the mark being reshaped, if the selection started on one */
  replaces: string | null;
}

// =================== LINE STATE ===================

export type FoldState =
  | { kind: 'collapsed'; rowCount: number }
  | { kind: 'expanded'; scrollOffset: number; previousRowCount: number | null };

export interface LineFlags {
  manualTag: boolean;
  manualHide: boolean;
  markTag: boolean;
  markHide: boolean;
  searchMatch: boolean;
}

export interface LineStatus extends LineFlags {
  fold: FoldState | null;
}

export type TagGlyph = 'T' | '*';
export type HideGlyph = 'H' | '-';

// =================== RENDERING ===================

export type HighlightKind = 'mark' | 'search';

export interface HighlightSpan extends Span {
  kind: HighlightKind;
  /** Palette slot, null for the search highlight */
  slot: number | null;
  role: MarkRole | null;
  /** Lower wins a tie between equally short spans */
  order: number;
}

export interface RowHighlight extends Span {
  kind: HighlightKind;
  slot: number | null;
  role: MarkRole | null;
}

export interface LayoutRow {
  rowIndex: number;
  /** Row text including continuation padding */
  text: string;
  /** Column in the line content of the first non-padding character */
  column: number;
  indent: number;
  /** Spans relative to `text` */
  highlights: RowHighlight[];
  /** Rows of the line not shown after this one, only set on the last row shown */
  hiddenRows: number;
}

export interface DisplayRow extends LayoutRow {
  line: number;
  tagGlyph: TagGlyph | null;
  hideGlyph: HideGlyph | null;
  /** Single-column glyph, hide column first */
  glyph: TagGlyph | HideGlyph | null;
}

// =================== SEARCH ===================

export interface SearchMatch extends Span {
  line: number;
  text: string;
  wrapped: boolean;
  /** Matches on the same line */
  lineMatchCount: number;
}

// =================== UNDO ===================

export type UndoEntry =
  | { kind: 'markToggle'; mark: MarkSnapshot; added: boolean }
  | { kind: 'markReplace'; removed: MarkSnapshot; added: MarkSnapshot }
  | { kind: 'markRoleChange'; pattern: string; oldRole: MarkRole; newRole: MarkRole }
  | { kind: 'tagToggle'; line: number }
  | { kind: 'hideToggle'; line: number }
  | { kind: 'indentChange'; oldColumn: number; newColumn: number }
  | { kind: 'foldChange'; line: number; oldState: FoldState | null; newState: FoldState | null };

// =================== NOTIFICATIONS ===================

export type NotificationSeverity = 'debug' | 'info' | 'warning' | 'error';

export interface SessionNotification {
  type: string;
  severity: NotificationSeverity;
  message: string;
  metadata: Record<string, unknown>;
  timestamp: Date;
}

// =================== MEMORY STATS ===================

export interface SplitMemoryStats {
  lines: number;
  bytes: number;
}

export interface CacheMemoryStats {
  residentSplits: number;
  totalSplits: number;
  residentBytes: number;
  cacheBytes: number;
  inflightLoads: number;
}

export interface MemoryStats {
  lineCount: number;
  fileSize: number;
  indexBytes: number;
  cache: CacheMemoryStats;
  derivedSplits: number;
  manualTags: number;
  manualHides: number;
  folds: number;
  marks: number;
  undoEntries: number;
}
