/**
 * @fileoverview Enumerations and configuration shared by the session and its engines
 */

/**
 * Display modes ordered from least to most restrictive
 */
export enum DisplayMode {
  /** Every line, hides ignored */
  ALL = 0,
  /** Everything that is not hidden */
  NORMAL = 1,
  /** Tagged lines (manual or mark-derived) and search hits */
  TAGGED = 2,
  /** Manually tagged lines and search hits */
  MANUAL = 3
}

export const DISPLAY_MODE_NAMES: Record<DisplayMode, string> = {
  [DisplayMode.ALL]: 'all',
  [DisplayMode.NORMAL]: 'normal',
  [DisplayMode.TAGGED]: 'tagged',
  [DisplayMode.MANUAL]: 'manual'
};

export enum SearchDirection {
  FORWARD = 'forward',
  BACKWARD = 'backward'
}

/**
 * How a mark pattern is matched against line content
 */
export enum MatchType {
  /** Occurrence bounded by line edges or punctuation/whitespace */
  WORD = 'word',
  /** Occurrence bounded by line edges or whitespace */
  BIGWORD = 'bigword',
  /** Plain substring */
  TEXT = 'text'
}

/**
 * What a mark contributes to beyond highlighting
 */
export enum MarkRole {
  MARK = 'mark',
  TAG = 'tag',
  HIDE = 'hide'
}

export enum NotificationType {
  FILE_LOADED = 'file_loaded',
  INDEX_PROGRESS = 'index_progress',
  SPLIT_EVICTED = 'split_evicted',
  MODE_CHANGED = 'mode_changed',
  SEARCH_WRAPPED = 'search_wrapped',
  TASK_CANCELLED = 'task_cancelled',
  COMMAND_FAILED = 'command_failed'
}

/**
 * Transient messages shown by the status line
 */
export const StatusMessage = {
  NO_MATCHES: 'no matches',
  SEARCH_WRAPPED: 'search wrapped',
  AMBIGUOUS_SELECTION: 'ambiguous selection',
  TERMINAL_TOO_SMALL: 'terminal too small',
  NOTHING_TO_DISPLAY: 'nothing to display',
  NOTHING_TO_UNDO: 'nothing to undo',
  INVALID_PATTERN: 'invalid pattern'
} as const;

export type StatusMessageText = typeof StatusMessage[keyof typeof StatusMessage];

export interface SessionConfig {
  /** Column continuation rows are padded to */
  indentColumn: number;
  /** Target size of one split, in bytes */
  splitBytes: number;
  /** Read size used while indexing */
  indexChunkBytes: number;
  /** Byte budget of resident splits */
  cacheBytes: number;
  /** Number of mark colours */
  paletteSize: number;
  /** Rows shown for a collapsed overlong line with nothing highlighted */
  defaultFoldRows: number;
  /** Lines scanned by a search between event loop yields */
  yieldEvery: number;
  /** Notifications kept for getNotifications(); debug ones are never kept */
  notificationLimit: number;
  debug: boolean;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  indentColumn: 8,
  splitBytes: 1024 * 1024,
  indexChunkBytes: 1024 * 1024,
  cacheBytes: 64 * 1024 * 1024,
  paletteSize: 8,
  defaultFoldRows: 1,
  yieldEvery: 4096,
  notificationLimit: 256,
  debug: false
};
