/**
 * @fileoverview Core of an interactive viewer for huge log files
 * @description Line indexing with a bounded split cache, keyword marks that
 * tag or hide lines, layered display modes, wrap-around search and reflow of
 * overlong lines, driven through a single session controller.
 *
 * @example
 * import { LogSession, SearchDirection } from 'logrok-core';
 *
 * const session = new LogSession();
 * await session.loadFile('server.log');
 *
 * await session.toggleMark({ pattern: 'ERROR' });
 * await session.search('timeout \\d+ms', true, SearchDirection.FORWARD);
 * const rows = await session.visibleRowsForViewport(0, 50, 160);
 */

import { LogSession } from './log-session';
import { LineIndex } from './line-index';
import { SplitCache } from './split-cache';
import { MarkStore } from './mark-store';
import { LineStateTable } from './line-state-table';
import { DisplayFilter, isVisible } from './display-filter';
import { SearchEngine } from './search-engine';
import { layout, countRows, resolveHighlights } from './reflow-engine';
import { UndoStack } from './undo-system';
import { LineSource } from './storage/line-source';
import { FileLineSource } from './storage/file-line-source';
import { MemoryLineSource } from './storage/memory-line-source';
import { SplitInfo } from './utils/split-info';
import { BackgroundTask } from './utils/background-task';
import { ErrorCategory, LogrokError, isLogrokError } from './utils/errors';
import { logger } from './utils/logger';
import {
  DEFAULT_SESSION_CONFIG,
  DisplayMode,
  MarkRole,
  MatchType,
  NotificationType,
  SearchDirection,
  StatusMessage
} from './types/session-types';

export type { SessionConfig } from './types/session-types';
export type {
  DisplayRow,
  FoldState,
  HighlightSpan,
  LineStatus,
  MarkSnapshot,
  PendingSelection,
  Position,
  SearchMatch,
  SessionNotification,
  UndoEntry
} from './types/common';
export type { LoadOptions, MarkSelection, ModeDelta } from './log-session';

export {
  // Session
  LogSession,

  // Engines
  LineIndex,
  SplitCache,
  MarkStore,
  LineStateTable,
  DisplayFilter,
  SearchEngine,
  UndoStack,
  isVisible,
  layout,
  countRows,
  resolveHighlights,

  // Sources
  LineSource,
  FileLineSource,
  MemoryLineSource,

  // Utilities
  SplitInfo,
  BackgroundTask,
  LogrokError,
  isLogrokError,
  logger,

  // Enums and constants
  DisplayMode,
  MarkRole,
  MatchType,
  SearchDirection,
  NotificationType,
  StatusMessage,
  ErrorCategory,
  DEFAULT_SESSION_CONFIG
};

// Default export for convenience
export default {
  LogSession,
  LineIndex,
  SplitCache,
  MarkStore,
  LineStateTable,
  DisplayFilter,
  SearchEngine,
  UndoStack,
  FileLineSource,
  MemoryLineSource,
  LogrokError,
  DisplayMode,
  MarkRole,
  MatchType,
  SearchDirection,
  StatusMessage,
  ErrorCategory
};
