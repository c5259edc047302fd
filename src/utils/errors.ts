/**
 * @fileoverview Error taxonomy shared by every component
 */

enum ErrorCategory {
  IO = 'IO',
  InvalidPattern = 'INVALID_PATTERN',
  AmbiguousSelection = 'AMBIGUOUS_SELECTION',
  NoMatch = 'NO_MATCH',
  EmptyStack = 'EMPTY_STACK',
  EmptyVisibleSet = 'EMPTY_VISIBLE_SET',
  InvalidArgument = 'INVALID_ARGUMENT',
  Cancelled = 'CANCELLED'
}

class LogrokError extends Error {
  constructor(public category: ErrorCategory, message: string, public detail?: unknown) {
    super(message);
    this.name = `LogrokError/${category}`;
  }
}

function isLogrokError(err: unknown, category?: ErrorCategory): err is LogrokError {
  if (!(err instanceof LogrokError)) return false;
  return category === undefined || err.category === category;
}

/**
 * Throws a Cancelled error when the signal has fired.
 */
function throwIfAborted(signal: AbortSignal | undefined, what: string): void {
  if (signal?.aborted) {
    throw new LogrokError(ErrorCategory.Cancelled, `${what} cancelled`);
  }
}

export { ErrorCategory, LogrokError, isLogrokError, throwIfAborted };
