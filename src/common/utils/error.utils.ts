/**
 * Safely extracts an error message from an unknown error
 * @param error - The error to extract a message from
 * @returns A safe error message string
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }

  return 'An unknown error occurred';
}

/**
 * Safely extracts an error stack trace from an unknown error
 * @param error - The error to extract a stack from
 * @returns A safe error stack string or undefined
 */
export function getErrorStack(error: unknown): string | undefined {
  if (error instanceof Error) {
    return error.stack;
  }

  if (error && typeof error === 'object' && 'stack' in error) {
    return String(error.stack);
  }

  return undefined;
}

/**
 * Message of the innermost `cause`, e.g. "connect ECONNREFUSED 127.0.0.1:443"
 * for a fetch that failed with "fetch failed"
 */
export function getRootCauseMessage(error: unknown): string {
  const visited = new Set<unknown>();
  let current = error;

  // stops at a cycle, on the last error not yet seen
  while (
    current instanceof Error &&
    current.cause !== undefined &&
    !visited.has(current.cause)
  ) {
    visited.add(current);
    current = current.cause;
  }

  return getErrorMessage(current);
}

/**
 * Shortens a response body for log lines and error messages
 */
export function truncateForLog(text: string, maxLength = 200): string {
  const singleLine = text.replace(/\s+/g, ' ').trim();

  if (singleLine.length <= maxLength) {
    return singleLine;
  }

  return `${singleLine.slice(0, maxLength)}… (${text.length} chars)`;
}
