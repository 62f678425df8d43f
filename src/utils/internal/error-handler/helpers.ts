/**
 * @fileoverview Helper utilities for error inspection and normalization.
 * @module src/utils/internal/error-handler/helpers
 */

/**
 * Retrieves a descriptive name for an error object or value.
 */
export function getErrorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name || 'Error';
  }
  if (error === null) {
    return 'NullValueEncountered';
  }
  if (error === undefined) {
    return 'UndefinedValueEncountered';
  }
  return `${typeof error}Encountered`;
}

/**
 * Extracts a message string from an error object or value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Renders an error and its `cause` chain the way a stack trace is printed,
 * one "Caused by:" section per nested cause.
 */
export function formatErrorTrace(error: unknown): string {
  const sections: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    const rendered =
      current instanceof Error
        ? (current.stack ?? `${current.name}: ${current.message}`)
        : `${getErrorName(current)}: ${getErrorMessage(current)}`;
    sections.push(sections.length === 0 ? rendered : `Caused by: ${rendered}`);
    current = current instanceof Error ? current.cause : undefined;
  }

  return sections.join('\n');
}
