export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Renders any thrown value as a single string, including the stack trace when there is one.
 */
export function errorToString(error: unknown): string {
  if (error === undefined || error === null) {
    return '';
  }
  if (error instanceof Error) {
    if (isErrnoException(error)) {
      return `${error.name}: ${error.code} (${error.syscall ?? 'unknown'}) ${error.stack ?? error.message}`;
    }
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * The message of an error without its stack, as reported in test outcomes.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
