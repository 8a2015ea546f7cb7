function isErrorLike(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    typeof Reflect.get(error, 'message') === 'string'
  );
}

/** Errors from Node's own modules may come from another realm, so shape is checked instead of class. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return isErrorLike(error) ? error.message : String(error);
}

export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    typeof Reflect.get(error, 'code') === 'string'
  );
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}
