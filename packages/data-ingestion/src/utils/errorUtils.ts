// Error handling utilities for the data-ingestion package

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    const { message } = error;
    return typeof message === 'string' ? message : String(message);
  }
  return 'Unknown error occurred';
}

export function getErrorStack(error: unknown): string | undefined {
  if (isError(error)) {
    return error.stack;
  }
  return undefined;
}

// Shortens store/transport messages before they are logged next to a record
export function truncateMessage(message: string, maxLength: number = 200): string {
  return message.length > maxLength ? `${message.slice(0, maxLength)}...` : message;
}
