import axios from "axios";

const MAX_BODY_LEN = 200;

/** Raised when the food database answers with something we cannot read. */
export class FoodDatabaseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FoodDatabaseError';
  }
}

function truncate(text: string): string {
  return text.length > MAX_BODY_LEN ? `${text.substring(0, MAX_BODY_LEN)}...` : text;
}

/**
 * One-line description of an error for logs and tool results.
 * Axios errors get the HTTP status and a truncated body, or the network code.
 */
export function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      let message = `HTTP ${error.response.status} (${error.response.statusText || 'no status text'})`;
      const body: unknown = error.response.data;
      if (typeof body === 'string' && body.trim()) {
        message += `: ${truncate(body)}`;
      } else if (body != null && typeof body === 'object') {
        try {
          message += `: ${truncate(JSON.stringify(body))}`;
        } catch {
          message += ': [unserializable body]';
        }
      }
      return message;
    }
    if (error.code === 'ERR_CANCELED') return 'Request aborted';
    if (error.request) {
      return `Network error: no response received${error.code ? ` (${error.code})` : ''}`;
    }
    return `Request setup error: ${error.message}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
