import { isAxiosError } from 'axios';
import { DependencyTimeoutError } from './timeout.js';

const RETRYABLE_STATUS_CODES = new Set([408, 429]);

/**
 * Transport-level failures are worth another attempt: timeouts, connection
 * errors with no response, 5xx and throttling responses. Anything else
 * (4xx, malformed payloads) will fail the same way again.
 */
export const isRetryableError = (error: unknown): boolean => {
  if (error instanceof DependencyTimeoutError) {
    return true;
  }

  if (isAxiosError(error)) {
    const status = error.response?.status;
    if (status === undefined) {
      return true;
    }

    return status >= 500 || RETRYABLE_STATUS_CODES.has(status);
  }

  return false;
};
