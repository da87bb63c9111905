import { ProviderError } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Map an SDK failure onto ProviderError. Both SDKs attach the HTTP status to
 * their APIError subclasses.
 */
export function toProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  const status = statusOf(error);
  const message = getErrorMessage(error);
  if (status === 401 || status === 403) {
    return new ProviderError(provider, 'auth_failed', false, message);
  }
  const retryable = status === undefined || status === 408 || status === 409 || status === 429 || status >= 500;
  return new ProviderError(provider, 'unavailable', retryable, message);
}
