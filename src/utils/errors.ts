/**
 * Error taxonomy
 *
 * Run-fatal: AuthError (vault unlock), ConfigError (startup), StoreLockedError.
 * Wallet-scoped: NotFoundError, ActionFailure, TransientNetworkError.
 */

export type ErrorCode = 'AUTH' | 'NOT_FOUND' | 'ACTION_FAILED' | 'TRANSIENT' | 'CONFIG' | 'LOCKED';

export class FarmhandError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'FarmhandError';
  }
}

export class AuthError extends FarmhandError {
  constructor(message = 'Vault unlock failed: wrong password') {
    super(message, 'AUTH');
    this.name = 'AuthError';
  }
}

export class NotFoundError extends FarmhandError {
  constructor(
    public readonly entity: 'wallet' | 'credential',
    public readonly key: string | number
  ) {
    super(`${entity} not found: ${key}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ActionFailure extends FarmhandError {
  constructor(
    public readonly action: string,
    message: string,
    cause?: Error
  ) {
    super(`${action} | ${message}`, 'ACTION_FAILED', cause);
    this.name = 'ActionFailure';
  }
}

export class TransientNetworkError extends FarmhandError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly isTimeout: boolean = false,
    cause?: Error
  ) {
    super(message, 'TRANSIENT', cause);
    this.name = 'TransientNetworkError';
  }
}

export class ConfigError extends FarmhandError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return undefined;
  }
  const response = error.response;
  if (typeof response !== 'object' || response === null || !('status' in response)) {
    return undefined;
  }
  return typeof response.status === 'number' ? response.status : undefined;
}

/**
 * Decide whether a failure is worth retrying (rate limits, timeouts, resets, 5xx)
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof TransientNetworkError) return true;
  if (error instanceof FarmhandError) return false;

  const status = statusOf(error);
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }

  const message = error.message.toLowerCase();

  if (message.includes('429') || message.includes('rate limit') || message.includes('too many requests')) {
    return true;
  }

  if (
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('enotfound') ||
    message.includes('etimedout') ||
    message.includes('socket hang up') ||
    message.includes('fetch failed') ||
    message.includes('timeout')
  ) {
    return true;
  }

  if (message.includes('blockhash not found') || message.includes('block height exceeded')) {
    return true;
  }

  return message.includes('503') || message.includes('502') || message.includes('500');
}

/**
 * Map any thrown value onto the taxonomy
 */
export function classifyError(error: unknown): FarmhandError {
  if (error instanceof FarmhandError) return error;

  const err = toError(error);
  if (isRetryableError(err)) {
    return new TransientNetworkError(err.message, statusOf(error), err.message.toLowerCase().includes('timeout'), err);
  }
  return new FarmhandError(err.message, 'ACTION_FAILED', err);
}

/**
 * True for failures of the proxy itself rather than of the remote service
 */
export function isProxyError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('proxy') ||
    message.includes('tunneling socket') ||
    message.includes('econnrefused') ||
    message.includes('407')
  );
}
