// Server error types that clear up on their own
const TRANSIENT_TYPES = new Set([
  'TOO_MANY_PARTS',
  'TOO_MANY_SIMULTANEOUS_QUERIES',
  'MEMORY_LIMIT_EXCEEDED',
  'TIMEOUT_EXCEEDED',
  'SOCKET_TIMEOUT',
  'NETWORK_ERROR',
  'KEEPER_EXCEPTION',
  'TABLE_IS_READ_ONLY',
  'ALL_CONNECTION_TRIES_FAILED',
]);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'UND_ERR_SOCKET',
]);

/**
 * Whether a write may succeed when repeated unchanged. Server errors with
 * any other type (unknown column, type mismatch, parse errors) are final.
 */
export function isTransientWriteError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;

  if ('type' in err && typeof err.type === 'string' && err.type !== '') {
    return TRANSIENT_TYPES.has(err.type);
  }
  if ('code' in err && typeof err.code === 'string' && TRANSIENT_NETWORK_CODES.has(err.code)) {
    return true;
  }
  if (err instanceof Error && /timeout/i.test(err.message)) {
    return true;
  }
  if ('cause' in err && err.cause !== err) {
    return isTransientWriteError(err.cause);
  }
  return false;
}
