/**
 * Status code classification
 *
 * Pure mapping from ResponseEnvelope.status_code to an outcome, independent of the
 * operation that produced the envelope.
 */

import { StatusCode, statusCodeName } from '@questwire/protocol';
import { ProtocolError } from '../utils/errors.js';

export type StatusClass = 'success' | 'recoverable' | 'fatal';

const SUCCESS_CODES: ReadonlySet<number> = new Set([
  StatusCode.OK,
  StatusCode.OK_RPC_URL_IN_RESPONSE,
]);

const RECOVERABLE_CODES: ReadonlySet<number> = new Set([
  StatusCode.REDIRECT,
  StatusCode.SESSION_INVALIDATED,
  StatusCode.INVALID_AUTH_TOKEN,
]);

export function classifyStatus(statusCode: number): StatusClass {
  if (SUCCESS_CODES.has(statusCode)) {
    return 'success';
  }
  return RECOVERABLE_CODES.has(statusCode) ? 'recoverable' : 'fatal';
}

/**
 * Status error for an envelope status code, or null on success
 */
export function statusError(statusCode: number): ProtocolError | null {
  const outcome = classifyStatus(statusCode);
  if (outcome === 'success') {
    return null;
  }
  return ProtocolError.status(statusCode, statusCodeName(statusCode), outcome);
}
