/**
 * Protocol errors
 *
 * Every failure surfaced by the client is a ProtocolError tagged by `code`; the
 * underlying failure travels as `cause`.
 */

export type ProtocolErrorCode =
  | 'formatting'
  | 'no_url'
  | 'proxy_dead'
  | 'request'
  | 'response'
  | 'cancelled'
  | 'status'
  | 'configuration'
  | 'invalid_argument';

/**
 * Severity of a backend-declared status failure
 */
export type StatusSeverity = 'recoverable' | 'fatal';

export interface ProtocolErrorOptions {
  cause?: unknown;
  /** Envelope status code (status errors only) */
  statusCode?: number;
  /** Severity of the status code (status errors only) */
  severity?: StatusSeverity;
  details?: Record<string, unknown>;
}

export class ProtocolError extends Error {
  readonly statusCode?: number;
  readonly severity?: StatusSeverity;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: ProtocolErrorCode,
    options: ProtocolErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'ProtocolError';
    this.statusCode = options.statusCode;
    this.severity = options.severity;
    this.details = options.details;
  }

  /** Local serialization or random-generation failure */
  static formatting(message: string, cause?: unknown): ProtocolError {
    return new ProtocolError(message, 'formatting', { cause });
  }

  /** Bootstrap succeeded but the backend returned no API URL */
  static noUrl(): ProtocolError {
    return new ProtocolError('Backend returned no API URL', 'no_url');
  }

  static proxyDead(proxyId: number, cause?: unknown): ProtocolError {
    return new ProtocolError(`Proxy ${proxyId} is unreachable`, 'proxy_dead', {
      cause,
      details: { proxy_id: proxyId },
    });
  }

  static request(message: string, cause?: unknown): ProtocolError {
    return new ProtocolError(message, 'request', { cause });
  }

  /** Sub-response missing or undecodable */
  static response(message: string, cause?: unknown): ProtocolError {
    return new ProtocolError(message, 'response', { cause });
  }

  static cancelled(cause?: unknown): ProtocolError {
    return new ProtocolError('Exchange cancelled', 'cancelled', { cause });
  }

  static status(statusCode: number, name: string, severity: StatusSeverity): ProtocolError {
    return new ProtocolError(`Backend status ${name} (${statusCode})`, 'status', {
      statusCode,
      severity,
    });
  }

  static configuration(message: string, cause?: unknown): ProtocolError {
    return new ProtocolError(message, 'configuration', { cause });
  }

  static invalidArgument(message: string, details?: Record<string, unknown>): ProtocolError {
    return new ProtocolError(message, 'invalid_argument', { details });
  }
}

/**
 * Narrow an unknown failure to a ProtocolError, optionally of one code
 */
export function isProtocolError(error: unknown, code?: ProtocolErrorCode): error is ProtocolError {
  return error instanceof ProtocolError && (code === undefined || error.code === code);
}
