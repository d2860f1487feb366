/**
 * @questwire/transport-http
 *
 * HTTP(S) Transport with per-call proxy selection.
 */

export * from './http-transport.js';
