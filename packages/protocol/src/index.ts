/**
 * @questwire/protocol
 *
 * Wire contract between the client and the game RPC backend: the protobuf schema, the
 * enumerations it declares, typed message shapes and the codec.
 */

/**
 * Schema revision of proto/questwire.proto
 */
export const PROTOCOL_VERSION = '0.37.0';

export * from './constants.js';
export * from './messages.js';
export {
  encodeMessage,
  decodeMessage,
  codecFor,
  WireFormatError,
  type MessageCodec,
} from './codec.js';
