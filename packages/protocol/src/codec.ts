/**
 * Protobuf codec
 *
 * Loads proto/questwire.proto once with protobufjs and converts between wire bytes and the
 * typed plain objects described in messages.ts.
 */

import { fileURLToPath } from 'node:url';
import protobuf from 'protobufjs';
import type { IConversionOptions, Root, Type } from 'protobufjs';
import type { z } from 'zod';
import { MessageSchemas, type MessageName, type MessageOf } from './messages.js';

const PROTO_PATH = fileURLToPath(new URL('../proto/questwire.proto', import.meta.url));
const PROTO_PACKAGE = 'questwire.rpc';

/**
 * Conversion applied to every decoded message before validation
 */
const TO_OBJECT_OPTIONS: IConversionOptions = {
  longs: String,
  defaults: true,
  arrays: true,
};

/**
 * Raised when a message cannot be encoded, decoded or validated
 */
export class WireFormatError extends Error {
  constructor(
    message: string,
    public readonly messageName: MessageName,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'WireFormatError';
  }
}

/**
 * Encoder/decoder pair for one message type
 */
export interface MessageCodec<T> {
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array): T;
}

let root: Root | undefined;

function loadRoot(): Root {
  if (!root) {
    root = protobuf.loadSync(PROTO_PATH);
  }
  return root;
}

function lookup(name: MessageName): Type {
  return loadRoot().lookupType(`${PROTO_PACKAGE}.${name}`);
}

function validate<S extends z.ZodTypeAny>(
  schema: S,
  name: MessageName,
  value: unknown
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new WireFormatError(`${name} failed validation: ${parsed.error.message}`, name, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Serialize a message to its wire bytes
 *
 * @throws WireFormatError if the value fails validation or cannot be serialized
 */
export function encodeMessage<K extends MessageName>(name: K, value: MessageOf<K>): Uint8Array {
  // protobufjs truncates out-of-range longs silently
  validate(MessageSchemas[name], name, value);
  try {
    const type = lookup(name);
    const bytes = type.encode(type.fromObject(value)).finish();
    // plain Uint8Array view; the Node writer hands back a Buffer
    return new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new WireFormatError(`Cannot encode ${name}: ${reason}`, name, { cause: error });
  }
}

/**
 * Parse wire bytes into a validated message
 *
 * @throws WireFormatError if the bytes are malformed or the result fails validation
 */
export function decodeMessage<K extends MessageName>(name: K, bytes: Uint8Array): MessageOf<K> {
  let plain: Record<string, unknown>;
  try {
    const type = lookup(name);
    plain = type.toObject(type.decode(bytes), TO_OBJECT_OPTIONS);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new WireFormatError(`Cannot decode ${name}: ${reason}`, name, { cause: error });
  }
  return validate(MessageSchemas[name], name, plain);
}

/**
 * Bind encode/decode to one message type
 */
export function codecFor<K extends MessageName>(name: K): MessageCodec<MessageOf<K>> {
  return {
    encode: value => encodeMessage(name, value),
    decode: bytes => decodeMessage(name, bytes),
  };
}
