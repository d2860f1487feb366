/**
 * In-process stand-ins shared by the session tests
 */

import {
  decodeMessage,
  type AuthTicket,
  type RequestEnvelope,
  type ResponseEnvelope,
  type Signature,
} from '@questwire/protocol';
import type {
  CredentialProvider,
  ExchangeOptions,
  ResultSink,
  Signer,
  SinkEvent,
  Transport,
} from '../src/spi/index.js';
import { createLocation, type Location } from '../src/session/location.js';
import { ProtocolError } from '../src/utils/errors.js';

export const T0 = 1_700_000_000_000;
export const FAR_FUTURE_MS = '4102444800000';

type Script = (options: ExchangeOptions) => Promise<ResponseEnvelope>;

export interface RecordedExchange {
  baseUrl: string;
  envelope: RequestEnvelope;
  options: ExchangeOptions;
}

/**
 * Transport answering from a scripted queue
 */
export class FakeTransport implements Transport {
  readonly id = 'fake';
  readonly exchanges: RecordedExchange[] = [];
  private readonly scripts: Script[] = [];

  respond(...responses: ResponseEnvelope[]): this {
    for (const response of responses) {
      this.scripts.push(async () => response);
    }
    return this;
  }

  respondWith(script: Script): this {
    this.scripts.push(script);
    return this;
  }

  fail(error: unknown): this {
    this.scripts.push(async () => {
      throw error;
    });
    return this;
  }

  /** Never settles until the exchange signal aborts */
  hang(): this {
    this.scripts.push(
      options =>
        new Promise<ResponseEnvelope>((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => reject(new Error('socket closed')));
        })
    );
    return this;
  }

  async exchange(
    baseUrl: string,
    envelope: RequestEnvelope,
    options: ExchangeOptions
  ): Promise<ResponseEnvelope> {
    this.exchanges.push({ baseUrl, envelope, options });
    const script = this.scripts.shift();
    if (!script) {
      throw new Error('No scripted response left');
    }
    return script(options);
  }

  lastEnvelope(): RequestEnvelope {
    const last = this.exchanges[this.exchanges.length - 1];
    if (!last) {
      throw new Error('No exchange recorded');
    }
    return last.envelope;
  }
}

/**
 * Deterministic signer: request hashes count up from 1, encryption is the identity
 */
export class FakeSigner implements Signer {
  readonly ticketKeys: Uint8Array[] = [];
  readonly hashedRequests: Uint8Array[] = [];
  readonly encryptions: { signature: Uint8Array; timestampSinceStart: number }[] = [];
  failOnHash = false;
  private counter = 0n;

  constructor(private readonly salt: bigint = 0x5eedn) {}

  async hashRequest(ticket: Uint8Array, request: Uint8Array): Promise<bigint> {
    if (this.failOnHash) {
      throw new Error('hash backend unavailable');
    }
    this.ticketKeys.push(ticket);
    this.hashedRequests.push(request);
    this.counter += 1n;
    return this.counter;
  }

  async hashLocation1(ticket: Uint8Array): Promise<bigint> {
    this.ticketKeys.push(ticket);
    return 0xaan;
  }

  async hashLocation2(): Promise<bigint> {
    return 0xbbn;
  }

  async encrypt(signature: Uint8Array, timestampSinceStart: number): Promise<Uint8Array> {
    this.encryptions.push({ signature, timestampSinceStart });
    return signature;
  }

  fixedSalt(): bigint {
    return this.salt;
  }
}

export class FakeProvider implements CredentialProvider {
  readonly providerId = 'ptc';
  logins = 0;

  async login(): Promise<string> {
    this.logins++;
    return this.accessToken();
  }

  accessToken(): string {
    return 'test-access-token';
  }
}

export class CollectingSink implements ResultSink {
  readonly events: SinkEvent[] = [];

  push(event: SinkEvent): void {
    this.events.push(event);
  }
}

export class ManualClock {
  constructor(public now: number = T0) {}

  advance(ms: number): void {
    this.now += ms;
  }

  read = (): number => this.now;
}

export function createTicket(expireTimestampMs: string = FAR_FUTURE_MS): AuthTicket {
  return {
    start: new Uint8Array([0x01, 0x02, 0x03]),
    expireTimestampMs,
    end: new Uint8Array([0x0a, 0x0b]),
  };
}

export function createResponse(overrides: Partial<ResponseEnvelope> = {}): ResponseEnvelope {
  return {
    statusCode: 1,
    requestId: '1',
    apiUrl: '',
    platformReturns: [],
    authTicket: null,
    returns: [],
    error: '',
    ...overrides,
  };
}

export function createTestLocation(): Location {
  return createLocation({
    latitude: 40.7589,
    longitude: -73.9851,
    altitude: 10,
    accuracy: 5,
    cellIds: ['9926595610352287744', '9926595612499771392'],
  });
}

/**
 * Recover the signature from an envelope signed by FakeSigner
 */
export function extractSignature(envelope: RequestEnvelope): Signature {
  const platformRequest = envelope.platformRequests[0];
  if (!platformRequest) {
    throw new Error('Envelope is not signed');
  }
  const { encryptedSignature } = decodeMessage(
    'SendEncryptedSignatureRequest',
    platformRequest.requestMessage
  );
  return decodeMessage('Signature', encryptedSignature);
}

/**
 * Await a promise expected to reject with a ProtocolError
 */
export async function rejection(promise: Promise<unknown>): Promise<ProtocolError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ProtocolError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}
