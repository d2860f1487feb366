/**
 * Service Provider Interface (SPI) definitions
 *
 * Collaborators the session depends on but does not implement: the transport that carries
 * one envelope exchange, the credential provider that logs the player in, the signer that
 * owns the hash and encryption primitives, and the sink that observes decoded payloads.
 */

import type {
  CheckChallengeResponse,
  EncounterResponse,
  GetInventoryResponse,
  GetMapObjectsResponse,
  GetPlayerResponse,
  RequestEnvelope,
  ResponseEnvelope,
  VerifyChallengeResponse,
} from '@questwire/protocol';

// ===== Transport =====

/**
 * Per-exchange options
 */
export interface ExchangeOptions {
  /** Proxy selector; negative means a direct connection */
  proxyId: number;
  /** Aborts the in-flight exchange */
  signal?: AbortSignal;
}

/**
 * Transport Interface
 *
 * Implementations: HttpTransport (@questwire/transport-http)
 *
 * Must reject with ProtocolError('proxy_dead') when the selected proxy is unreachable,
 * distinct from ProtocolError('request') for any other network failure.
 */
export interface Transport {
  /** Unique transport identifier (e.g., "http") */
  readonly id: string;

  /** Execute one envelope exchange against the given endpoint */
  exchange(
    baseUrl: string,
    envelope: RequestEnvelope,
    options: ExchangeOptions
  ): Promise<ResponseEnvelope>;
}

// ===== Credential provider =====

/**
 * Credential Provider Interface
 *
 * Produces the access token sent as auth-info until the backend issues a ticket.
 */
export interface CredentialProvider {
  /** Provider identifier sent on the wire (e.g., "ptc", "google") */
  readonly providerId: string;

  /** Perform the login flow and return the access token */
  login(signal?: AbortSignal): Promise<string>;

  /** Token obtained by the last successful login */
  accessToken(): string;
}

// ===== Signer =====

/**
 * Signer Interface
 *
 * Hash and encryption primitives checked by the backend. Hashes are unsigned 64-bit.
 */
export interface Signer {
  /** Hash of one serialized sub-request, keyed by the serialized ticket */
  hashRequest(ticket: Uint8Array, request: Uint8Array): Promise<bigint>;

  /** Location hash keyed by the serialized ticket */
  hashLocation1(
    ticket: Uint8Array,
    latitude: number,
    longitude: number,
    altitude: number
  ): Promise<bigint>;

  /** Location hash without a ticket key */
  hashLocation2(latitude: number, longitude: number, altitude: number): Promise<bigint>;

  /** Encrypt a serialized signature; `timestampSinceStart` is truncated to 32 bits */
  encrypt(signature: Uint8Array, timestampSinceStart: number): Promise<Uint8Array>;

  /** Signed 64-bit salt stamped on every signature */
  fixedSalt(): bigint;
}

// ===== Result sink =====

/**
 * Decoded payload types by sink event kind
 */
export interface SinkPayloads {
  player: GetPlayerResponse;
  inventory: GetInventoryResponse;
  map_objects: GetMapObjectsResponse;
  encounter: EncounterResponse;
  challenge: CheckChallengeResponse;
  challenge_verification: VerifyChallengeResponse;
}

export type SinkEventKind = keyof SinkPayloads;

export type SinkEvent = {
  [K in SinkEventKind]: { kind: K; payload: SinkPayloads[K] };
}[SinkEventKind];

/**
 * Result Sink Interface
 *
 * Receives every decoded payload. Fire-and-forget: a throwing sink is logged and never
 * fails the operation that produced the payload.
 */
export interface ResultSink {
  push(event: SinkEvent): void;
}
