/**
 * Session
 *
 * One player identity talking to the backend: initialization, signed calls and the
 * operation catalog. Not safe for concurrent use; run one Session per concurrent stream.
 */

import { randomBytes } from 'node:crypto';
import {
  statusCodeName,
  type AuthTicket,
  type CheckChallengeResponse,
  type EncounterResponse,
  type GetInventoryResponse,
  type GetMapObjectsResponse,
  type GetPlayerResponse,
  type Request,
  type ResponseEnvelope,
  type VerifyChallengeResponse,
} from '@questwire/protocol';
import { resolveClientProfile } from '../config/index.js';
import type { ClientProfile } from '../config/schema.js';
import {
  OperationCatalog,
  type EncounterParams,
  type GetInventoryParams,
  type RequestContext,
} from '../operations/catalog.js';
import type {
  CredentialProvider,
  ResultSink,
  Signer,
  SinkEvent,
  Transport,
} from '../spi/index.js';
import { ProtocolError, isProtocolError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { EnvelopeBuilder } from './envelope.js';
import type { Location } from './location.js';
import { SESSION_HASH_LENGTH, SessionState } from './state.js';
import { statusError } from './status.js';

export interface SessionOptions {
  provider: CredentialProvider;
  signer: Signer;
  transport: Transport;
  sink: ResultSink;
  location: Location;
  /** Defaults to resolveClientProfile() */
  profile?: ClientProfile;
  /** Milliseconds since the epoch (default: Date.now) */
  clock?: () => number;
}

export interface CallOptions {
  /** Proxy selector handed to the transport; negative means direct (default: -1) */
  proxyId?: number;
  signal?: AbortSignal;
}

/**
 * Decoded payload plus the classified envelope status; callers check both
 */
export interface OperationResult<T> {
  payload: T;
  statusError: ProtocolError | null;
}

export interface AnnounceResult extends OperationResult<GetMapObjectsResponse> {
  challenge: CheckChallengeResponse;
}

function ensureNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw ProtocolError.cancelled(signal.reason);
  }
}

export class Session {
  private readonly state: SessionState;
  private readonly envelopes: EnvelopeBuilder;
  private readonly profile: ClientProfile;
  private readonly clock: () => number;
  private readonly provider: CredentialProvider;
  private readonly transport: Transport;
  private readonly sink: ResultSink;

  constructor(options: SessionOptions) {
    this.profile = options.profile ?? resolveClientProfile();
    this.clock = options.clock ?? Date.now;
    this.provider = options.provider;
    this.transport = options.transport;
    this.sink = options.sink;
    this.state = new SessionState(options.location, this.clock());
    this.envelopes = new EnvelopeBuilder({
      provider: options.provider,
      signer: options.signer,
      profile: this.profile,
    });
  }

  // ===== State =====

  /** Endpoint of the next call */
  get baseUrl(): string {
    return this.state.apiUrl || this.profile.api.default_url;
  }

  get location(): Location {
    return this.state.location;
  }

  get hasTicket(): boolean {
    return this.state.hasTicket;
  }

  get ticket(): AuthTicket | undefined {
    return this.state.ticket;
  }

  /**
   * True when no ticket is held or it expired at or before `now`. Advisory only.
   */
  isExpired(now: number = this.clock()): boolean {
    return this.state.isExpired(now);
  }

  /**
   * Replace the location used by the next call. No network I/O.
   */
  moveTo(location: Location): void {
    this.state.moveTo(location);
  }

  // ===== Calls =====

  /**
   * Build, sign and dispatch one envelope
   *
   * A non-empty API URL in the response becomes the base URL, and a returned ticket
   * replaces the held one.
   *
   * @throws ProtocolError('formatting') before any I/O if the envelope cannot be built
   * @throws ProtocolError('cancelled') if `signal` aborts the exchange
   * @throws ProtocolError('proxy_dead' | 'request' | 'response') from the transport
   */
  async call(requests: readonly Request[], options: CallOptions = {}): Promise<ResponseEnvelope> {
    const response = await this.dispatch(requests, options, false);

    if (response.apiUrl) {
      this.state.redirect(this.redirectUrl(response.apiUrl));
    }
    if (response.authTicket && this.state.replaceTicket(response.authTicket)) {
      logger.debug('[session] Auth ticket replaced');
    }

    return response;
  }

  /**
   * Log in and bootstrap a fresh session
   *
   * Re-running discards the held ticket, session hash and start time. Nothing is committed
   * unless every step succeeds.
   *
   * @throws ProtocolError('no_url') if the bootstrap response names no API URL
   * @throws ProtocolError('response') if the bootstrap response carries no ticket
   */
  async initialize(options: CallOptions = {}): Promise<void> {
    ensureNotAborted(options.signal);
    await this.provider.login(options.signal);

    let sessionHash: Uint8Array;
    try {
      sessionHash = new Uint8Array(randomBytes(SESSION_HASH_LENGTH));
    } catch (error) {
      throw ProtocolError.formatting('Cannot generate session hash', error);
    }
    const startedAt = this.clock();

    const { bootstrap } = OperationCatalog;
    const response = await this.dispatch(
      bootstrap.requests({}, this.requestContext()),
      options,
      true
    );

    if (!response.apiUrl) {
      throw ProtocolError.noUrl();
    }
    if (!response.authTicket) {
      throw ProtocolError.response('Bootstrap response carries no auth ticket');
    }

    this.state.authenticate({
      ticket: response.authTicket,
      baseUrl: this.redirectUrl(response.apiUrl),
      sessionHash,
      startedAt,
    });

    logger.info(
      {
        provider: this.provider.providerId,
        base_url: this.baseUrl,
        status: statusCodeName(response.statusCode),
      },
      '[session] Initialized'
    );
  }

  // ===== Operations =====

  async getPlayer(options?: CallOptions): Promise<OperationResult<GetPlayerResponse>> {
    const { getPlayer } = OperationCatalog;
    const response = await this.call(getPlayer.requests({}, this.requestContext()), options);

    const payload = getPlayer.slots.player.read(response.returns);
    this.emit({ kind: 'player', payload });

    return { payload, statusError: statusError(response.statusCode) };
  }

  async getInventory(
    params: GetInventoryParams = {},
    options?: CallOptions
  ): Promise<OperationResult<GetInventoryResponse>> {
    const { getInventory } = OperationCatalog;
    const response = await this.call(getInventory.requests(params, this.requestContext()), options);

    const payload = getInventory.slots.inventory.read(response.returns);
    this.emit({ kind: 'inventory', payload });

    return { payload, statusError: statusError(response.statusCode) };
  }

  async encounter(
    params: EncounterParams,
    options?: CallOptions
  ): Promise<OperationResult<EncounterResponse>> {
    const { encounter } = OperationCatalog;
    const response = await this.call(encounter.requests(params, this.requestContext()), options);

    const payload = encounter.slots.encounter.read(response.returns);
    this.emit({ kind: 'encounter', payload });

    return { payload, statusError: statusError(response.statusCode) };
  }

  /**
   * Publish presence and fetch the surrounding map objects
   *
   * A challenge shown by the backend is returned with `statusError: null`; the caller
   * decides how to react. An API URL in the response has already been adopted by call(),
   * whether or not the challenge URL carries the rotation marker.
   */
  async announce(options?: CallOptions): Promise<AnnounceResult> {
    const { announce } = OperationCatalog;
    const response = await this.call(announce.requests({}, this.requestContext()), options);

    const payload = announce.slots.mapObjects.read(response.returns);
    this.emit({ kind: 'map_objects', payload });

    const challenge = announce.slots.challenge.read(response.returns);
    this.emit({ kind: 'challenge', payload: challenge });

    if (challenge.showChallenge) {
      if (challenge.challengeUrl.includes(this.profile.challenge.rotation_marker)) {
        logger.info(
          { base_url: this.baseUrl },
          '[session] Challenge URL carries the rotation marker'
        );
      }
      logger.warn('[session] Backend requested a challenge');
      return { payload, challenge, statusError: null };
    }

    return { payload, challenge, statusError: statusError(response.statusCode) };
  }

  /** Same exchange as announce() */
  getPlayerMap(options?: CallOptions): Promise<AnnounceResult> {
    return this.announce(options);
  }

  async checkChallenge(options?: CallOptions): Promise<OperationResult<CheckChallengeResponse>> {
    const { checkChallenge } = OperationCatalog;
    const response = await this.call(checkChallenge.requests({}, this.requestContext()), options);

    const payload = checkChallenge.slots.challenge.read(response.returns);
    this.emit({ kind: 'challenge', payload });

    return { payload, statusError: statusError(response.statusCode) };
  }

  async solveChallenge(
    token: string,
    options?: CallOptions
  ): Promise<OperationResult<VerifyChallengeResponse>> {
    const { solveChallenge } = OperationCatalog;
    const response = await this.call(
      solveChallenge.requests({ token }, this.requestContext()),
      options
    );

    const payload = solveChallenge.slots.verification.read(response.returns);
    this.emit({ kind: 'challenge_verification', payload });

    return { payload, statusError: statusError(response.statusCode) };
  }

  // ===== Internals =====

  private async dispatch(
    requests: readonly Request[],
    { proxyId = -1, signal }: CallOptions,
    forceAuthInfo: boolean
  ): Promise<ResponseEnvelope> {
    ensureNotAborted(signal);
    const envelope = await this.envelopes.build(requests, this.state, this.clock(), forceAuthInfo);
    ensureNotAborted(signal);

    const baseUrl = this.baseUrl;
    logger.debug(
      { base_url: baseUrl, proxy_id: proxyId, requests: requests.length },
      '[session] Dispatching envelope'
    );

    let response: ResponseEnvelope;
    try {
      response = await this.transport.exchange(baseUrl, envelope, { proxyId, signal });
    } catch (error) {
      if (isProtocolError(error)) {
        throw error;
      }
      if (signal?.aborted) {
        throw ProtocolError.cancelled(error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw ProtocolError.request(`Transport ${this.transport.id} failed: ${reason}`, error);
    }
    // a response that lands after the abort is discarded, not absorbed
    ensureNotAborted(signal);

    logger.debug(
      {
        request_id: response.requestId,
        status: statusCodeName(response.statusCode),
        returns: response.returns.length,
      },
      '[session] Received response envelope'
    );

    return response;
  }

  private redirectUrl(apiUrl: string): string {
    return this.profile.api.url_template.replace('{token}', apiUrl);
  }

  private requestContext(): RequestContext {
    return {
      location: this.state.location,
      settingsHash: this.profile.settings_hash,
      now: this.clock(),
    };
  }

  private emit(event: SinkEvent): void {
    try {
      this.sink.push(event);
    } catch (err) {
      logger.warn({ err, kind: event.kind }, '[session] Result sink rejected event');
    }
  }
}
