/**
 * Envelope construction and signing
 *
 * Builds the RequestEnvelope for one call. Authenticated envelopes carry the ticket and a
 * single encrypted signature platform request; unauthenticated envelopes carry auth-info.
 */

import { randomBytes } from 'node:crypto';
import {
  encodeMessage,
  PlatformRequestType,
  type AuthInfo,
  type AuthTicket,
  type DeviceInfo,
  type MessageName,
  type MessageOf,
  type PlatformRequest,
  type Request,
  type RequestEnvelope,
  type Signature,
} from '@questwire/protocol';
import type { ClientProfile } from '../config/schema.js';
import type { CredentialProvider, Signer } from '../spi/index.js';
import { ProtocolError, isProtocolError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { SessionState } from './state.js';

export interface EnvelopeBuilderDeps {
  provider: CredentialProvider;
  signer: Signer;
  profile: ClientProfile;
}

/**
 * Serialize a message, reporting failures as formatting errors
 */
export function serialize<K extends MessageName>(name: K, value: MessageOf<K>): Uint8Array {
  try {
    return encodeMessage(name, value);
  } catch (error) {
    throw ProtocolError.formatting(`Cannot serialize ${name}`, error);
  }
}

function toUint64(value: bigint): string {
  return BigInt.asUintN(64, value).toString();
}

export class EnvelopeBuilder {
  private readonly deviceInfo: DeviceInfo;

  constructor(private readonly deps: EnvelopeBuilderDeps) {
    const device = deps.profile.device;
    this.deviceInfo = {
      deviceId: device.device_id,
      androidBoardName: '',
      androidBootloader: '',
      deviceBrand: device.device_brand,
      deviceModel: device.device_model,
      deviceModelIdentifier: '',
      deviceModelBoot: device.device_model_boot,
      hardwareManufacturer: device.hardware_manufacturer,
      hardwareModel: device.hardware_model,
      firmwareBrand: device.firmware_brand,
      firmwareTags: '',
      firmwareType: device.firmware_type,
      firmwareFingerprint: '',
    };
  }

  /**
   * Build the envelope for `requests` from the current session state
   *
   * @param forceAuthInfo - attach auth-info even when a ticket is held (bootstrap)
   * @throws ProtocolError('formatting') if any part cannot be serialized or signed
   */
  async build(
    requests: readonly Request[],
    state: SessionState,
    now: number,
    forceAuthInfo = false
  ): Promise<RequestEnvelope> {
    const { envelope: constants } = this.deps.profile;
    const location = state.location;
    const ticket = forceAuthInfo ? undefined : state.ticket;

    const envelope: RequestEnvelope = {
      statusCode: constants.status_code,
      requestId: this.nextRequestId(),
      requests: [...requests],
      platformRequests: [],
      latitude: location.latitude,
      longitude: location.longitude,
      accuracy: location.accuracy,
      authInfo: ticket ? null : this.authInfo(),
      authTicket: ticket ?? null,
      msSinceLastLocationfix: String(constants.ms_since_last_location_fix),
    };

    if (ticket) {
      envelope.platformRequests = [await this.sign(requests, ticket, state, now)];
    }

    logger.debug(
      {
        request_id: envelope.requestId,
        request_types: requests.map(request => request.requestType),
        signed: envelope.platformRequests.length > 0,
      },
      '[envelope] Built request envelope'
    );

    return envelope;
  }

  private nextRequestId(): string {
    const policy = this.deps.profile.envelope.request_id;
    if (policy !== 'random') {
      return policy;
    }
    try {
      return randomBytes(8).readBigUInt64BE().toString();
    } catch (error) {
      throw ProtocolError.formatting('Cannot generate request id', error);
    }
  }

  private authInfo(): AuthInfo {
    return {
      provider: this.deps.provider.providerId,
      token: {
        contents: this.deps.provider.accessToken(),
        unknown2: this.deps.profile.envelope.auth_info_unknown2,
      },
    };
  }

  private async sign(
    requests: readonly Request[],
    ticket: AuthTicket,
    state: SessionState,
    now: number
  ): Promise<PlatformRequest> {
    const { signer } = this.deps;
    const { latitude, longitude, altitude } = state.location;
    const ticketBytes = serialize('AuthTicket', ticket);
    const elapsed = Math.max(0, now - state.startedAt);

    try {
      const requestHash: string[] = [];
      for (const request of requests) {
        requestHash.push(toUint64(await signer.hashRequest(ticketBytes, serialize('Request', request))));
      }

      const signature: Signature = {
        timestampSinceStart: String(elapsed),
        deviceInfo: this.deviceInfo,
        activityStatus: {
          startTimeMs: '0',
          unknownStatus: false,
          walking: false,
          running: false,
          stationary: true,
          automotive: false,
          tilting: false,
          cycling: false,
          status: new Uint8Array(),
        },
        locationHash1: toUint64(
          await signer.hashLocation1(ticketBytes, latitude, longitude, altitude)
        ),
        locationHash2: toUint64(await signer.hashLocation2(latitude, longitude, altitude)),
        sessionHash: state.sessionHash,
        timestamp: String(now),
        requestHash,
        unknown25: BigInt.asIntN(64, signer.fixedSalt()).toString(),
      };

      const encrypted = await signer.encrypt(serialize('Signature', signature), elapsed >>> 0);

      logger.debug(
        { request_hashes: requestHash.length, timestamp_since_start: elapsed },
        '[envelope] Signed request envelope'
      );

      return {
        type: PlatformRequestType.SEND_ENCRYPTED_SIGNATURE,
        requestMessage: serialize('SendEncryptedSignatureRequest', {
          encryptedSignature: encrypted,
        }),
      };
    } catch (error) {
      if (isProtocolError(error)) {
        throw error;
      }
      throw ProtocolError.formatting('Cannot sign request envelope', error);
    }
  }
}
