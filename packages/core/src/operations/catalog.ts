/**
 * Operation catalog
 *
 * Each operation is declared once: its ordered sub-requests and the response slots that
 * carry its results. Sessions read results only through a slot, never by raw index.
 */

import {
  decodeMessage,
  RequestType,
  type MessageName,
  type MessageOf,
  type Request,
} from '@questwire/protocol';
import type { Location } from '../session/location.js';
import { serialize } from '../session/envelope.js';
import { ProtocolError } from '../utils/errors.js';

// ===== Response slots =====

/**
 * Typed accessor for one position of ResponseEnvelope.returns
 */
export interface ResponseSlot<K extends MessageName> {
  readonly index: number;
  readonly message: K;
  /**
   * @throws ProtocolError('response') if the position is missing or malformed
   */
  read(returns: readonly Uint8Array[]): MessageOf<K>;
}

export function responseSlot<K extends MessageName>(index: number, message: K): ResponseSlot<K> {
  return {
    index,
    message,
    read(returns) {
      const bytes = returns[index];
      if (bytes === undefined) {
        throw ProtocolError.response(
          `Expected ${message} at index ${index}, response has ${returns.length} returns`
        );
      }
      try {
        return decodeMessage(message, bytes);
      } catch (error) {
        throw ProtocolError.response(`Cannot decode ${message} at index ${index}`, error);
      }
    },
  };
}

// ===== Operations =====

/**
 * Values an operation may draw on besides its own parameters
 */
export interface RequestContext {
  location: Location;
  settingsHash: string;
  now: number;
}

export interface Operation<P, S extends Record<string, ResponseSlot<MessageName>>> {
  readonly name: string;
  requests(params: P, context: RequestContext): Request[];
  readonly slots: S;
}

export type NoParams = Record<string, never>;

export interface GetInventoryParams {
  /** Only items modified after this time; omitted means the full inventory */
  lastTimestampMs?: number;
}

export interface EncounterParams {
  /** Decimal uint64 */
  encounterId: string;
  spawnPointId: string;
  /** Defaults to the session location */
  playerLocation?: Pick<Location, 'latitude' | 'longitude'>;
}

export interface SolveChallengeParams {
  token: string;
}

function request(requestType: RequestType, message?: Uint8Array): Request {
  return { requestType, requestMessage: message ?? new Uint8Array() };
}

function downloadSettings(hash: string): Request {
  return request(RequestType.DOWNLOAD_SETTINGS, serialize('DownloadSettingsMessage', { hash }));
}

function defineOperation<P, S extends Record<string, ResponseSlot<MessageName>>>(
  operation: Operation<P, S>
): Operation<P, S> {
  return operation;
}

export const OperationCatalog = {
  bootstrap: defineOperation<NoParams, Record<string, never>>({
    name: 'bootstrap',
    requests: (_params: NoParams, { settingsHash }: RequestContext) => [
      request(RequestType.GET_PLAYER),
      request(RequestType.GET_HATCHED_EGGS),
      request(RequestType.GET_INVENTORY),
      request(RequestType.CHECK_AWARDED_BADGES),
      downloadSettings(settingsHash),
    ],
    slots: {},
  }),

  getPlayer: defineOperation({
    name: 'getPlayer',
    requests: (_params: NoParams) => [request(RequestType.GET_PLAYER)],
    slots: { player: responseSlot(0, 'GetPlayerResponse') },
  }),

  getInventory: defineOperation({
    name: 'getInventory',
    requests: ({ lastTimestampMs }: GetInventoryParams) => [
      lastTimestampMs === undefined
        ? request(RequestType.GET_INVENTORY)
        : request(
            RequestType.GET_INVENTORY,
            serialize('GetInventoryMessage', {
              lastTimestampMs: String(lastTimestampMs),
              itemBeenSeen: 0,
            })
          ),
    ],
    slots: { inventory: responseSlot(0, 'GetInventoryResponse') },
  }),

  encounter: defineOperation({
    name: 'encounter',
    requests: (params: EncounterParams, { location }: RequestContext) => {
      const player = params.playerLocation ?? location;
      return [
        request(
          RequestType.ENCOUNTER,
          serialize('EncounterMessage', {
            encounterId: params.encounterId,
            spawnPointId: params.spawnPointId,
            playerLatitude: player.latitude,
            playerLongitude: player.longitude,
          })
        ),
      ];
    },
    slots: { encounter: responseSlot(0, 'EncounterResponse') },
  }),

  announce: defineOperation({
    name: 'announce',
    requests: (_params: NoParams, { location, settingsHash, now }: RequestContext) => [
      request(RequestType.CHECK_CHALLENGE),
      request(RequestType.GET_HATCHED_EGGS),
      request(
        RequestType.GET_INVENTORY,
        serialize('GetInventoryMessage', { lastTimestampMs: String(now), itemBeenSeen: 0 })
      ),
      request(RequestType.CHECK_AWARDED_BADGES),
      downloadSettings(settingsHash),
      request(
        RequestType.GET_MAP_OBJECTS,
        serialize('GetMapObjectsMessage', {
          cellId: [...location.cellIds],
          sinceTimestampMs: location.cellIds.map(() => '0'),
          latitude: location.latitude,
          longitude: location.longitude,
        })
      ),
      request(RequestType.GET_PLAYER),
    ],
    slots: {
      challenge: responseSlot(0, 'CheckChallengeResponse'),
      mapObjects: responseSlot(5, 'GetMapObjectsResponse'),
    },
  }),

  checkChallenge: defineOperation({
    name: 'checkChallenge',
    requests: (_params: NoParams) => [request(RequestType.CHECK_CHALLENGE)],
    slots: { challenge: responseSlot(0, 'CheckChallengeResponse') },
  }),

  solveChallenge: defineOperation({
    name: 'solveChallenge',
    requests: ({ token }: SolveChallengeParams) => [
      request(RequestType.VERIFY_CHALLENGE, serialize('VerifyChallengeMessage', { token })),
    ],
    slots: { verification: responseSlot(0, 'VerifyChallengeResponse') },
  }),
};

export type OperationName = keyof typeof OperationCatalog;
