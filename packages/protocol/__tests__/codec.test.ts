/**
 * Codec tests
 *
 * Encoding fidelity of envelopes and sub-responses, 64-bit values, malformed input.
 */

import { describe, it, expect } from 'vitest';
import {
  codecFor,
  decodeMessage,
  encodeMessage,
  RequestType,
  WireFormatError,
  type GetMapObjectsResponse,
  type ResponseEnvelope,
} from '../src/index.js';

function createMapObjects(): GetMapObjectsResponse {
  return {
    mapCells: [
      {
        s2CellId: '9926595610352287744',
        currentTimestampMs: '1700000000000',
        forts: [
          {
            id: 'fort-1',
            lastModifiedTimestampMs: '1699999999000',
            latitude: 40.7589,
            longitude: -73.9851,
            enabled: true,
            type: 1,
          },
        ],
        spawnPoints: [{ latitude: 40.7591, longitude: -73.9849 }],
        wildCreatures: [
          {
            encounterId: '18446744073709551615',
            lastModifiedTimestampMs: '1699999998000',
            latitude: 40.759,
            longitude: -73.985,
            spawnPointId: '89c25855a6d',
            creatureData: {
              id: '42',
              creatureId: 16,
              cp: 120,
              stamina: 30,
              staminaMax: 30,
              heightM: 0.25,
              weightKg: 4.5,
              individualAttack: 10,
              individualDefense: 11,
              individualStamina: 12,
            },
            timeTillHiddenMs: 600000,
          },
        ],
        deletedObjects: ['old-object'],
        isTruncatedList: false,
        catchableCreatures: [],
        nearbyCreatures: [{ creatureId: 19, distanceInMeters: 12.5, encounterId: '7' }],
      },
    ],
    status: 1,
  };
}

describe('Codec', () => {
  it('should decode a sub-response at its declared index to the original value', () => {
    const mapObjects = createMapObjects();
    const challenge = { showChallenge: false, challengeUrl: '' };

    const envelope: ResponseEnvelope = {
      statusCode: 1,
      requestId: '8145806132888207460',
      apiUrl: 'pgorelease.example.test/plfe/112',
      platformReturns: [],
      authTicket: {
        start: new Uint8Array([1, 2, 3]),
        expireTimestampMs: '1700000900000',
        end: new Uint8Array([4, 5]),
      },
      returns: [
        encodeMessage('CheckChallengeResponse', challenge),
        encodeMessage('GetMapObjectsResponse', mapObjects),
      ],
      error: '',
    };

    const decoded = decodeMessage('ResponseEnvelope', encodeMessage('ResponseEnvelope', envelope));

    expect(decoded.returns).toHaveLength(2);
    expect(decodeMessage('GetMapObjectsResponse', decoded.returns[1] ?? new Uint8Array())).toEqual(
      mapObjects
    );
    expect(decodeMessage('CheckChallengeResponse', decoded.returns[0] ?? new Uint8Array())).toEqual(
      challenge
    );
    expect(decoded.authTicket).toEqual(envelope.authTicket);
    expect(decoded.requestId).toBe('8145806132888207460');
  });

  it('should fill unset fields with defaults', () => {
    const decoded = decodeMessage('ResponseEnvelope', new Uint8Array());

    expect(decoded).toEqual({
      statusCode: 0,
      requestId: '0',
      apiUrl: '',
      platformReturns: [],
      authTicket: null,
      returns: [],
      error: '',
    });
  });

  it('should keep the order of sub-requests', () => {
    const codec = codecFor('RequestEnvelope');
    const bytes = codec.encode({
      statusCode: 2,
      requestId: '1',
      requests: [
        { requestType: RequestType.GET_PLAYER, requestMessage: new Uint8Array() },
        {
          requestType: RequestType.VERIFY_CHALLENGE,
          requestMessage: encodeMessage('VerifyChallengeMessage', { token: 'test-token' }),
        },
      ],
      platformRequests: [],
      latitude: 1.5,
      longitude: 2.5,
      accuracy: 5,
      authInfo: { provider: 'ptc', token: { contents: 'test-access-token', unknown2: 59 } },
      authTicket: null,
      msSinceLastLocationfix: '989',
    });

    const decoded = codec.decode(bytes);

    expect(decoded.requests.map(request => request.requestType)).toEqual([
      RequestType.GET_PLAYER,
      RequestType.VERIFY_CHALLENGE,
    ]);
    expect(
      decodeMessage('VerifyChallengeMessage', decoded.requests[1]?.requestMessage ?? new Uint8Array())
    ).toEqual({ token: 'test-token' });
    expect(decoded.authInfo).toEqual({
      provider: 'ptc',
      token: { contents: 'test-access-token', unknown2: 59 },
    });
  });

  it('should raise WireFormatError on truncated bytes', () => {
    // field 2 (string) announces 5 bytes but carries 1
    const truncated = new Uint8Array([0x12, 0x05, 0x61]);

    expect(() => decodeMessage('CheckChallengeResponse', truncated)).toThrow(WireFormatError);
  });

  it('should name the message in WireFormatError', () => {
    let caught: unknown;
    try {
      decodeMessage('EncounterResponse', new Uint8Array([0x0a, 0x10]));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(WireFormatError);
    expect(caught instanceof WireFormatError ? caught.messageName : undefined).toBe(
      'EncounterResponse'
    );
  });

  it('should refuse to encode a uint64 beyond its range', () => {
    const oversized = {
      encounterId: '18446744073709551621',
      spawnPointId: '89c25855a6d',
      playerLatitude: 40.7589,
      playerLongitude: -73.9851,
    };

    expect(() => encodeMessage('EncounterMessage', oversized)).toThrow(WireFormatError);
    expect(() => encodeMessage('EncounterMessage', oversized)).toThrow(
      /EncounterMessage failed validation/
    );
  });

  it('should encode the largest uint64', () => {
    const bytes = encodeMessage('EncounterMessage', {
      encounterId: '18446744073709551615',
      spawnPointId: '89c25855a6d',
      playerLatitude: 40.7589,
      playerLongitude: -73.9851,
    });

    expect(decodeMessage('EncounterMessage', bytes).encounterId).toBe('18446744073709551615');
  });
});
