/**
 * Session state and location tests
 */

import { describe, it, expect } from 'vitest';
import { SessionState } from '../src/session/state.js';
import { createLocation } from '../src/session/location.js';
import { isProtocolError } from '../src/utils/errors.js';
import { createTestLocation, createTicket, T0 } from './helpers.js';

describe('createLocation', () => {
  it('should fill defaults and freeze the snapshot', () => {
    const location = createLocation({ latitude: 1.5, longitude: 2.5 });

    expect(location).toEqual({
      latitude: 1.5,
      longitude: 2.5,
      altitude: 0,
      accuracy: 0,
      cellIds: [],
    });
    expect(Object.isFrozen(location)).toBe(true);
    expect(Object.isFrozen(location.cellIds)).toBe(true);
  });

  it('should reject out-of-range coordinates', () => {
    let caught: unknown;
    try {
      createLocation({ latitude: 91, longitude: 0 });
    } catch (error) {
      caught = error;
    }

    expect(isProtocolError(caught, 'invalid_argument')).toBe(true);
  });
});

describe('SessionState', () => {
  it('should start unauthenticated with a zeroed session hash', () => {
    const state = new SessionState(createTestLocation(), T0);

    expect(state.hasTicket).toBe(false);
    expect(state.ticket).toBeUndefined();
    expect(state.apiUrl).toBe('');
    expect(state.sessionHash).toEqual(new Uint8Array(32));
    expect(state.isExpired(T0)).toBe(true);
  });

  it('should ignore ticket replacement until authenticated', () => {
    const state = new SessionState(createTestLocation(), T0);

    expect(state.replaceTicket(createTicket())).toBe(false);
    expect(state.hasTicket).toBe(false);
  });

  it('should commit every field on authenticate', () => {
    const state = new SessionState(createTestLocation(), T0);
    const sessionHash = new Uint8Array(32).fill(7);

    state.authenticate({
      ticket: createTicket(String(T0 + 1000)),
      baseUrl: 'https://rpc.example.test/rpc',
      sessionHash,
      startedAt: T0 + 5,
    });

    expect(state.hasTicket).toBe(true);
    expect(state.apiUrl).toBe('https://rpc.example.test/rpc');
    expect(state.sessionHash).toBe(sessionHash);
    expect(state.startedAt).toBe(T0 + 5);
    expect(state.isExpired(T0 + 999)).toBe(false);
    expect(state.isExpired(T0 + 1000)).toBe(true);

    expect(state.replaceTicket(createTicket('1'))).toBe(true);
    expect(state.ticket?.expireTimestampMs).toBe('1');
  });
});
