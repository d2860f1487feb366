/**
 * Session state machine
 *
 * Owns every mutable field of a session. Transitions:
 *   unauthenticated --authenticate--> authenticated
 *   authenticated --replaceTicket--> authenticated
 * Expiry is a predicate only and never changes the state.
 */

import type { AuthTicket } from '@questwire/protocol';
import type { Location } from './location.js';

export const SESSION_HASH_LENGTH = 32;

export type AuthState =
  | { status: 'unauthenticated' }
  | { status: 'authenticated'; ticket: AuthTicket };

/**
 * Values committed together by a completed initialization
 */
export interface AuthenticatedCommit {
  ticket: AuthTicket;
  baseUrl: string;
  sessionHash: Uint8Array;
  startedAt: number;
}

export class SessionState {
  private currentLocation: Location;
  private url = '';
  private auth: AuthState = { status: 'unauthenticated' };
  private hash: Uint8Array = new Uint8Array(SESSION_HASH_LENGTH);
  private started: number;

  constructor(location: Location, startedAt: number) {
    this.currentLocation = location;
    this.started = startedAt;
  }

  get location(): Location {
    return this.currentLocation;
  }

  /** Cached API URL; empty until the backend assigns one */
  get apiUrl(): string {
    return this.url;
  }

  get ticket(): AuthTicket | undefined {
    return this.auth.status === 'authenticated' ? this.auth.ticket : undefined;
  }

  get hasTicket(): boolean {
    return this.auth.status === 'authenticated';
  }

  get sessionHash(): Uint8Array {
    return this.hash;
  }

  get startedAt(): number {
    return this.started;
  }

  isExpired(now: number): boolean {
    if (this.auth.status === 'unauthenticated') {
      return true;
    }
    return Number(this.auth.ticket.expireTimestampMs) <= now;
  }

  authenticate(commit: AuthenticatedCommit): void {
    this.auth = { status: 'authenticated', ticket: commit.ticket };
    this.url = commit.baseUrl;
    this.hash = commit.sessionHash;
    this.started = commit.startedAt;
  }

  /**
   * Swap in a ticket returned by the backend
   *
   * @returns false when unauthenticated (only initialization may authenticate)
   */
  replaceTicket(ticket: AuthTicket): boolean {
    if (this.auth.status === 'unauthenticated') {
      return false;
    }
    this.auth = { status: 'authenticated', ticket };
    return true;
  }

  redirect(baseUrl: string): void {
    this.url = baseUrl;
  }

  moveTo(location: Location): void {
    this.currentLocation = location;
  }
}
