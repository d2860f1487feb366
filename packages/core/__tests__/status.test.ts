/**
 * Status classification tests
 */

import { describe, it, expect } from 'vitest';
import { classifyStatus, statusError } from '../src/session/status.js';

describe('classifyStatus', () => {
  it.each([
    [1, 'success'],
    [2, 'success'],
    [53, 'recoverable'],
    [100, 'recoverable'],
    [102, 'recoverable'],
    [0, 'fatal'],
    [3, 'fatal'],
    [51, 'fatal'],
    [52, 'fatal'],
    [999, 'fatal'],
  ])('should classify status %i as %s', (code, expected) => {
    expect(classifyStatus(code)).toBe(expected);
  });
});

describe('statusError', () => {
  it('should return null on OK', () => {
    expect(statusError(1)).toBeNull();
  });

  it('should return null when the response only names a new API URL', () => {
    expect(statusError(2)).toBeNull();
  });

  it('should name the status and carry its severity', () => {
    const error = statusError(100);

    expect(error?.code).toBe('status');
    expect(error?.statusCode).toBe(100);
    expect(error?.severity).toBe('recoverable');
    expect(error?.message).toBe('Backend status SESSION_INVALIDATED (100)');
  });

  it('should fall back to a numeric name for unknown codes', () => {
    expect(statusError(999)?.message).toBe('Backend status STATUS_999 (999)');
  });
});
