/**
 * Player location snapshot
 *
 * Immutable; movement replaces the whole snapshot.
 */

import { z } from 'zod';
import { ProtocolError } from '../utils/errors.js';

const LocationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  altitude: z.number().finite().default(0),
  accuracy: z.number().min(0).default(0),
  /** Cell identifiers covering the current area (decimal uint64) */
  cellIds: z.array(z.string().regex(/^\d+$/)).default([]),
});

export type LocationInput = z.input<typeof LocationSchema>;

export interface Location {
  readonly latitude: number;
  readonly longitude: number;
  readonly altitude: number;
  readonly accuracy: number;
  readonly cellIds: readonly string[];
}

/**
 * Validate and freeze a location snapshot
 *
 * @throws ProtocolError('invalid_argument') if a coordinate is out of range
 */
export function createLocation(input: LocationInput): Location {
  const parsed = LocationSchema.safeParse(input);
  if (!parsed.success) {
    throw ProtocolError.invalidArgument('Invalid location', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return Object.freeze({
    ...parsed.data,
    cellIds: Object.freeze([...parsed.data.cellIds]),
  });
}
