/**
 * Enumerations of the wire schema
 *
 * Mirrors the enums of proto/questwire.proto; decoded messages carry the numeric values.
 */

export const RequestType = {
  METHOD_UNSET: 0,
  GET_PLAYER: 2,
  GET_INVENTORY: 4,
  DOWNLOAD_SETTINGS: 5,
  ENCOUNTER: 102,
  GET_MAP_OBJECTS: 106,
  GET_HATCHED_EGGS: 126,
  CHECK_AWARDED_BADGES: 129,
  CHECK_CHALLENGE: 600,
  VERIFY_CHALLENGE: 601,
} as const;

export type RequestType = (typeof RequestType)[keyof typeof RequestType];

export const PlatformRequestType = {
  METHOD_UNSET: 0,
  SEND_ENCRYPTED_SIGNATURE: 6,
} as const;

export type PlatformRequestType = (typeof PlatformRequestType)[keyof typeof PlatformRequestType];

/**
 * Status codes carried by ResponseEnvelope.status_code
 */
export const StatusCode = {
  UNKNOWN: 0,
  OK: 1,
  OK_RPC_URL_IN_RESPONSE: 2,
  BAD_REQUEST: 3,
  INVALID_REQUEST: 51,
  INVALID_PLATFORM_REQUEST: 52,
  REDIRECT: 53,
  SESSION_INVALIDATED: 100,
  INVALID_AUTH_TOKEN: 102,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

export const MapObjectsStatus = {
  UNSET: 0,
  SUCCESS: 1,
  LOCATION_UNSET: 2,
} as const;

export const EncounterStatus = {
  ENCOUNTER_ERROR: 0,
  ENCOUNTER_SUCCESS: 1,
  ENCOUNTER_NOT_FOUND: 2,
  ENCOUNTER_CLOSED: 3,
  ENCOUNTER_CREATURE_FLED: 4,
  ENCOUNTER_NOT_IN_RANGE: 5,
  ENCOUNTER_ALREADY_HAPPENED: 6,
  CREATURE_INVENTORY_FULL: 7,
} as const;

/**
 * Reverse lookup of a status code name (for logs and error messages)
 */
export function statusCodeName(code: number): string {
  for (const [name, value] of Object.entries(StatusCode)) {
    if (value === code) {
      return name;
    }
  }
  return `STATUS_${code}`;
}
