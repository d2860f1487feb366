/**
 * Message schemas (Zod)
 *
 * Typed view of every message declared in proto/questwire.proto. Decoded messages are
 * converted to plain objects (64-bit integers as decimal strings, enums as numbers,
 * unset sub-messages as null) and validated against these schemas.
 */

import { z } from 'zod';

// ===== Scalars =====

const UINT64_MAX = (1n << 64n) - 1n;
const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;

const bytes = z
  .custom<Uint8Array>(value => value instanceof Uint8Array, 'Expected Uint8Array')
  .transform((value): Uint8Array => new Uint8Array(value));
const uint64 = z
  .string()
  .refine(
    value => /^\d+$/.test(value) && BigInt(value) <= UINT64_MAX,
    'Expected a decimal uint64'
  );
const int64 = z
  .string()
  .refine(
    value => /^-?\d+$/.test(value) && BigInt(value) >= INT64_MIN && BigInt(value) <= INT64_MAX,
    'Expected a decimal int64'
  );
const int32 = z.number().int();

// ===== Envelopes =====

export const AuthTicketSchema = z.object({
  start: bytes,
  expireTimestampMs: uint64,
  end: bytes,
});

export const RequestSchema = z.object({
  requestType: int32,
  requestMessage: bytes,
});

const PlatformRequestSchema = z.object({
  type: int32,
  requestMessage: bytes,
});

const AuthInfoSchema = z.object({
  provider: z.string(),
  token: z
    .object({
      contents: z.string(),
      unknown2: int32,
    })
    .nullable(),
});

export const RequestEnvelopeSchema = z.object({
  statusCode: int32,
  requestId: uint64,
  requests: z.array(RequestSchema),
  platformRequests: z.array(PlatformRequestSchema),
  latitude: z.number(),
  longitude: z.number(),
  accuracy: z.number(),
  authInfo: AuthInfoSchema.nullable(),
  authTicket: AuthTicketSchema.nullable(),
  msSinceLastLocationfix: int64,
});

const PlatformResponseSchema = z.object({
  type: int32,
  response: bytes,
});

export const ResponseEnvelopeSchema = z.object({
  statusCode: int32,
  requestId: uint64,
  apiUrl: z.string(),
  platformReturns: z.array(PlatformResponseSchema),
  authTicket: AuthTicketSchema.nullable(),
  returns: z.array(bytes),
  error: z.string(),
});

// ===== Signature =====

export const DeviceInfoSchema = z.object({
  deviceId: z.string(),
  androidBoardName: z.string(),
  androidBootloader: z.string(),
  deviceBrand: z.string(),
  deviceModel: z.string(),
  deviceModelIdentifier: z.string(),
  deviceModelBoot: z.string(),
  hardwareManufacturer: z.string(),
  hardwareModel: z.string(),
  firmwareBrand: z.string(),
  firmwareTags: z.string(),
  firmwareType: z.string(),
  firmwareFingerprint: z.string(),
});

const ActivityStatusSchema = z.object({
  startTimeMs: uint64,
  unknownStatus: z.boolean(),
  walking: z.boolean(),
  running: z.boolean(),
  stationary: z.boolean(),
  automotive: z.boolean(),
  tilting: z.boolean(),
  cycling: z.boolean(),
  status: bytes,
});

export const SignatureSchema = z.object({
  timestampSinceStart: uint64,
  deviceInfo: DeviceInfoSchema.nullable(),
  activityStatus: ActivityStatusSchema.nullable(),
  locationHash1: uint64,
  locationHash2: uint64,
  sessionHash: bytes,
  timestamp: uint64,
  requestHash: z.array(uint64),
  unknown25: int64,
});

export const SendEncryptedSignatureRequestSchema = z.object({
  encryptedSignature: bytes,
});

// ===== Request messages =====

export const DownloadSettingsMessageSchema = z.object({
  hash: z.string(),
});

export const GetInventoryMessageSchema = z.object({
  lastTimestampMs: int64,
  itemBeenSeen: int32,
});

export const GetMapObjectsMessageSchema = z.object({
  cellId: z.array(uint64),
  sinceTimestampMs: z.array(int64),
  latitude: z.number(),
  longitude: z.number(),
});

export const EncounterMessageSchema = z.object({
  encounterId: uint64,
  spawnPointId: z.string(),
  playerLatitude: z.number(),
  playerLongitude: z.number(),
});

export const CheckChallengeMessageSchema = z.object({
  debugRequest: z.string(),
});

export const VerifyChallengeMessageSchema = z.object({
  token: z.string(),
});

// ===== Response messages =====

const CurrencySchema = z.object({
  name: z.string(),
  amount: int32,
});

const PlayerDataSchema = z.object({
  creationTimestampMs: int64,
  username: z.string(),
  team: int32,
  maxCreatureStorage: int32,
  maxItemStorage: int32,
  currencies: z.array(CurrencySchema),
});

export const GetPlayerResponseSchema = z.object({
  success: z.boolean(),
  playerData: PlayerDataSchema.nullable(),
  banned: z.boolean(),
  warn: z.boolean(),
});

const CreatureDataSchema = z.object({
  id: uint64,
  creatureId: int32,
  cp: int32,
  stamina: int32,
  staminaMax: int32,
  heightM: z.number(),
  weightKg: z.number(),
  individualAttack: int32,
  individualDefense: int32,
  individualStamina: int32,
});

const ItemDataSchema = z.object({
  itemId: int32,
  count: int32,
  unseen: z.boolean(),
});

const PlayerStatsSchema = z.object({
  level: int32,
  experience: int64,
  prevLevelXp: int64,
  nextLevelXp: int64,
  kmWalked: z.number(),
});

const InventoryItemSchema = z.object({
  modifiedTimestampMs: int64,
  inventoryItemData: z
    .object({
      creatureData: CreatureDataSchema.nullable(),
      item: ItemDataSchema.nullable(),
      playerStats: PlayerStatsSchema.nullable(),
    })
    .nullable(),
});

export const GetInventoryResponseSchema = z.object({
  success: z.boolean(),
  inventoryDelta: z
    .object({
      originalTimestampMs: int64,
      newTimestampMs: int64,
      inventoryItems: z.array(InventoryItemSchema),
    })
    .nullable(),
});

const FortDataSchema = z.object({
  id: z.string(),
  lastModifiedTimestampMs: int64,
  latitude: z.number(),
  longitude: z.number(),
  enabled: z.boolean(),
  type: int32,
});

const SpawnPointSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
});

const WildCreatureSchema = z.object({
  encounterId: uint64,
  lastModifiedTimestampMs: int64,
  latitude: z.number(),
  longitude: z.number(),
  spawnPointId: z.string(),
  creatureData: CreatureDataSchema.nullable(),
  timeTillHiddenMs: int32,
});

const CatchableCreatureSchema = z.object({
  spawnPointId: z.string(),
  encounterId: uint64,
  creatureId: int32,
  expirationTimestampMs: int64,
  latitude: z.number(),
  longitude: z.number(),
});

const NearbyCreatureSchema = z.object({
  creatureId: int32,
  distanceInMeters: z.number(),
  encounterId: uint64,
});

const MapCellSchema = z.object({
  s2CellId: uint64,
  currentTimestampMs: int64,
  forts: z.array(FortDataSchema),
  spawnPoints: z.array(SpawnPointSchema),
  wildCreatures: z.array(WildCreatureSchema),
  deletedObjects: z.array(z.string()),
  isTruncatedList: z.boolean(),
  catchableCreatures: z.array(CatchableCreatureSchema),
  nearbyCreatures: z.array(NearbyCreatureSchema),
});

export const GetMapObjectsResponseSchema = z.object({
  mapCells: z.array(MapCellSchema),
  status: int32,
});

export const EncounterResponseSchema = z.object({
  wildCreature: WildCreatureSchema.nullable(),
  background: int32,
  status: int32,
  captureProbability: z
    .object({
      captureItemType: z.array(int32),
      captureProbability: z.array(z.number()),
    })
    .nullable(),
});

export const CheckChallengeResponseSchema = z.object({
  showChallenge: z.boolean(),
  challengeUrl: z.string(),
});

export const VerifyChallengeResponseSchema = z.object({
  success: z.boolean(),
});

// ===== Registry =====

/**
 * Top-level messages addressable by the codec, keyed by their name in the proto package.
 */
export const MessageSchemas = {
  AuthTicket: AuthTicketSchema,
  Request: RequestSchema,
  RequestEnvelope: RequestEnvelopeSchema,
  ResponseEnvelope: ResponseEnvelopeSchema,
  Signature: SignatureSchema,
  SendEncryptedSignatureRequest: SendEncryptedSignatureRequestSchema,
  DownloadSettingsMessage: DownloadSettingsMessageSchema,
  GetInventoryMessage: GetInventoryMessageSchema,
  GetMapObjectsMessage: GetMapObjectsMessageSchema,
  EncounterMessage: EncounterMessageSchema,
  CheckChallengeMessage: CheckChallengeMessageSchema,
  VerifyChallengeMessage: VerifyChallengeMessageSchema,
  GetPlayerResponse: GetPlayerResponseSchema,
  GetInventoryResponse: GetInventoryResponseSchema,
  GetMapObjectsResponse: GetMapObjectsResponseSchema,
  EncounterResponse: EncounterResponseSchema,
  CheckChallengeResponse: CheckChallengeResponseSchema,
  VerifyChallengeResponse: VerifyChallengeResponseSchema,
} satisfies Record<string, z.ZodTypeAny>;

export type MessageName = keyof typeof MessageSchemas;
export type MessageOf<K extends MessageName> = z.output<(typeof MessageSchemas)[K]>;

// ===== Inferred types =====

export type AuthTicket = MessageOf<'AuthTicket'>;
export type Request = MessageOf<'Request'>;
export type RequestEnvelope = MessageOf<'RequestEnvelope'>;
export type PlatformRequest = RequestEnvelope['platformRequests'][number];
export type AuthInfo = NonNullable<RequestEnvelope['authInfo']>;
export type ResponseEnvelope = MessageOf<'ResponseEnvelope'>;
export type Signature = MessageOf<'Signature'>;
export type DeviceInfo = z.output<typeof DeviceInfoSchema>;
export type GetPlayerResponse = MessageOf<'GetPlayerResponse'>;
export type GetInventoryResponse = MessageOf<'GetInventoryResponse'>;
export type GetMapObjectsResponse = MessageOf<'GetMapObjectsResponse'>;
export type MapCell = GetMapObjectsResponse['mapCells'][number];
export type EncounterResponse = MessageOf<'EncounterResponse'>;
export type CheckChallengeResponse = MessageOf<'CheckChallengeResponse'>;
export type VerifyChallengeResponse = MessageOf<'VerifyChallengeResponse'>;
