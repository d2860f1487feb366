/**
 * Client profile schema (Zod)
 *
 * Process-wide constants of the protocol: endpoints, pinned hashes, envelope constants and
 * the device fingerprint. Defaults are the values the backend accepts from the reference
 * client; a profile file overrides any subset.
 */

import { z } from 'zod';

export const DEFAULT_API_URL = 'https://pgorelease.nianticlabs.com/plfe/rpc';
export const DEFAULT_SETTINGS_HASH = '05daf51635c82611d1aac95c0b051d3ec088a930';

// ===== Endpoints =====

const ApiConfigSchema = z.object({
  default_url: z.string().url().default(DEFAULT_API_URL),
  /** `{token}` is replaced by the API URL token returned by the backend */
  url_template: z
    .string()
    .refine(value => value.includes('{token}'), 'url_template must contain {token}')
    .default('https://{token}/rpc'),
});

// ===== Challenge =====

const ChallengeConfigSchema = z.object({
  /** Challenge URL text announcing that the API URL was rotated */
  rotation_marker: z.string().min(1).default('new RPC url'),
});

// ===== Envelope constants =====

const EnvelopeConfigSchema = z.object({
  /** 'random' draws a fresh uint64 per call; a decimal string pins it */
  request_id: z
    .union([z.literal('random'), z.string().regex(/^\d{1,20}$/)])
    .default('random'),
  status_code: z.number().int().default(2),
  ms_since_last_location_fix: z.number().int().min(0).default(989),
  auth_info_unknown2: z.number().int().default(59),
});

// ===== Device fingerprint =====

const DeviceConfigSchema = z.object({
  device_id: z.string().default(''),
  device_brand: z.string().default('Apple'),
  device_model: z.string().default('iPhone'),
  device_model_boot: z.string().default('Iphone7,2'),
  hardware_manufacturer: z.string().default('Apple'),
  hardware_model: z.string().default('N66AP'),
  firmware_brand: z.string().default('iPhone OS'),
  firmware_type: z.string().default('9.3.3'),
});

// ===== Root Schema =====

export const ClientProfileSchema = z.object({
  api: ApiConfigSchema.default({}),
  settings_hash: z.string().regex(/^[0-9a-f]{40}$/).default(DEFAULT_SETTINGS_HASH),
  challenge: ChallengeConfigSchema.default({}),
  envelope: EnvelopeConfigSchema.default({}),
  device: DeviceConfigSchema.default({}),
});

export type ClientProfile = z.infer<typeof ClientProfileSchema>;
export type ClientProfileInput = z.input<typeof ClientProfileSchema>;
export type DeviceConfig = ClientProfile['device'];
