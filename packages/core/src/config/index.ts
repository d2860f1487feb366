/**
 * Client profile loader
 *
 * Reads a YAML profile and validates it against ClientProfileSchema.
 */

import fs from 'fs/promises';
import yaml from 'yaml';
import { ClientProfileSchema, type ClientProfile, type ClientProfileInput } from './schema.js';
import { logger } from '../utils/logger.js';
import { ProtocolError } from '../utils/errors.js';

export type { ClientProfile, ClientProfileInput, DeviceConfig } from './schema.js';
export { ClientProfileSchema, DEFAULT_API_URL, DEFAULT_SETTINGS_HASH } from './schema.js';

const MAX_PROFILE_SIZE = 1024 * 1024;

function parseProfile(value: unknown): ClientProfile {
  const parsed = ClientProfileSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw ProtocolError.configuration(`Invalid client profile: ${issues}`, parsed.error);
  }
  return parsed.data;
}

/**
 * Build a profile in code, filling every omitted key with its default
 *
 * @throws ProtocolError('configuration') if a value is invalid
 */
export function resolveClientProfile(input: ClientProfileInput = {}): ClientProfile {
  return parseProfile(input);
}

/**
 * Load a client profile from a YAML file
 *
 * @param profilePath Path to the profile (an empty file yields the defaults)
 * @throws ProtocolError('configuration') if the file is unreadable, too large or invalid
 */
export async function loadClientProfile(profilePath: string): Promise<ClientProfile> {
  logger.info(`[profile] Loading client profile from ${profilePath}`);

  try {
    const stats = await fs.stat(profilePath);
    if (stats.size > MAX_PROFILE_SIZE) {
      throw ProtocolError.configuration(`Profile ${profilePath} exceeds 1MB size limit`);
    }

    const fileContent = await fs.readFile(profilePath, 'utf-8');
    const rawProfile: unknown = yaml.parse(fileContent, {
      maxAliasCount: 50,
      schema: 'core',
      uniqueKeys: true,
    });

    const profile = parseProfile(rawProfile ?? {});
    logger.info('[profile] Client profile loaded successfully');
    return profile;
  } catch (error) {
    if (error instanceof ProtocolError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw ProtocolError.configuration(`Failed to load profile: ${reason}`, error);
  }
}
