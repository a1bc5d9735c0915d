/**
 * Account profile lookup in the CLI configuration file (~/.databrickscfg)
 *
 * The file is INI: one section per profile, e.g.
 *
 * ```ini
 * [DEFAULT]
 * host       = https://accounts.cloud.databricks.com
 * account_id = 00000000-0000-0000-0000-000000000000
 * ```
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse as parseIni } from 'ini';
import { z } from 'zod';
import { normalizeHost } from '@warehouse-oauth-demo/config';
import { ProfileError } from './errors.js';

export interface AccountProfile {
  host: string;
  accountId: string;
  username?: string;
  password?: string;
}

export interface ProfileOverrides {
  accountHost?: string;
  accountId?: string;
}

const ProfileSectionSchema = z.object({
  host: z.string().min(1).optional(),
  account_id: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
}).passthrough();

const ConfigFileSchema = z.record(z.unknown());

export function defaultConfigFile(env: NodeJS.ProcessEnv = process.env): string {
  return env.DATABRICKS_CONFIG_FILE ?? join(homedir(), '.databrickscfg');
}

/**
 * Resolve an account profile from INI text; overrides win over file values
 */
export function parseAccountProfile(
  content: string | undefined,
  profileName: string,
  overrides: ProfileOverrides = {}
): AccountProfile {
  const sections = ConfigFileSchema.parse(content === undefined ? {} : parseIni(content));
  const rawSection = sections[profileName];

  if (rawSection === undefined && !(overrides.accountHost && overrides.accountId)) {
    throw new ProfileError(`Profile "${profileName}" not found`, { profile: profileName });
  }

  const section = ProfileSectionSchema.safeParse(rawSection ?? {});
  if (!section.success) {
    throw new ProfileError(`Profile "${profileName}" is not a valid section`, { profile: profileName });
  }

  const host = overrides.accountHost ?? section.data.host;
  const accountId = overrides.accountId ?? section.data.account_id;

  if (!host) {
    throw new ProfileError(`Profile "${profileName}" has no host (or pass --account-host)`, { profile: profileName });
  }
  if (!accountId) {
    throw new ProfileError(
      `Profile "${profileName}" has no account_id; OAuth apps are registered with an account profile (or pass --account-id)`,
      { profile: profileName }
    );
  }

  return {
    host: normalizeHost(host),
    accountId,
    username: section.data.username,
    password: section.data.password,
  };
}

/**
 * Read an account profile from the configuration file.
 * A missing file is only acceptable when both overrides are given.
 */
export async function readAccountProfile(
  profileName: string,
  options: ProfileOverrides & { configFile?: string } = {}
): Promise<AccountProfile> {
  const configFile = options.configFile ?? defaultConfigFile();

  let content: string | undefined;
  try {
    content = await readFile(configFile, 'utf-8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
      throw error;
    }
    if (!(options.accountHost && options.accountId)) {
      throw new ProfileError(`Configuration file ${configFile} not found`, { configFile });
    }
  }

  return parseAccountProfile(content, profileName, options);
}
