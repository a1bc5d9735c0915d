import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ProfileError } from '../src/errors.js';
import { defaultConfigFile, parseAccountProfile, readAccountProfile } from '../src/profile.js';

const CONFIG = `
[DEFAULT]
host = https://workspace.example.com
token = test-token

[ACCOUNT]
host       = accounts.example.com/
account_id = acc-123
username   = admin@example.com

[FULL]
host       = https://accounts.example.com
account_id = acc-456
username   = admin@example.com
password   = test-password
`;

describe('parseAccountProfile', () => {
  it('reads an account profile and normalizes its host', () => {
    expect(parseAccountProfile(CONFIG, 'ACCOUNT')).toEqual({
      host: 'https://accounts.example.com',
      accountId: 'acc-123',
      username: 'admin@example.com',
      password: undefined,
    });
  });

  it('includes stored credentials', () => {
    expect(parseAccountProfile(CONFIG, 'FULL')).toMatchObject({ username: 'admin@example.com', password: 'test-password' });
  });

  it('rejects a workspace profile without an account id', () => {
    expect(() => parseAccountProfile(CONFIG, 'DEFAULT')).toThrow('Profile "DEFAULT" has no account_id');
  });

  it('rejects an unknown profile', () => {
    expect(() => parseAccountProfile(CONFIG, 'MISSING')).toThrow(ProfileError);
  });

  it('lets overrides fill in or replace profile values', () => {
    expect(parseAccountProfile(CONFIG, 'DEFAULT', { accountId: 'acc-999' })).toMatchObject({
      host: 'https://workspace.example.com',
      accountId: 'acc-999',
    });
    expect(parseAccountProfile(CONFIG, 'ACCOUNT', { accountHost: 'https://other.example.com' })).toMatchObject({
      host: 'https://other.example.com',
      accountId: 'acc-123',
    });
  });

  it('works from overrides alone', () => {
    expect(parseAccountProfile(undefined, 'DEFAULT', { accountHost: 'accounts.example.com', accountId: 'acc-1' })).toEqual({
      host: 'https://accounts.example.com',
      accountId: 'acc-1',
      username: undefined,
      password: undefined,
    });
  });
});

describe('readAccountProfile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'provision-profile-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the named profile from the configuration file', async () => {
    const configFile = join(dir, 'config.ini');
    await writeFile(configFile, CONFIG);

    await expect(readAccountProfile('ACCOUNT', { configFile })).resolves.toMatchObject({ accountId: 'acc-123' });
  });

  it('reports a missing configuration file', async () => {
    const configFile = join(dir, 'missing.ini');

    await expect(readAccountProfile('DEFAULT', { configFile })).rejects.toThrow(`Configuration file ${configFile} not found`);
  });

  it('accepts a missing file when host and account id are given', async () => {
    const profile = await readAccountProfile('DEFAULT', {
      configFile: join(dir, 'missing.ini'),
      accountHost: 'https://accounts.example.com',
      accountId: 'acc-1',
    });

    expect(profile.accountId).toBe('acc-1');
  });
});

describe('defaultConfigFile', () => {
  it('honours DATABRICKS_CONFIG_FILE', () => {
    expect(defaultConfigFile({ DATABRICKS_CONFIG_FILE: '/tmp/custom.cfg' })).toBe('/tmp/custom.cfg');
  });

  it('defaults to the home directory', () => {
    expect(defaultConfigFile({})).toMatch(/\.databrickscfg$/);
  });
});
