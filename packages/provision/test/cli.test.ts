import chalk from 'chalk';
import { input, password } from '@inquirer/prompts';
import { InvalidArgumentError } from 'commander';
import {
  createProvisionProgram,
  formatProvisionSummary,
  parsePortOption,
  promptForCredentials,
  type ProvisionCliOptions
} from '../src/cli.js';

vi.mock('@inquirer/prompts', () => ({
  input: vi.fn(),
  password: vi.fn(),
}));

function parse(argv: string[], env: NodeJS.ProcessEnv = {}): ProvisionCliOptions {
  const program = createProvisionProgram(env).exitOverride();
  program.parse(argv, { from: 'user' });
  return program.opts<ProvisionCliOptions>();
}

describe('createProvisionProgram', () => {
  it('applies defaults', () => {
    expect(parse([])).toEqual({ profile: 'DEFAULT', port: 5001, appName: 'warehouse-oauth-demo' });
  });

  it('takes the profile from DATABRICKS_CONFIG_PROFILE', () => {
    expect(parse([], { DATABRICKS_CONFIG_PROFILE: 'ACCOUNT' }).profile).toBe('ACCOUNT');
  });

  it('parses every option', () => {
    expect(parse([
      '--profile', 'ACCOUNT',
      '--config-file', '/tmp/cfg',
      '--account-host', 'https://accounts.example.com',
      '--account-id', 'acc-1',
      '--port', '8080',
      '--app-name', 'demo',
    ])).toEqual({
      profile: 'ACCOUNT',
      configFile: '/tmp/cfg',
      accountHost: 'https://accounts.example.com',
      accountId: 'acc-1',
      port: 8080,
      appName: 'demo',
    });
  });
});

describe('parsePortOption', () => {
  it('accepts valid ports', () => {
    expect(parsePortOption('5001')).toBe(5001);
  });

  it.each(['abc', '0', '70000'])('rejects %s', (value) => {
    expect(() => parsePortOption(value)).toThrow(InvalidArgumentError);
  });
});

describe('promptForCredentials', () => {
  beforeEach(() => {
    vi.mocked(input).mockReset();
    vi.mocked(password).mockReset();
  });

  it('prompts for what the profile lacks', async () => {
    vi.mocked(input).mockResolvedValue('admin@example.com');
    vi.mocked(password).mockResolvedValue('test-password');

    const credentials = await promptForCredentials({ host: 'https://accounts.example.com', accountId: 'acc-1' });

    expect(credentials).toEqual({ username: 'admin@example.com', password: 'test-password' });
    expect(input).toHaveBeenCalledWith(expect.objectContaining({ message: 'Account username for https://accounts.example.com:' }));
    expect(password).toHaveBeenCalledWith(expect.objectContaining({ mask: '*' }));
  });

  it('uses stored credentials without prompting', async () => {
    const credentials = await promptForCredentials({
      host: 'https://accounts.example.com',
      accountId: 'acc-1',
      username: 'stored@example.com',
      password: 'test-password',
    });

    expect(credentials).toEqual({ username: 'stored@example.com', password: 'test-password' });
    expect(input).not.toHaveBeenCalled();
    expect(password).not.toHaveBeenCalled();
  });
});

describe('formatProvisionSummary', () => {
  const level = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  it('prints the client credentials and the command to start the demo', () => {
    const lines = formatProvisionSummary({
      integrationId: 'int-1',
      clientId: 'test-client',
      clientSecret: 'test-secret',
      redirectUrl: 'http://localhost:5001/callback',
      enrolled: true,
    }, 5001);

    expect(lines).toEqual([
      '✅ OAuth application registered',
      '   Account enrolled into OAuth',
      '   Integration ID: int-1',
      '   Client ID:      test-client',
      '   Client secret:  test-secret',
      '   Redirect URL:   http://localhost:5001/callback',
      '',
      'Next step:',
      '   npm start -- --host <workspace host> --warehouse-id <warehouse id> --client-id test-client --client-secret test-secret --port 5001',
      '   Keep the client secret private; it cannot be shown again.',
    ]);
  });
});
