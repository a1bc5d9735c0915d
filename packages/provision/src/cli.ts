/**
 * Command line for the provisioning tool
 */

import { Command, InvalidArgumentError } from 'commander';
import { input, password } from '@inquirer/prompts';
import chalk from 'chalk';
import type { AccountProfile } from './profile.js';
import type { ProvisionedApp } from './provision.js';

export interface ProvisionCliOptions {
  profile: string;
  configFile?: string;
  accountHost?: string;
  accountId?: string;
  port: number;
  appName: string;
}

export function parsePortOption(value: string): number {
  const port = Number.parseInt(value, 10);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be a number between 1 and 65535');
  }
  return port;
}

export function createProvisionProgram(env: NodeJS.ProcessEnv = process.env): Command {
  return new Command()
    .name('warehouse-oauth-provision')
    .description('Register the warehouse demo as an OAuth application on your account and print its client credentials')
    .option('--profile <name>', 'Account profile in the configuration file', env.DATABRICKS_CONFIG_PROFILE ?? 'DEFAULT')
    .option('--config-file <path>', 'Configuration file (default: ~/.databrickscfg)')
    .option('--account-host <url>', 'Account console host, overrides the profile')
    .option('--account-id <id>', 'Account id, overrides the profile')
    .option('--port <port>', 'Port the demo will listen on; sets the redirect URL', parsePortOption, 5001)
    .option('--app-name <name>', 'Name of the OAuth application', 'warehouse-oauth-demo');
}

function validateRequired(value: string): boolean | string {
  return value.trim() !== '' || 'A value is required';
}

/**
 * Account admin credentials from the profile, prompting for whatever it lacks
 */
export async function promptForCredentials(profile: AccountProfile): Promise<{ username: string; password: string }> {
  const username = profile.username ?? await input({
    message: `Account username for ${profile.host}:`,
    validate: validateRequired,
  });
  const secret = profile.password ?? await password({
    message: 'Account password:',
    mask: '*',
    validate: validateRequired,
  });
  return { username, password: secret };
}

export function formatProvisionSummary(app: ProvisionedApp, port: number): string[] {
  const secretArgs = app.clientSecret ? ` --client-secret ${app.clientSecret}` : '';

  return [
    chalk.bold.green('✅ OAuth application registered'),
    ...(app.enrolled ? [chalk.cyan('   Account enrolled into OAuth')] : []),
    `   ${chalk.bold('Integration ID:')} ${app.integrationId}`,
    `   ${chalk.bold('Client ID:')}      ${app.clientId}`,
    `   ${chalk.bold('Client secret:')}  ${app.clientSecret ?? chalk.gray('(none issued)')}`,
    `   ${chalk.bold('Redirect URL:')}   ${app.redirectUrl}`,
    '',
    chalk.bold('Next step:'),
    chalk.cyan(
      `   npm start -- --host <workspace host> --warehouse-id <warehouse id> --client-id ${app.clientId}${secretArgs} --port ${port}`
    ),
    chalk.yellow('   Keep the client secret private; it cannot be shown again.'),
  ];
}
