#!/usr/bin/env node

import chalk from 'chalk';
import { AccountClient } from './account-client.js';
import { createProvisionProgram, formatProvisionSummary, promptForCredentials, type ProvisionCliOptions } from './cli.js';
import { readAccountProfile } from './profile.js';
import { provisionCustomApp } from './provision.js';

const program = createProvisionProgram();

program.action(async (options: ProvisionCliOptions) => {
  try {
    const profile = await readAccountProfile(options.profile, {
      configFile: options.configFile,
      accountHost: options.accountHost,
      accountId: options.accountId,
    });

    console.log(chalk.cyan(`\n🔐 Registering "${options.appName}" on account ${profile.accountId}\n`));

    const credentials = await promptForCredentials(profile);
    const client = new AccountClient({ host: profile.host, accountId: profile.accountId, ...credentials });
    const app = await provisionCustomApp(client, { appName: options.appName, port: options.port });

    console.log();
    for (const line of formatProvisionSummary(app, options.port)) {
      console.log(line);
    }
    console.log();
  } catch (error) {
    console.error(chalk.red('\n❌ Provisioning failed:'));
    console.error(chalk.gray(`  ${error instanceof Error ? error.message : String(error)}\n`));
    process.exit(1);
  }
});

await program.parseAsync();
