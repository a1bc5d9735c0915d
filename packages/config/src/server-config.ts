/**
 * Server configuration schema
 * Settings for the demo web server, taken from CLI flags with environment fallbacks
 */

import { z } from 'zod';

/**
 * Workspace host: scheme added when missing, trailing slashes dropped
 */
const HostSchema = z.preprocess(
  (value) => (typeof value === 'string' ? normalizeHost(value) : value),
  z.string({ required_error: 'Workspace host is required (--host or DATABRICKS_HOST)' }).url()
);

/**
 * Server configuration schema (secrets included: never log a parsed config as-is)
 */
export const ServerConfigSchema = z.object({
  // Workspace
  host: HostSchema,
  warehouseId: z.string({ required_error: 'SQL warehouse id is required (--warehouse-id or DATABRICKS_WAREHOUSE_ID)' }).min(1),

  // OAuth application credentials (absent until the app is provisioned)
  clientId: z.string().min(1).optional(),
  clientSecret: z.string().min(1).optional(),

  // HTTP server configuration
  port: z.number().int().min(1).max(65535).default(5001),

  // Account profile used by the provisioning tool
  profile: z.string().min(1).default('DEFAULT'),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Raw CLI options as they arrive from commander
 */
export interface ServerCliOptions {
  host?: string;
  clientId?: string;
  clientSecret?: string;
  warehouseId?: string;
  port?: string | number;
  profile?: string;
}

export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  if (trimmed === '') {
    return trimmed;
  }
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function parsePort(value: string | number | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return typeof value === 'number' ? value : Number.parseInt(value, 10);
}

/**
 * Load and validate server configuration.
 * CLI options win over environment variables.
 */
export function loadServerConfig(
  options: ServerCliOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const raw = {
    host: emptyToUndefined(options.host ?? env.DATABRICKS_HOST),
    warehouseId: emptyToUndefined(options.warehouseId ?? env.DATABRICKS_WAREHOUSE_ID),
    clientId: emptyToUndefined(options.clientId ?? env.DATABRICKS_CLIENT_ID),
    clientSecret: emptyToUndefined(options.clientSecret ?? env.DATABRICKS_CLIENT_SECRET),
    port: parsePort(options.port ?? env.PORT),
    profile: emptyToUndefined(options.profile ?? env.DATABRICKS_CONFIG_PROFILE),
  };

  const result = ServerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid server configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}
