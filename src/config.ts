/**
 * Configuration for the SharePoint MCP server
 */

import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function parseFlag(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  return value;
}

const flag = (fallback: boolean) => z.preprocess(parseFlag, z.boolean()).default(fallback);

const optionalString = z.string().trim().optional();

const ConfigInputSchema = z.object({
  siteUrl: z
    .string({ required_error: 'SHAREPOINT_SITE_URL is required' })
    .trim()
    .min(1, 'SHAREPOINT_SITE_URL is required')
    .url('SHAREPOINT_SITE_URL must be an absolute URL')
    .refine((url) => /^https?:\/\//i.test(url), 'SHAREPOINT_SITE_URL must use http or https'),
  tenantId: optionalString,
  clientId: optionalString,
  clientSecret: optionalString,
  managedIdentityClientId: optionalString,
  allowCliCredential: flag(true),
  driveName: optionalString,
  createFolderIdempotent: flag(false),
  host: z.string().trim().default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  corsOrigins: z.string().default('*'),
  rateLimitMax: z.coerce.number().int().positive().default(100),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  telemetryEnabled: flag(false),
  prometheusPort: z.coerce.number().int().min(1).max(65535).default(9464),
});

type ConfigValue = string | number | boolean | undefined;

export interface ConfigInput {
  siteUrl?: string;
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  managedIdentityClientId?: string;
  allowCliCredential?: ConfigValue;
  driveName?: string;
  createFolderIdempotent?: ConfigValue;
  host?: string;
  port?: ConfigValue;
  corsOrigins?: string;
  rateLimitMax?: ConfigValue;
  logLevel?: string;
  telemetryEnabled?: ConfigValue;
  prometheusPort?: ConfigValue;
}

export interface CredentialSettings {
  readonly tenantId?: string;
  readonly clientId?: string;
  readonly clientSecret?: string;
  readonly managedIdentityClientId?: string;
  readonly allowCliCredential: boolean;
}

export interface SharePointConfig {
  readonly siteUrl: string;
  readonly credentials: CredentialSettings;
  readonly storage: {
    readonly driveName?: string;
    readonly createFolderIdempotent: boolean;
  };
  readonly http: {
    readonly host: string;
    readonly port: number;
    readonly corsOrigins: readonly string[];
    readonly rateLimitMax: number;
  };
  readonly logLevel: string;
  readonly telemetry: {
    readonly enabled: boolean;
    readonly prometheusPort: number;
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Builds a frozen configuration from explicit values.
 * Throws ConfigError when the site URL is missing or any value is malformed.
 */
export function createConfig(input: ConfigInput): SharePointConfig {
  // Blank values count as unset, matching how empty environment variables behave.
  const present = Object.fromEntries(
    Object.entries(input).filter(([, value]) => !(typeof value === 'string' && value.trim() === ''))
  );
  const parsed = ConfigInputSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const values = parsed.data;

  return Object.freeze({
    siteUrl: values.siteUrl.replace(/\/+$/, ''),
    credentials: Object.freeze({
      tenantId: values.tenantId,
      clientId: values.clientId,
      clientSecret: values.clientSecret,
      managedIdentityClientId: values.managedIdentityClientId,
      allowCliCredential: values.allowCliCredential,
    }),
    storage: Object.freeze({
      driveName: values.driveName,
      createFolderIdempotent: values.createFolderIdempotent,
    }),
    http: Object.freeze({
      host: values.host,
      port: values.port,
      corsOrigins: Object.freeze(
        values.corsOrigins
          .split(',')
          .map((origin) => origin.trim())
          .filter(Boolean)
      ),
      rateLimitMax: values.rateLimitMax,
    }),
    logLevel: values.logLevel,
    telemetry: Object.freeze({
      enabled: values.telemetryEnabled,
      prometheusPort: values.prometheusPort,
    }),
  });
}

/**
 * Reads configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SharePointConfig {
  return createConfig({
    siteUrl: env.SHAREPOINT_SITE_URL,
    tenantId: env.AZURE_TENANT_ID,
    clientId: env.AZURE_CLIENT_ID,
    clientSecret: env.AZURE_CLIENT_SECRET,
    managedIdentityClientId: env.AZURE_MANAGED_IDENTITY_CLIENT_ID,
    allowCliCredential: env.SHAREPOINT_ALLOW_CLI_CREDENTIAL,
    driveName: env.SHAREPOINT_DRIVE_NAME,
    createFolderIdempotent: env.SHAREPOINT_CREATE_FOLDER_IDEMPOTENT,
    host: env.HOST,
    port: env.PORT,
    corsOrigins: env.CORS_ORIGINS,
    rateLimitMax: env.RATE_LIMIT_MAX,
    logLevel: env.LOG_LEVEL,
    telemetryEnabled: env.OTEL_ENABLED,
    prometheusPort: env.PROMETHEUS_PORT,
  });
}

/**
 * Secret values that must never appear in logs or tool responses
 */
export function secretValues(config: SharePointConfig): string[] {
  const { clientSecret } = config.credentials;
  return clientSecret ? [clientSecret] : [];
}
