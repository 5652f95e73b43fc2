/**
 * Composition root shared by the stdio and HTTP entry points
 */

import { loadConfig, secretValues, type SharePointConfig } from './config.js';
import { CredentialResolver } from './auth/resolver.js';
import { createDefaultStrategies, incompleteCredentialsError, type CredentialStrategy } from './auth/strategies.js';
import { errorMessage } from './errors.js';
import type { GraphClientFactory } from './graph/client.js';
import { SharePointStorage } from './graph/sharepoint.js';
import type { Logger } from './observability/logger.js';
import { ToolDispatcher } from './tools/dispatcher.js';

export interface Services {
  resolver: CredentialResolver;
  storage: SharePointStorage;
  dispatcher: ToolDispatcher;
}

/** Seams for tests: replace the identity providers or the Graph transport. */
export interface ServiceOverrides {
  strategies?: CredentialStrategy[];
  createClient?: GraphClientFactory;
}

export function createServices(config: SharePointConfig, logger: Logger, overrides: ServiceOverrides = {}): Services {
  const secrets = secretValues(config);

  const resolver = new CredentialResolver(overrides.strategies ?? createDefaultStrategies(config.credentials), {
    logger,
    secrets,
  });

  const storage = new SharePointStorage({
    siteUrl: config.siteUrl,
    credentials: resolver,
    driveName: config.storage.driveName,
    createFolderIdempotent: config.storage.createFolderIdempotent,
    createClient: overrides.createClient,
    logger,
  });

  const dispatcher = new ToolDispatcher(storage, { logger, secrets });

  return { resolver, storage, dispatcher };
}

/**
 * Startup checks that make the process exit before accepting requests
 */
export function assertStartupConfig(config: SharePointConfig): void {
  const incomplete = incompleteCredentialsError(config.credentials);
  if (incomplete) throw incomplete;
}

/**
 * Loads and validates configuration, or exits with status 1 and a usage summary
 */
export function loadStartupConfig(): SharePointConfig {
  try {
    const config = loadConfig();
    assertStartupConfig(config);
    return config;
  } catch (error) {
    process.stderr.write(`Configuration error: ${errorMessage(error)}\n`);
    process.stderr.write('\nRequired environment variables:\n');
    process.stderr.write('  SHAREPOINT_SITE_URL       - SharePoint site URL, e.g. https://contoso.sharepoint.com/sites/team\n');
    process.stderr.write('\nOptional (all three or none):\n');
    process.stderr.write('  AZURE_TENANT_ID           - Azure AD tenant ID\n');
    process.stderr.write('  AZURE_CLIENT_ID           - Azure AD application (client) ID\n');
    process.stderr.write('  AZURE_CLIENT_SECRET       - Azure AD client secret\n');
    process.stderr.write('\nWithout client credentials, managed identity and then the Azure CLI login are used.\n');
    process.exit(1);
  }
}
