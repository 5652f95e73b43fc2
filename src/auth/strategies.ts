/**
 * Credential strategies for Microsoft Graph access tokens.
 * Each strategy reports its outcome instead of throwing, so the resolver can chain reasons.
 */

import { ConfidentialClientApplication } from '@azure/msal-node';
import { AzureCliCredential, ManagedIdentityCredential, type TokenCredential } from '@azure/identity';
import type { CredentialSettings } from '../config.js';
import { AuthError, errorMessage } from '../errors.js';

export const GRAPH_SCOPE = 'https://graph.microsoft.com/.default';

// Used when the identity provider omits an expiry.
const DEFAULT_LIFETIME_MS = 60 * 60 * 1000;

export interface AccessToken {
  token: string;
  expiresOnTimestamp: number;
}

export type StrategyAttempt =
  | { status: 'resolved'; token: AccessToken }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; reason: string }
  | { status: 'fatal'; error: AuthError };

export interface CredentialStrategy {
  readonly name: string;
  tryResolve(): Promise<StrategyAttempt>;
}

export const resolved = (token: AccessToken): StrategyAttempt => ({ status: 'resolved', token });
export const skipped = (reason: string): StrategyAttempt => ({ status: 'skipped', reason });
export const failed = (reason: string): StrategyAttempt => ({ status: 'failed', reason });

/**
 * Returns an IncompleteCredentials error when some, but not all, of the
 * tenant/client/secret triple is configured. Names variables, never values.
 */
export function incompleteCredentialsError(settings: CredentialSettings): AuthError | null {
  const fields: Array<[string, string | undefined]> = [
    ['AZURE_TENANT_ID', settings.tenantId],
    ['AZURE_CLIENT_ID', settings.clientId],
    ['AZURE_CLIENT_SECRET', settings.clientSecret],
  ];
  const missing = fields.filter(([, value]) => !value).map(([name]) => name);

  if (missing.length === 0 || missing.length === fields.length) return null;

  return new AuthError(
    'IncompleteCredentials',
    `Client credentials are incomplete: missing ${missing.join(', ')}. ` +
      'Set all of AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET, or none of them.'
  );
}

/**
 * Service principal authentication through the MSAL client-credentials grant
 */
export class ClientSecretStrategy implements CredentialStrategy {
  readonly name = 'client-secret';
  private msalClient: ConfidentialClientApplication | null = null;

  constructor(private readonly settings: CredentialSettings) {}

  async tryResolve(): Promise<StrategyAttempt> {
    const incomplete = incompleteCredentialsError(this.settings);
    if (incomplete) return { status: 'fatal', error: incomplete };

    const { tenantId, clientId, clientSecret } = this.settings;
    if (!tenantId || !clientId || !clientSecret) {
      return skipped('no client credentials configured');
    }

    try {
      const result = await this.getMSALClient(tenantId, clientId, clientSecret).acquireTokenByClientCredential({
        scopes: [GRAPH_SCOPE],
      });

      if (!result || !result.accessToken) {
        return failed('token endpoint returned no access token');
      }

      return resolved({
        token: result.accessToken,
        expiresOnTimestamp: result.expiresOn ? result.expiresOn.getTime() : Date.now() + DEFAULT_LIFETIME_MS,
      });
    } catch (err) {
      return failed(errorMessage(err));
    }
  }

  private getMSALClient(tenantId: string, clientId: string, clientSecret: string): ConfidentialClientApplication {
    if (this.msalClient) return this.msalClient;

    this.msalClient = new ConfidentialClientApplication({
      auth: {
        clientId,
        authority: `https://login.microsoftonline.com/${tenantId}`,
        clientSecret,
      },
    });

    return this.msalClient;
  }
}

/**
 * Adapts any Azure Identity credential to the strategy contract
 */
export class TokenCredentialStrategy implements CredentialStrategy {
  constructor(
    readonly name: string,
    private readonly credential: TokenCredential
  ) {}

  async tryResolve(): Promise<StrategyAttempt> {
    try {
      const token = await this.credential.getToken(GRAPH_SCOPE);
      if (!token) return failed('credential returned no token');
      return resolved({ token: token.token, expiresOnTimestamp: token.expiresOnTimestamp });
    } catch (err) {
      return failed(errorMessage(err));
    }
  }
}

/**
 * Uses the signed-in Azure CLI session. Only tried where the deployment allows it.
 */
export class AzureCliStrategy implements CredentialStrategy {
  readonly name = 'azure-cli';
  private readonly inner: TokenCredentialStrategy;

  constructor(
    private readonly allowed: boolean,
    credential: TokenCredential = new AzureCliCredential()
  ) {
    this.inner = new TokenCredentialStrategy(this.name, credential);
  }

  async tryResolve(): Promise<StrategyAttempt> {
    if (!this.allowed) return skipped('disabled by SHAREPOINT_ALLOW_CLI_CREDENTIAL');
    return this.inner.tryResolve();
  }
}

/**
 * The production strategy order: client secret, managed identity, Azure CLI
 */
export function createDefaultStrategies(settings: CredentialSettings): CredentialStrategy[] {
  const managedIdentity = settings.managedIdentityClientId
    ? new ManagedIdentityCredential({ clientId: settings.managedIdentityClientId })
    : new ManagedIdentityCredential();

  return [
    new ClientSecretStrategy(settings),
    new TokenCredentialStrategy('managed-identity', managedIdentity),
    new AzureCliStrategy(settings.allowCliCredential),
  ];
}
