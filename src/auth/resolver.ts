/**
 * Credential resolver: walks the strategy list in order and caches the winning token in memory
 */

import { AuthError, errorMessage, redact } from '../errors.js';
import { silentLogger, type Logger } from '../observability/logger.js';
import { tokenAcquisitionsCounter } from '../observability/tracing.js';
import { failed, type AccessToken, type CredentialStrategy, type StrategyAttempt } from './strategies.js';

const EXPIRY_BUFFER_MS = 120_000; // 2 minutes

export interface CredentialResolverOptions {
  /** Tokens this close to expiry are replaced before use. */
  refreshMarginMs?: number;
  now?: () => number;
  logger?: Logger;
  /** Values scrubbed from failure messages. */
  secrets?: readonly string[];
}

export class CredentialResolver {
  private cached: AccessToken | null = null;
  private inflight: Promise<AccessToken> | null = null;
  private readonly refreshMarginMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly secrets: readonly string[];

  constructor(
    private readonly strategies: readonly CredentialStrategy[],
    options: CredentialResolverOptions = {}
  ) {
    this.refreshMarginMs = options.refreshMarginMs ?? EXPIRY_BUFFER_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
    this.secrets = options.secrets ?? [];
  }

  /**
   * Returns a valid token. Concurrent callers that find the cache empty or
   * expiring share a single in-flight resolution.
   */
  resolve(): Promise<AccessToken> {
    if (this.cached && !this.isExpiring(this.cached)) {
      return Promise.resolve(this.cached);
    }

    if (!this.inflight) {
      this.inflight = this.acquire().finally(() => {
        this.inflight = null;
      });
    }

    return this.inflight;
  }

  async getToken(): Promise<string> {
    const token = await this.resolve();
    return token.token;
  }

  private isExpiring(token: AccessToken): boolean {
    return token.expiresOnTimestamp < this.now() + this.refreshMarginMs;
  }

  private async acquire(): Promise<AccessToken> {
    const attempts: string[] = [];

    for (const strategy of this.strategies) {
      const attempt: StrategyAttempt = await strategy
        .tryResolve()
        .catch((err: unknown) => failed(errorMessage(err)));

      tokenAcquisitionsCounter.add(1, { strategy: strategy.name, status: attempt.status });

      switch (attempt.status) {
        case 'resolved':
          this.logger.info(
            { strategy: strategy.name, expiresAt: new Date(attempt.token.expiresOnTimestamp).toISOString() },
            '[Auth] Access token acquired'
          );
          this.cached = attempt.token;
          return attempt.token;

        case 'fatal':
          this.logger.error({ strategy: strategy.name, reason: attempt.error.reason }, attempt.error.message);
          throw attempt.error;

        case 'skipped':
          this.logger.debug({ strategy: strategy.name, reason: attempt.reason }, '[Auth] Strategy skipped');
          attempts.push(`${strategy.name}: skipped (${attempt.reason})`);
          break;

        case 'failed':
          this.logger.warn(
            { strategy: strategy.name, reason: redact(attempt.reason, this.secrets) },
            '[Auth] Strategy failed'
          );
          attempts.push(`${strategy.name}: ${attempt.reason}`);
          break;
      }
    }

    const detail = attempts.length > 0 ? attempts.join('; ') : 'no credential strategies configured';
    throw new AuthError('Unavailable', redact(`Unable to acquire an access token. ${detail}`, this.secrets));
  }
}
