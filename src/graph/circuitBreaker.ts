/**
 * Circuit breaker for Microsoft Graph API calls
 * Prevents cascading failures during Graph API outages
 */

import CircuitBreaker from 'opossum';
import { TransportError } from '../errors.js';
import type { Logger } from '../observability/logger.js';
import { toStorageError } from './errors.js';

const CIRCUIT_BREAKER_OPTIONS = {
  timeout: 30000, // 30s timeout
  errorThresholdPercentage: 50, // Open circuit if 50% error rate
  resetTimeout: 30000, // Try to close after 30s
  rollingCountTimeout: 10000, // 10s rolling window
  rollingCountBuckets: 10,
  volumeThreshold: 10, // Need at least 10 requests before opening
};

/**
 * Semantic failures (missing item, denied access, bad path) do not count
 * against the breaker. Actions throw raw Graph errors, so classify them the
 * same way the adapter will.
 */
export function isSemanticFailure(err: unknown): boolean {
  return !(toStorageError(err) instanceof TransportError);
}

/**
 * Wrap a Graph operation in a circuit breaker that logs its state changes
 */
export function createCircuitBreaker<TI extends unknown[], TR>(
  name: string,
  action: (...args: TI) => Promise<TR>,
  logger: Logger
) {
  const breaker = new CircuitBreaker(action, {
    ...CIRCUIT_BREAKER_OPTIONS,
    name,
    errorFilter: isSemanticFailure,
  });

  breaker.on('open', () => {
    logger.error({ breaker: name }, '[CircuitBreaker] opened (too many failures)');
  });

  breaker.on('halfOpen', () => {
    logger.warn({ breaker: name }, '[CircuitBreaker] half-open (testing if recovered)');
  });

  breaker.on('close', () => {
    logger.info({ breaker: name }, '[CircuitBreaker] closed (service recovered)');
  });

  return breaker;
}

/**
 * Breaker state for health reporting
 */
export function circuitBreakerState(breaker: {
  opened: boolean;
  halfOpen: boolean;
}): 'open' | 'half-open' | 'closed' {
  return breaker.opened ? 'open' : breaker.halfOpen ? 'half-open' : 'closed';
}
