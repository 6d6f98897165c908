import { StreamLogger } from '../../shared/StreamLogger';
import { RETRY } from './constants';

const CATEGORY = 'PVWS';

// Shared by the initial connect and by reconnects after a drop
export interface BackoffPolicy {
  attempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export class GatewayConnectError extends Error {
  constructor(
    readonly url: string,
    readonly attempts: number,
    cause: unknown
  ) {
    super(`Could not reach ${url} after ${attempts} attempts: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'GatewayConnectError';
  }
}

/**
 * Delay before retry number `attempt` (0-based): doubles from the base delay up to the cap.
 */
export function backoffDelay(attempt: number, policy: BackoffPolicy = {}): number {
  const base = policy.baseDelayMs ?? RETRY.BASE_DELAY;
  const max = policy.maxDelayMs ?? RETRY.MAX_DELAY;
  return Math.min(base * Math.pow(RETRY.BACKOFF_MULTIPLIER, attempt), max);
}

/**
 * Run `connect` until it resolves, waiting out the backoff curve between failures.
 * @throws GatewayConnectError carrying the last failure once the attempts run out
 */
export async function connectWithBackoff(
  url: string,
  connect: () => Promise<void>,
  policy: BackoffPolicy = {}
): Promise<void> {
  const attempts = Math.max(1, policy.attempts ?? RETRY.MAX_ATTEMPTS);

  for (let attempt = 0; ; attempt++) {
    try {
      await connect();
      return;
    } catch (error) {
      if (attempt + 1 >= attempts) {
        throw new GatewayConnectError(url, attempts, error);
      }
      const delay = backoffDelay(attempt, policy);
      StreamLogger.warn(CATEGORY, `Connect to ${url} failed (attempt ${attempt + 1}/${attempts}), retrying in ${delay}ms`);
      await new Promise<void>((resolve) => setTimeout(resolve, delay));
    }
  }
}
