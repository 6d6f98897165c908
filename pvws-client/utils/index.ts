export { CONNECTION, RETRY } from './constants';
export { backoffDelay, connectWithBackoff, GatewayConnectError } from './backoff';
export type { BackoffPolicy } from './backoff';
