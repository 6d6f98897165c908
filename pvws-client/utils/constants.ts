// Connection defaults for the PV Web Socket gateway
export const CONNECTION = {
  REQUEST_TIMEOUT: 5000,
  MAX_RECONNECT_ATTEMPTS: 10,
} as const;

export const RETRY = {
  MAX_ATTEMPTS: 3,
  BASE_DELAY: 500,
  MAX_DELAY: 10000,
  BACKOFF_MULTIPLIER: 2,
} as const;
