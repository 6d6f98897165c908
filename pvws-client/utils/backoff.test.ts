import { backoffDelay, connectWithBackoff, GatewayConnectError } from './backoff';

const URL = 'ws://gateway.test/pvws/pv';

describe('gateway backoff', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('doubles the delay up to the cap', () => {
    expect(backoffDelay(0)).toBe(500);
    expect(backoffDelay(3)).toBe(4000);
    expect(backoffDelay(10)).toBe(10000);
    expect(backoffDelay(2, { baseDelayMs: 10, maxDelayMs: 30 })).toBe(30);
  });

  it('retries until the gateway accepts the connection', async () => {
    const connect = jest
      .fn<Promise<void>, []>()
      .mockRejectedValueOnce(new Error('ECONNREFUSED'))
      .mockResolvedValueOnce(undefined);

    await expect(connectWithBackoff(URL, connect, { baseDelayMs: 1 })).resolves.toBeUndefined();
    expect(connect).toHaveBeenCalledTimes(2);
    expect(warnSpy).toHaveBeenCalledWith(`⚠️ [PVWS] Connect to ${URL} failed (attempt 1/3), retrying in 1ms`);
  });

  it('gives up with the last failure once the attempts run out', async () => {
    const refused = new Error('ECONNREFUSED');
    const connect = jest.fn<Promise<void>, []>().mockRejectedValue(refused);

    const error = await connectWithBackoff(URL, connect, { attempts: 2, baseDelayMs: 1 }).catch((e: unknown) => e);

    expect(connect).toHaveBeenCalledTimes(2);
    expect(error).toBeInstanceOf(GatewayConnectError);
    if (!(error instanceof GatewayConnectError)) return;
    expect(error.message).toBe(`Could not reach ${URL} after 2 attempts: ECONNREFUSED`);
    expect(error.attempts).toBe(2);
    expect(error.cause).toBe(refused);
  });
});
