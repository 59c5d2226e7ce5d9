import { describe, expect, test, vi } from 'vitest';
import { TransportError } from '../src/core/errors.js';
import { withTransportRetry } from '../src/core/presenter/transport-retry.js';

function flaky<T>(failures: Error[], value: T) {
  return vi.fn(async () => {
    const failure = failures.shift();
    if (failure) throw failure;
    return value;
  });
}

describe('withTransportRetry', () => {
  test('waits out the server hint', async () => {
    const sleep = vi.fn(async () => undefined);
    const fn = flaky([new TransportError('slow down', 'too_many_requests', 1_500)], 7);

    expect(await withTransportRetry(fn, { maxRetries: 3, sleep })).toBe(7);
    expect(sleep.mock.calls).toEqual([[1_500]]);
  });

  test('backs off exponentially without a hint and gives up after maxRetries', async () => {
    const sleep = vi.fn(async () => undefined);
    const fn = flaky(
      [
        new TransportError('slow down', 'too_many_requests'),
        new TransportError('slow down', 'too_many_requests'),
        new TransportError('still slow', 'too_many_requests'),
      ],
      7,
    );

    await expect(withTransportRetry(fn, { maxRetries: 2, sleep })).rejects.toThrow('still slow');
    expect(sleep.mock.calls).toEqual([[1_000], [2_000]]);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  test('other failures are not retried', async () => {
    const sleep = vi.fn(async () => undefined);
    const fn = flaky([new TransportError('gone', 'message_gone')], 7);

    await expect(withTransportRetry(fn, { maxRetries: 3, sleep })).rejects.toThrow('gone');
    expect(sleep).not.toHaveBeenCalled();
  });
});
