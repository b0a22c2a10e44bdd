import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  getSmsProvider,
  logSmsProvider,
  sendSmsWithRetry,
  setSmsProvider,
  verificationMessage,
} from '../../src/utils/sms.service';

const options = { maxRetries: 3, retryDelayMs: 1 };

describe('sendSmsWithRetry', () => {
  afterEach(() => {
    setSmsProvider(logSmsProvider);
  });

  it('uses the log provider by default', () => {
    expect(getSmsProvider().name).toBe('log');
  });

  it('stops after the first successful attempt', async () => {
    const send = vi.fn().mockResolvedValue(undefined);
    setSmsProvider({ name: 'stub', send });

    await expect(sendSmsWithRetry('+998901112233', 'hello', options)).resolves.toBe(true);
    expect(send).toHaveBeenCalledTimes(1);
    expect(send).toHaveBeenCalledWith('+998901112233', 'hello');
  });

  it('retries failures until one goes through', async () => {
    const send = vi
      .fn()
      .mockRejectedValueOnce(new Error('gateway timeout'))
      .mockRejectedValueOnce(new Error('gateway timeout'))
      .mockResolvedValue(undefined);
    setSmsProvider({ name: 'stub', send });

    await expect(sendSmsWithRetry('+998901112233', 'hello', options)).resolves.toBe(true);
    expect(send).toHaveBeenCalledTimes(3);
  });

  it('gives up after the configured retries without throwing', async () => {
    const send = vi.fn().mockRejectedValue(new Error('carrier down'));
    setSmsProvider({ name: 'stub', send });

    await expect(sendSmsWithRetry('+998901112233', 'hello', options)).resolves.toBe(false);
    expect(send).toHaveBeenCalledTimes(4);
  });

  it('formats the verification text', () => {
    expect(verificationMessage('042917')).toBe('Your verification code: 042917. Do not share it with anyone.');
  });
});
