import { smsConfig } from '../connections/config/app.config';
import { logger, errorMessage } from './logging';

/**
 * A carrier that can deliver one text message
 */
export interface SmsProvider {
  readonly name: string;
  send(phoneNumber: string, message: string): Promise<void>;
}

/**
 * Writes outgoing messages to the log instead of a carrier
 */
export const logSmsProvider: SmsProvider = {
  name: 'log',
  async send(phoneNumber, message) {
    logger.info('[SMS] Outgoing message', { to: phoneNumber, from: smsConfig.sender, message });
  },
};

const providers: Record<string, SmsProvider> = {
  [logSmsProvider.name]: logSmsProvider,
};

let activeProvider: SmsProvider = providers[smsConfig.provider] ?? logSmsProvider;

export const setSmsProvider = (provider: SmsProvider): void => {
  activeProvider = provider;
};

export const getSmsProvider = (): SmsProvider => activeProvider;

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

export interface SmsRetryOptions {
  maxRetries: number;
  retryDelayMs: number;
}

/**
 * Sends through the active provider, retrying failures with a fixed delay.
 * Resolves to whether the message was eventually delivered; never rejects.
 */
export const sendSmsWithRetry = async (
  phoneNumber: string,
  message: string,
  options: SmsRetryOptions = smsConfig
): Promise<boolean> => {
  const provider = activeProvider;
  const attempts = options.maxRetries + 1;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      await provider.send(phoneNumber, message);
      return true;
    } catch (error) {
      if (attempt < attempts) {
        logger.warn(`[SMS] Send attempt ${attempt}/${attempts} failed, retrying in ${options.retryDelayMs}ms`, {
          provider: provider.name,
          phoneNumber,
          error: errorMessage(error),
        });
        await sleep(options.retryDelayMs);
      } else {
        logger.error('[SMS] Giving up after final attempt', {
          provider: provider.name,
          phoneNumber,
          attempts,
          error: errorMessage(error),
        });
      }
    }
  }

  return false;
};

/**
 * Fire-and-forget delivery: the request that triggers it does not wait
 */
export const dispatchSms = (phoneNumber: string, message: string): void => {
  void sendSmsWithRetry(phoneNumber, message);
};

export const verificationMessage = (code: string): string =>
  `Your verification code: ${code}. Do not share it with anyone.`;

export const passwordResetMessage = (code: string): string =>
  `Your password reset code: ${code}. It is valid for 5 minutes.`;
