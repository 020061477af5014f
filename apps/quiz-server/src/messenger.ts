import { Config } from '@chat-quiz/shared-types';
import type { Response, ResponseSender } from '@chat-quiz/quiz-engine';
import { describeError, log } from '@chat-quiz/logger';

export interface MessengerOptions {
  graphApiUrl?: string;
  timeoutMs?: number;
  /** Extra attempts after the first one. */
  maxRetries?: number;
  /** Delay before retry n is n * retryDelayMs. */
  retryDelayMs?: number;
  fetch?: typeof fetch;
}

export class DeliveryError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'DeliveryError';
  }
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Sends rendered responses through the Messenger send API. */
export class MessengerResponder implements ResponseSender {
  private readonly graphApiUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetch: typeof fetch;

  constructor(options: MessengerOptions = {}) {
    this.graphApiUrl = options.graphApiUrl ?? Config.delivery.graphApiUrl;
    this.timeoutMs = options.timeoutMs ?? Config.delivery.timeoutMs;
    this.maxRetries = options.maxRetries ?? Config.delivery.maxRetries;
    this.retryDelayMs = options.retryDelayMs ?? Config.delivery.retryDelayMs;
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async respond(response: Response): Promise<void> {
    const url = `${this.graphApiUrl}/me/messages?access_token=${encodeURIComponent(response.channel.token)}`;
    const body = JSON.stringify({
      messaging_type: 'RESPONSE',
      recipient: { id: response.to.id },
      message: { text: response.formatter.format(response.message) },
    });
    const meta = {
      layer: 'DELIVERY' as const,
      channelId: response.channel.channelId,
      playerId: response.to.id,
      response: response.message.type,
    };

    for (let attempt = 0; ; attempt++) {
      try {
        await this.post(url, body);
        return;
      } catch (err) {
        if (attempt >= this.maxRetries) {
          log('ERROR', 'Response delivery failed', { ...meta, attempts: attempt + 1, ...describeError(err) });
          throw err;
        }
        log('WARN', 'Response delivery failed, retrying', { ...meta, attempt: attempt + 1, ...describeError(err) });
        await sleep(this.retryDelayMs * (attempt + 1));
      }
    }
  }

  private async post(url: string, body: string): Promise<void> {
    const res = await this.fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      const detail = await res.text();
      throw new DeliveryError(`Send API responded ${res.status}: ${detail}`, res.status);
    }
  }
}
