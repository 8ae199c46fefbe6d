import { z } from 'zod';
import {
  type DeliveryConfig,
  type OutboundMessage,
  NetworkError,
  requestJson,
} from '@steward/shared';
import { BaseChannel } from './base-channel.js';
import type { FeishuTextPayload, JsonPayload, WebhookChannelConfig } from './types.js';

// Feishu answers HTTP 200 even when it rejects a message; the verdict is in `code`.
const feishuResponseSchema = z.object({
  code: z.number().optional(),
  msg: z.string().optional(),
}).passthrough();

/**
 * Posts answers to an incoming-webhook URL.
 *
 * `feishu`: `{ "msg_type": "text", "content": { "text": "..." } }`
 * `json`:   `{ "title": "...", "timestamp": "...", "text": "..." }`
 */
export class WebhookChannel extends BaseChannel {
  readonly name = 'webhook';

  constructor(private readonly config: WebhookChannelConfig) {
    super();
  }

  buildPayload(message: OutboundMessage): FeishuTextPayload | JsonPayload {
    if (this.config.format === 'json') {
      return { title: message.title, timestamp: message.timestamp, text: message.text };
    }
    return { msg_type: 'text', content: { text: this.formatMessage(message) } };
  }

  async send(message: OutboundMessage): Promise<void> {
    const headers: Record<string, string> = {};
    if (this.config.secret) {
      headers['Authorization'] = `Bearer ${this.config.secret}`;
    }

    const response = await requestJson(this.config.url, {
      capability: 'delivery',
      timeoutMs: this.config.timeoutMs,
      method: 'POST',
      headers,
      body: this.buildPayload(message),
    });

    if (this.config.format === 'feishu' && response !== null) {
      const parsed = feishuResponseSchema.safeParse(response);
      if (parsed.success && parsed.data.code !== undefined && parsed.data.code !== 0) {
        throw new NetworkError(
          'delivery',
          `webhook rejected the message (code ${parsed.data.code}${parsed.data.msg ? `: ${parsed.data.msg}` : ''})`,
        );
      }
    }
  }
}

/** Null when no webhook URL is configured. */
export function createDeliveryChannel(config: DeliveryConfig): WebhookChannel | null {
  if (!config.webhookUrl) return null;
  return new WebhookChannel({
    url: config.webhookUrl,
    format: config.format,
    secret: config.secret,
    timeoutMs: config.timeoutMs,
  });
}
