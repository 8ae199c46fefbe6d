export { BaseChannel, formatMessage } from './base-channel.js';
export { WebhookChannel, createDeliveryChannel } from './webhook.js';
export type {
  WebhookFormat,
  WebhookChannelConfig,
  FeishuTextPayload,
  JsonPayload,
} from './types.js';
