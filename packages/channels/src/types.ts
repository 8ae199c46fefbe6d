export type WebhookFormat = 'feishu' | 'json';

export interface WebhookChannelConfig {
  url: string;
  format: WebhookFormat;
  /** Sent as a bearer token when set. */
  secret?: string;
  timeoutMs: number;
}

/** Body of a Feishu/Lark custom bot text message. */
export interface FeishuTextPayload {
  msg_type: 'text';
  content: { text: string };
}

export interface JsonPayload {
  title: string;
  timestamp: string;
  text: string;
}
