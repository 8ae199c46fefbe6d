import type { DeliveryChannel, OutboundMessage } from '@steward/shared';

export abstract class BaseChannel implements DeliveryChannel {
  abstract readonly name: string;

  abstract send(message: OutboundMessage): Promise<void>;

  protected formatMessage(message: OutboundMessage): string {
    return formatMessage(message);
  }
}

export function formatMessage(message: OutboundMessage): string {
  return `**${message.title}**\n\n**Timestamp:** ${message.timestamp}\n\n**Content:**\n${message.text}`;
}
