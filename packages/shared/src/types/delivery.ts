export interface OutboundMessage {
  title: string;
  text: string;
  timestamp: string;
}

/** Anything that can hand a finished answer to the outside world. */
export interface DeliveryChannel {
  readonly name: string;
  send(message: OutboundMessage): Promise<void>;
}
