import type { DeliveryMethod, User } from "../../lib/types";

export interface OutboundMessage {
  method: DeliveryMethod;
  recipient: string;
  sender: string;
  replyTo?: string;
  subject?: string;
  body: string;
  sentAt: number;
}

/**
 * Whatever actually moves a message to a person (SMTP relay, SMS gateway, outbox).
 * Ordinary delivery failures resolve to `false`; only misconfiguration should throw.
 */
export interface MessageSink {
  deliver(message: OutboundMessage): Promise<boolean>;
}

export interface Deliverable {
  readonly method: DeliveryMethod;
  send(
    user: User,
    textTitle: string,
    sentences: readonly string[],
    sentenceIndices: readonly number[]
  ): Promise<boolean>;
}

export type OutboundTransport = Deliverable["send"];

export type DeliveryChannels = Record<DeliveryMethod, Deliverable>;
