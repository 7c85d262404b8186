import { logServerEvent, type EventLogger } from "../../lib/logging/server";
import type { MessageSink, OutboundMessage } from "./types";

export interface Outbox extends MessageSink {
  readonly messages: readonly OutboundMessage[];
  clear(): void;
}

/**
 * In-process sink that keeps every message it is handed. Used when no real mail or
 * SMS gateway is wired in, and by the CLI to print what would have been sent.
 */
export const createOutbox = (logger: EventLogger = logServerEvent): Outbox => {
  const messages: OutboundMessage[] = [];

  return {
    get messages() {
      return messages;
    },
    clear() {
      messages.length = 0;
    },
    async deliver(message) {
      messages.push(message);
      await logger({
        level: "info",
        category: `delivery:${message.method}`,
        message: `queued message for ${message.recipient}`,
        details: { subject: message.subject, characters: message.body.length },
      });
      return true;
    },
  };
};
