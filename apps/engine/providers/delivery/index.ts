import { UnsupportedDeliveryMethodError } from "../../lib/errors";
import { isDeliveryMethod } from "../../lib/types";
import { createEmailDelivery, type EmailDeliveryOptions } from "./email";
import { createSmsDelivery, type SmsDeliveryOptions } from "./sms";
import type { Deliverable, DeliveryChannels, MessageSink, OutboundTransport } from "./types";

export type DeliveryChannelOptions = EmailDeliveryOptions & SmsDeliveryOptions;

export const createDeliveryChannels = (
  sink: MessageSink,
  options: DeliveryChannelOptions = {}
): DeliveryChannels => ({
  email: createEmailDelivery(sink, options),
  sms: createSmsDelivery(sink, options),
});

export const getDeliveryChannel = (channels: DeliveryChannels, method: string): Deliverable => {
  if (!isDeliveryMethod(method)) {
    throw new UnsupportedDeliveryMethodError(method);
  }
  return channels[method];
};

/**
 * Routes each portion through the channel matching the user's preferred method.
 */
export const createOutboundTransport =
  (channels: DeliveryChannels): OutboundTransport =>
  async (user, textTitle, sentences, sentenceIndices) =>
    getDeliveryChannel(channels, user.preferredMethod).send(user, textTitle, sentences, sentenceIndices);
