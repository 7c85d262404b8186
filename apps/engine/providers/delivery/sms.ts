import { workflowEnv } from "../../config/env";
import { InvalidUserContactError } from "../../lib/errors";
import type { User } from "../../lib/types";
import { describeSentenceRange } from "./subject";
import type { Deliverable, MessageSink } from "./types";

export interface SmsDeliveryOptions {
  fromNumber?: string;
  now?: () => number;
}

// SMS has no subject line, so the title leads the body.
export const formatSmsBody = (
  textTitle: string,
  sentences: readonly string[],
  sentenceIndices: readonly number[]
): string => {
  const lines = [`Translation: ${textTitle} (${describeSentenceRange(sentenceIndices)})`, ""];
  sentences.forEach((sentence, index) => {
    lines.push(`${index + 1}. ${sentence}`);
  });
  return lines.join("\n");
};

class SmsDelivery implements Deliverable {
  readonly method = "sms" as const;

  constructor(
    private readonly sink: MessageSink,
    private readonly options: Required<SmsDeliveryOptions>
  ) {}

  async send(
    user: User,
    textTitle: string,
    sentences: readonly string[],
    sentenceIndices: readonly number[]
  ): Promise<boolean> {
    if (!user.phone) {
      throw new InvalidUserContactError(`User ${user.id} does not have a phone number`);
    }

    return this.sink.deliver({
      method: this.method,
      recipient: user.phone,
      sender: this.options.fromNumber,
      body: formatSmsBody(textTitle, sentences, sentenceIndices),
      sentAt: this.options.now(),
    });
  }
}

export const createSmsDelivery = (sink: MessageSink, options: SmsDeliveryOptions = {}): Deliverable =>
  new SmsDelivery(sink, {
    fromNumber: options.fromNumber ?? workflowEnv.sms.fromNumber,
    now: options.now ?? Date.now,
  });
