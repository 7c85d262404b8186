import { workflowEnv } from "../../config/env";
import { InvalidUserContactError } from "../../lib/errors";
import type { User } from "../../lib/types";
import { describeSentenceRange, formatDailySubject } from "./subject";
import type { Deliverable, MessageSink } from "./types";

export interface EmailDeliveryOptions {
  from?: string;
  replyTo?: string;
  now?: () => number;
}

export const formatEmailBody = (
  textTitle: string,
  sentences: readonly string[],
  sentenceIndices: readonly number[]
): string => {
  const lines = [
    `Here are your sentences to translate from '${textTitle}' (${describeSentenceRange(sentenceIndices)}):`,
    "",
  ];
  sentences.forEach((sentence, index) => {
    lines.push(`[${index + 1}] ${sentence}`, "");
  });
  lines.push(
    "To submit your translations, please reply to this message with each translation numbered as shown above.",
    "",
    "Example:",
    "[1] Your translation of the first sentence.",
    "[2] Your translation of the second sentence.",
    ""
  );
  return lines.join("\n");
};

class EmailDelivery implements Deliverable {
  readonly method = "email" as const;

  constructor(
    private readonly sink: MessageSink,
    private readonly options: Required<EmailDeliveryOptions>
  ) {}

  async send(
    user: User,
    textTitle: string,
    sentences: readonly string[],
    sentenceIndices: readonly number[]
  ): Promise<boolean> {
    if (!user.email) {
      throw new InvalidUserContactError(`User ${user.id} does not have an email address`);
    }

    return this.sink.deliver({
      method: this.method,
      recipient: user.email,
      sender: this.options.from,
      replyTo: this.options.replyTo,
      subject: formatDailySubject(textTitle),
      body: formatEmailBody(textTitle, sentences, sentenceIndices),
      sentAt: this.options.now(),
    });
  }
}

export const createEmailDelivery = (
  sink: MessageSink,
  options: EmailDeliveryOptions = {}
): Deliverable =>
  new EmailDelivery(sink, {
    from: options.from ?? workflowEnv.email.from,
    replyTo: options.replyTo ?? workflowEnv.email.replyTo,
    now: options.now ?? Date.now,
  });
