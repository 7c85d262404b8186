import { describe, expect, it, vi } from "vitest";
import { InvalidUserContactError, UnsupportedDeliveryMethodError } from "../../../lib/errors";
import type { User } from "../../../lib/types";
import { createDeliveryChannels, createOutboundTransport, getDeliveryChannel } from "..";
import { formatEmailBody } from "../email";
import { createOutbox } from "../outbox";
import { formatSmsBody } from "../sms";
import { describeSentenceRange, formatDailySubject, parseDailySubject } from "../subject";
import type { MessageSink, OutboundMessage } from "../types";

const emailUser: User = {
  id: "ana",
  name: "Ana",
  email: "ana@example.com",
  preferredMethod: "email",
  createdAt: 0,
};

const smsUser: User = {
  id: "ben",
  name: "Ben",
  phone: "+15550100",
  preferredMethod: "sms",
  createdAt: 0,
};

const recordingSink = () => {
  const sent: OutboundMessage[] = [];
  const sink: MessageSink = {
    deliver: async (message) => {
      sent.push(message);
      return true;
    },
  };
  return { sent, sink };
};

describe("subject lines", () => {
  it("round-trips the text title", () => {
    expect(formatDailySubject("Moby Dick")).toBe("Daily Translation: Moby Dick");
    expect(parseDailySubject("Daily Translation: Moby Dick")).toBe("Moby Dick");
  });

  it("strips reply and forward prefixes", () => {
    expect(parseDailySubject("Re: Daily Translation: Moby Dick")).toBe("Moby Dick");
    expect(parseDailySubject("RE: Fwd: Daily Translation: Moby Dick ")).toBe("Moby Dick");
    expect(parseDailySubject("AW:Daily Translation: Moby Dick")).toBe("Moby Dick");
  });

  it("rejects subjects without the daily prefix or a title", () => {
    expect(parseDailySubject("Hello there")).toBeNull();
    expect(parseDailySubject("Daily Translation:   ")).toBeNull();
  });

  it("describes sentence ranges one-based", () => {
    expect(describeSentenceRange([])).toBe("no sentences");
    expect(describeSentenceRange([4])).toBe("sentence 5");
    expect(describeSentenceRange([3, 4, 5])).toBe("sentences 4-6");
  });
});

describe("message bodies", () => {
  it("numbers email sentences in brackets from one", () => {
    const body = formatEmailBody("Moby Dick", ["Call me Ishmael.", "Some years ago."], [6, 7]);
    expect(body.split("\n")).toEqual([
      "Here are your sentences to translate from 'Moby Dick' (sentences 7-8):",
      "",
      "[1] Call me Ishmael.",
      "",
      "[2] Some years ago.",
      "",
      "To submit your translations, please reply to this message with each translation numbered as shown above.",
      "",
      "Example:",
      "[1] Your translation of the first sentence.",
      "[2] Your translation of the second sentence.",
      "",
    ]);
  });

  it("keeps SMS bodies compact", () => {
    expect(formatSmsBody("Moby Dick", ["Call me Ishmael."], [0])).toBe(
      "Translation: Moby Dick (sentence 1)\n\n1. Call me Ishmael."
    );
  });
});

describe("delivery channels", () => {
  it("sends email with subject, sender and reply-to", async () => {
    const { sent, sink } = recordingSink();
    const channels = createDeliveryChannels(sink, {
      from: "service@example.com",
      replyTo: "replies@example.com",
      now: () => 7,
    });

    await expect(channels.email.send(emailUser, "Moby Dick", ["Call me Ishmael."], [0])).resolves.toBe(true);
    expect(sent).toHaveLength(1);
    expect(sent[0]).toMatchObject({
      method: "email",
      recipient: "ana@example.com",
      sender: "service@example.com",
      replyTo: "replies@example.com",
      subject: "Daily Translation: Moby Dick",
      sentAt: 7,
    });
  });

  it("sends SMS without a subject", async () => {
    const { sent, sink } = recordingSink();
    const channels = createDeliveryChannels(sink, { fromNumber: "+15550199", now: () => 8 });

    await channels.sms.send(smsUser, "Moby Dick", ["Call me Ishmael."], [0]);
    expect(sent[0]).toEqual({
      method: "sms",
      recipient: "+15550100",
      sender: "+15550199",
      body: "Translation: Moby Dick (sentence 1)\n\n1. Call me Ishmael.",
      sentAt: 8,
    });
  });

  it("refuses users missing the channel's contact", async () => {
    const { sent, sink } = recordingSink();
    const channels = createDeliveryChannels(sink);

    await expect(channels.email.send(smsUser, "Moby Dick", ["x"], [0])).rejects.toBeInstanceOf(
      InvalidUserContactError
    );
    await expect(channels.sms.send(emailUser, "Moby Dick", ["x"], [0])).rejects.toBeInstanceOf(
      InvalidUserContactError
    );
    expect(sent).toEqual([]);
  });

  it("passes a sink failure through as false", async () => {
    const sink: MessageSink = { deliver: vi.fn(async () => false) };
    const channels = createDeliveryChannels(sink);
    await expect(channels.email.send(emailUser, "Moby Dick", ["x"], [0])).resolves.toBe(false);
  });

  it("routes through the preferred method", async () => {
    const { sent, sink } = recordingSink();
    const transport = createOutboundTransport(createDeliveryChannels(sink));

    await transport(emailUser, "Moby Dick", ["x"], [0]);
    await transport(smsUser, "Moby Dick", ["x"], [0]);
    expect(sent.map((message) => message.method)).toEqual(["email", "sms"]);
  });

  it("looks channels up by method name", () => {
    const channels = createDeliveryChannels(recordingSink().sink);
    expect(getDeliveryChannel(channels, "sms").method).toBe("sms");
    expect(() => getDeliveryChannel(channels, "fax")).toThrow(UnsupportedDeliveryMethodError);
  });
});

describe("outbox", () => {
  it("keeps and logs every message", async () => {
    const logger = vi.fn(async () => {});
    const outbox = createOutbox(logger);
    const channels = createDeliveryChannels(outbox, { now: () => 1 });

    await channels.sms.send(smsUser, "Moby Dick", ["Call me Ishmael."], [0]);
    expect(outbox.messages).toHaveLength(1);
    expect(logger).toHaveBeenCalledWith({
      level: "info",
      category: "delivery:sms",
      message: "queued message for +15550100",
      details: { subject: undefined, characters: outbox.messages[0].body.length },
    });

    outbox.clear();
    expect(outbox.messages).toEqual([]);
  });
});
