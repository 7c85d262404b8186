import { logServerEvent, type EventLogger } from "../lib/logging/server";
import type { TextSource, TranslationProgress } from "../lib/types";
import { parseDailySubject } from "../providers/delivery/subject";
import type { TextCatalog } from "../store/catalog";
import type { ProgressStore } from "../store/progress";
import { parseReply } from "./parseReply";

export interface InboundReply {
  /** Email address or phone number, compared verbatim with registered contacts. */
  sender: string;
  subject: string;
  body: string;
}

export interface RouteReplyDeps {
  catalog: TextCatalog;
  progress: ProgressStore;
  logger?: EventLogger;
}

export type RouteReport =
  | { status: "saved"; userId: string; textId: string; count: number; sentenceIndices: number[] }
  | { status: "unknown-sender"; sender: string }
  | { status: "no-text"; userId: string }
  | { status: "not-assigned"; userId: string; textId: string }
  | { status: "empty"; userId: string; textId: string };

const CATEGORY = "reply:route";

/**
 * Absolute index that relative marker 1 of a reply maps to: one full portion back from the
 * cursor. After a short final portion this points into the portion before it.
 */
export const latestPortionStart = (
  record: Pick<TranslationProgress, "currentPosition">,
  text: Pick<TextSource, "sentencesPerDay">
): number => Math.max(0, record.currentPosition - text.sentencesPerDay);

/**
 * Stores the translations found in a reply against the portion last sent to its author.
 * Replies to earlier portions are attributed to the latest one.
 */
export const routeReply = async (deps: RouteReplyDeps, reply: InboundReply): Promise<RouteReport> => {
  const { catalog, progress, logger = logServerEvent } = deps;

  const user = progress.getState().findUserByContact(reply.sender);
  if (!user) {
    await logger({ level: "warn", category: CATEGORY, message: `unknown sender: ${reply.sender}` });
    return { status: "unknown-sender", sender: reply.sender };
  }

  const title = parseDailySubject(reply.subject);
  const firstAssigned = progress.getState().listProgress(user.id)[0];
  const text =
    (title ? catalog.getState().findByTitle(title) : undefined) ??
    (firstAssigned ? catalog.getState().texts.find((entry) => entry.id === firstAssigned.textId) : undefined);

  if (!text) {
    await logger({
      level: "warn",
      category: CATEGORY,
      message: `could not determine which text user ${user.id} is translating`,
    });
    return { status: "no-text", userId: user.id };
  }

  const record = progress.getState().listProgress(user.id).find((entry) => entry.textId === text.id);
  if (!record) {
    await logger({
      level: "warn",
      category: CATEGORY,
      message: `user ${user.id} replied about '${text.title}' without being assigned to it`,
    });
    return { status: "not-assigned", userId: user.id, textId: text.id };
  }

  const translations = parseReply(reply.body);
  const relative = Object.keys(translations).map(Number);
  if (!relative.length) {
    await logger({ level: "info", category: CATEGORY, message: `no translations found in reply from ${reply.sender}` });
    return { status: "empty", userId: user.id, textId: text.id };
  }

  const base = latestPortionStart(record, text);
  const sentenceIndices: number[] = [];
  for (const offset of relative) {
    const absolute = base + offset;
    progress.getState().recordTranslation(user.id, text.id, absolute, translations[offset]);
    sentenceIndices.push(absolute);
  }

  await logger({
    level: "info",
    category: CATEGORY,
    message: `saved ${sentenceIndices.length} translations from ${user.name} for '${text.title}'`,
    details: { userId: user.id, textId: text.id, sentenceIndices },
  });
  return { status: "saved", userId: user.id, textId: text.id, count: sentenceIndices.length, sentenceIndices };
};
