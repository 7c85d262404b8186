import { describeError } from "../lib/errors";
import { logServerEvent, type EventLogger } from "../lib/logging/server";
import type { User } from "../lib/types";
import type { OutboundTransport } from "../providers/delivery/types";
import type { TextCatalog } from "../store/catalog";
import type { ProgressStore } from "../store/progress";

export interface DispatchDailyPortionsParams {
  catalog: TextCatalog;
  progress: ProgressStore;
  transport: OutboundTransport;
  /** Defaults to every registered user, in registration order. Repeated ids are sent once. */
  userIds?: readonly string[];
  now?: () => number;
  logger?: EventLogger;
}

export type DispatchStatus = "sent" | "complete" | "failed";

export interface DispatchReport {
  userId: string;
  /** Null when the user itself could not be resolved. */
  textId: string | null;
  status: DispatchStatus;
  sentenceIndices: number[];
  error?: string;
}

const CATEGORY = "dispatch:daily";

const indexRange = (start: number, count: number): number[] =>
  Array.from({ length: count }, (_, offset) => start + offset);

/**
 * Sends every targeted user the next unsent portion of each text assigned to them and
 * advances the cursor of each portion the transport accepted.
 *
 * Users are handled concurrently; the texts of one user are handled one after another,
 * so a progress record only ever has one writer. A failure for one (user, text) pair is
 * reported and never stops the rest of the cycle.
 */
export const dispatchDailyPortions = async (
  params: DispatchDailyPortionsParams
): Promise<DispatchReport[]> => {
  const { catalog, progress, transport, now = Date.now, logger = logServerEvent } = params;
  // One task per user; a repeated id would race its own cursor.
  const userIds = [...new Set(params.userIds ?? progress.getState().listUsers().map((user) => user.id))];

  const dispatchText = async (user: User, textId: string): Promise<DispatchReport> => {
    try {
      const text = catalog.getState().get(textId);
      const start = progress.getState().get(user.id, textId).currentPosition;

      if (start >= text.sentences.length) {
        await logger({
          level: "info",
          category: CATEGORY,
          message: `${user.name} has received every sentence of '${text.title}'`,
          details: { userId: user.id, textId },
        });
        return { userId: user.id, textId, status: "complete", sentenceIndices: [] };
      }

      const sentences = catalog.getState().dailyPortion(textId, start);
      const sentenceIndices = indexRange(start, sentences.length);
      const delivered = await transport(user, text.title, sentences, sentenceIndices);

      if (!delivered) {
        await logger({
          level: "warn",
          category: CATEGORY,
          message: `failed to send sentences to ${user.name}`,
          details: { userId: user.id, textId, sentenceIndices },
        });
        return {
          userId: user.id,
          textId,
          status: "failed",
          sentenceIndices,
          error: "Transport reported delivery failure",
        };
      }

      progress.getState().advance(user.id, textId, start + sentences.length, now());
      await logger({
        level: "info",
        category: CATEGORY,
        message: `sent ${sentences.length} sentences from '${text.title}' to ${user.name}`,
        details: { userId: user.id, textId, sentenceIndices },
      });
      return { userId: user.id, textId, status: "sent", sentenceIndices };
    } catch (error) {
      await logger({
        level: "error",
        category: CATEGORY,
        message: `error sending to user ${user.id} for text ${textId}`,
        details: { error },
      });
      return { userId: user.id, textId, status: "failed", sentenceIndices: [], error: describeError(error) };
    }
  };

  const dispatchUser = async (userId: string): Promise<DispatchReport[]> => {
    let user: User;
    let textIds: string[];
    try {
      user = progress.getState().getUser(userId);
      textIds = progress.getState().listProgress(userId).map((record) => record.textId);
    } catch (error) {
      await logger({
        level: "error",
        category: CATEGORY,
        message: `cannot dispatch to user ${userId}`,
        details: { error },
      });
      return [{ userId, textId: null, status: "failed", sentenceIndices: [], error: describeError(error) }];
    }

    const reports: DispatchReport[] = [];
    for (const textId of textIds) {
      reports.push(await dispatchText(user, textId));
    }
    return reports;
  };

  const perUser = await Promise.all(userIds.map((userId) => dispatchUser(userId)));
  return perUser.flat();
};
