const DAILY_SUBJECT_PREFIX = "Daily Translation:";

// Prefixes mail clients put in front of a subject when replying or forwarding.
const REPLY_PREFIXES = /^(?:(?:re|fwd?|aw|sv)\s*:\s*)+/i;

export const formatDailySubject = (textTitle: string): string =>
  `${DAILY_SUBJECT_PREFIX} ${textTitle}`;

/**
 * Returns the text title carried by a daily-portion subject line, or null when the
 * subject does not follow the convention.
 */
export const parseDailySubject = (subject: string): string | null => {
  const stripped = subject.trim().replace(REPLY_PREFIXES, "");
  if (!stripped.startsWith(DAILY_SUBJECT_PREFIX)) {
    return null;
  }
  const title = stripped.slice(DAILY_SUBJECT_PREFIX.length).trim();
  return title || null;
};

/**
 * 1-based, inclusive description of the absolute sentence range in a portion.
 */
export const describeSentenceRange = (sentenceIndices: readonly number[]): string => {
  if (!sentenceIndices.length) {
    return "no sentences";
  }
  const first = sentenceIndices[0] + 1;
  const last = sentenceIndices[sentenceIndices.length - 1] + 1;
  return first === last ? `sentence ${first}` : `sentences ${first}-${last}`;
};
