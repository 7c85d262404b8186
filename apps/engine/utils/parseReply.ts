import type { TranslationMap } from "../lib/types";

export type ReplyStrategyName = "bracketed" | "numbered-list";

export interface ReplyParsingStrategy {
  readonly name: ReplyStrategyName;
  /** Capture 1 is the marker number, capture 2 the text up to the next marker. */
  readonly pattern: RegExp;
}

export interface ReplyMarker {
  marker: string;
  text: string;
}

/** `[1] text [2] text`, matched across lines. */
export const bracketedStrategy: ReplyParsingStrategy = {
  name: "bracketed",
  pattern: /\[(\d+)\](.*?)(?=\[\d+\]|$)/gs,
};

/** `1. text 2. text`, only consulted when no bracketed marker is present. */
export const numberedListStrategy: ReplyParsingStrategy = {
  name: "numbered-list",
  pattern: /(\d+)\.(.*?)(?=\d+\.|$)/gs,
};

export const extractMarkers = (strategy: ReplyParsingStrategy, body: string): ReplyMarker[] =>
  Array.from(body.matchAll(strategy.pattern), (match) => ({
    marker: match[1],
    text: match[2],
  }));

export interface ParsedReply {
  strategy: ReplyStrategyName | null;
  translations: TranslationMap;
}

const toTranslations = (markers: ReplyMarker[]): TranslationMap => {
  const translations: TranslationMap = {};
  for (const { marker, text } of markers) {
    const position = Number.parseInt(marker, 10);
    if (!Number.isSafeInteger(position) || position < 1) {
      continue;
    }
    const translation = text.trim();
    if (!translation) {
      continue;
    }
    translations[position - 1] = translation;
  }
  return translations;
};

/**
 * Like {@link parseReply} but also reports which strategy produced the result.
 */
export const parseReplyDetailed = (body: string): ParsedReply => {
  for (const strategy of [bracketedStrategy, numberedListStrategy]) {
    const markers = extractMarkers(strategy, body);
    if (markers.length) {
      return { strategy: strategy.name, translations: toTranslations(markers) };
    }
  }
  return { strategy: null, translations: {} };
};

/**
 * Extracts translations from a free-text reply, keyed by 0-based position within the
 * batch the reply answers. Returns an empty map when nothing is numbered.
 */
export const parseReply = (body: string): TranslationMap => parseReplyDetailed(body).translations;
