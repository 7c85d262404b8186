export type DeliveryMethod = 'email' | 'sms';

export const DELIVERY_METHODS: readonly DeliveryMethod[] = ['email', 'sms'];

export type OutputFormat = 'txt' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['txt', 'json'];

/**
 * Absolute sentence index to translated text.
 */
export type TranslationMap = Record<number, string>;

export interface TextSource {
  id: string;
  title: string;
  author?: string;
  /** Path as given at registration, relative to the texts directory. */
  filePath: string;
  sourceLanguage: string;
  targetLanguage: string;
  sentencesPerDay: number;
  sentences: readonly string[];
  createdAt: number;
}

export interface User {
  id: string;
  name: string;
  email?: string;
  phone?: string;
  preferredMethod: DeliveryMethod;
  createdAt: number;
}

export interface TranslationProgress {
  userId: string;
  textId: string;
  /** Sentence count of the text when it was assigned. */
  totalSentences: number;
  /** Index of the next sentence to send; everything before it has been delivered. */
  currentPosition: number;
  lastSentAt?: number;
  translations: TranslationMap;
}

export interface TranslationStatus {
  title: string;
  totalSentences: number;
  translatedCount: number;
  completionPercentage: number;
  remainingCount: number;
}

export function totalDays(text: Pick<TextSource, 'sentences' | 'sentencesPerDay'>): number {
  return Math.ceil(text.sentences.length / text.sentencesPerDay);
}

export function isDeliveryMethod(value: string): value is DeliveryMethod {
  return DELIVERY_METHODS.some((method) => method === value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
