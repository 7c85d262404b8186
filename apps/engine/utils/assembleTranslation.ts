import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { workflowEnv } from "../config/env";
import { UnsupportedFormatError } from "../lib/errors";
import { isOutputFormat } from "../lib/types";
import type { OutputFormat, TextSource, TranslationMap, TranslationStatus } from "../lib/types";

export const UNTRANSLATED_PLACEHOLDER = "[UNTRANSLATED]";

export interface AssembleOptions {
  outputDir?: string;
}

export interface StructuredTranslation {
  title: string;
  author: string | null;
  source_language: string;
  target_language: string;
  sentences: Array<{ index: number; original: string; translation: string }>;
}

const hasTranslation = (translations: TranslationMap, index: number): boolean =>
  Object.hasOwn(translations, index);

const endsSentence = (original: string): boolean => /[.!?]$/.test(original);

/**
 * Translations in source order. Gaps keep the original wrapped in an UNTRANSLATED tag,
 * and line breaks follow the original's sentence-final punctuation.
 */
export const renderPlainText = (text: TextSource, translations: TranslationMap): string =>
  text.sentences
    .map((original, index) => {
      const content = hasTranslation(translations, index)
        ? translations[index]
        : `[UNTRANSLATED: ${original}]`;
      return content + (endsSentence(original) ? "\n" : " ");
    })
    .join("");

export const buildStructuredTranslation = (
  text: TextSource,
  translations: TranslationMap
): StructuredTranslation => ({
  title: text.title,
  author: text.author ?? null,
  source_language: text.sourceLanguage,
  target_language: text.targetLanguage,
  sentences: text.sentences.map((original, index) => ({
    index,
    original,
    translation: hasTranslation(translations, index) ? translations[index] : UNTRANSLATED_PLACEHOLDER,
  })),
});

export const renderStructured = (text: TextSource, translations: TranslationMap): string =>
  JSON.stringify(buildStructuredTranslation(text, translations), null, 2);

export const outputFileName = (text: TextSource, format: OutputFormat): string =>
  `${path.parse(text.filePath).name}_${text.targetLanguage}.${format}`;

const renderers: Record<OutputFormat, (text: TextSource, translations: TranslationMap) => string> = {
  txt: renderPlainText,
  json: renderStructured,
};

/**
 * Writes the merged translation of a text and returns the path of the file written.
 */
export const assembleTranslation = async (
  text: TextSource,
  translations: TranslationMap,
  format: OutputFormat | string = "txt",
  options: AssembleOptions = {}
): Promise<string> => {
  if (!isOutputFormat(format)) {
    throw new UnsupportedFormatError(format);
  }
  const outputDir = options.outputDir ?? workflowEnv.outputDir;
  await mkdir(outputDir, { recursive: true });
  const outputPath = path.join(outputDir, outputFileName(text, format));
  await writeFile(outputPath, renderers[format](text, translations), "utf8");
  return outputPath;
};

/**
 * Completion figures for a text. Only indices that exist in the text are counted.
 */
export const translationStatus = (text: TextSource, translations: TranslationMap): TranslationStatus => {
  const totalSentences = text.sentences.length;
  const translatedCount = Object.keys(translations)
    .map(Number)
    .filter((index) => Number.isInteger(index) && index >= 0 && index < totalSentences).length;

  return {
    title: text.title,
    totalSentences,
    translatedCount,
    completionPercentage: totalSentences > 0 ? (translatedCount * 100) / totalSentences : 0,
    remainingCount: totalSentences - translatedCount,
  };
};
