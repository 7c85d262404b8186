import { readFile } from 'fs/promises';
import path from 'path';
import { createStore, type StoreApi } from 'zustand/vanilla';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';
import { workflowEnv } from '../config/env';
import { DuplicateIdError, NotFoundError, SourceNotFoundError } from '../lib/errors';
import { createMemoryStateStorage } from '../lib/storage';
import type { TextSource } from '../lib/types';
import { splitIntoSentences } from '../workers/sentence-segmentation';

export interface RegisterTextInput {
  id: string;
  title: string;
  sourceLanguage: string;
  targetLanguage: string;
  filePath: string;
  author?: string;
  sentencesPerDay?: number;
}

export interface TextCatalogState {
  /** Registration order. */
  texts: TextSource[];
  register(input: RegisterTextInput): Promise<TextSource>;
  get(id: string): TextSource;
  findByTitle(title: string): TextSource | undefined;
  list(): TextSource[];
  dailyPortion(id: string, startPosition: number): string[];
}

export type TextCatalog = StoreApi<TextCatalogState>;

export interface TextCatalogOptions {
  textsDir?: string;
  defaultSentencesPerDay?: number;
  storage?: StateStorage;
  now?: () => number;
}

function assertPositiveInteger(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${label} must be a positive integer, got ${value}`);
  }
}

export const createTextCatalog = (options: TextCatalogOptions = {}): TextCatalog => {
  const {
    textsDir = workflowEnv.textsDir,
    defaultSentencesPerDay = workflowEnv.defaultSentencesPerDay,
    storage = createMemoryStateStorage(),
    now = Date.now,
  } = options;

  return createStore<TextCatalogState>()(
    persist(
      (set, get) => ({
        texts: [],
        async register(input) {
          const sentencesPerDay = input.sentencesPerDay ?? defaultSentencesPerDay;
          assertPositiveInteger(sentencesPerDay, 'sentencesPerDay');
          if (get().texts.some((text) => text.id === input.id)) {
            throw new DuplicateIdError('text', input.id);
          }

          const fullPath = path.resolve(textsDir, input.filePath);
          let raw: string;
          try {
            raw = await readFile(fullPath, 'utf8');
          } catch (error) {
            throw new SourceNotFoundError(fullPath, error);
          }

          const text: TextSource = {
            id: input.id,
            title: input.title,
            author: input.author,
            filePath: input.filePath,
            sourceLanguage: input.sourceLanguage,
            targetLanguage: input.targetLanguage,
            sentencesPerDay,
            sentences: splitIntoSentences(raw, input.sourceLanguage),
            createdAt: now(),
          };

          set((state) => {
            // Another registration may have finished while the file was being read.
            if (state.texts.some((existing) => existing.id === text.id)) {
              throw new DuplicateIdError('text', text.id);
            }
            return { texts: [...state.texts, text] };
          });
          return text;
        },
        get(id) {
          const text = get().texts.find((entry) => entry.id === id);
          if (!text) {
            throw new NotFoundError(id);
          }
          return text;
        },
        findByTitle(title) {
          return get().texts.find((entry) => entry.title === title);
        },
        list() {
          return get().texts;
        },
        dailyPortion(id, startPosition) {
          if (!Number.isInteger(startPosition) || startPosition < 0) {
            throw new RangeError(`startPosition must be a non-negative integer, got ${startPosition}`);
          }
          const text = get().get(id);
          const end = Math.min(startPosition + text.sentencesPerDay, text.sentences.length);
          return text.sentences.slice(startPosition, end);
        },
      }),
      {
        name: 'text-catalog',
        version: 1,
        storage: createJSONStorage(() => storage),
        partialize: (state) => ({ texts: state.texts }),
      }
    )
  );
};
