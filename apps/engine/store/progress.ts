import { createStore, type StoreApi } from 'zustand/vanilla';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';
import {
  AlreadyAssignedError,
  DuplicateIdError,
  InvalidUserContactError,
  NotAssignedError,
  ProgressRegressionError,
  UnknownUserError,
  UnsupportedDeliveryMethodError,
} from '../lib/errors';
import { createMemoryStateStorage } from '../lib/storage';
import { isDeliveryMethod } from '../lib/types';
import type { DeliveryMethod, TranslationMap, TranslationProgress, User } from '../lib/types';

export interface RegisterUserInput {
  id: string;
  name: string;
  email?: string;
  phone?: string;
  preferredMethod: DeliveryMethod | string;
}

type ProgressByUser = Record<string, TranslationProgress[]>;

export interface ProgressState {
  /** Registration order; this order decides merge collisions. */
  users: User[];
  progress: ProgressByUser;
  registerUser(input: RegisterUserInput): User;
  getUser(userId: string): User;
  listUsers(): User[];
  findUserByContact(contact: string): User | undefined;
  assign(userId: string, textId: string, totalSentences: number): TranslationProgress;
  advance(userId: string, textId: string, newPosition: number, sentAt: number): TranslationProgress;
  recordTranslation(userId: string, textId: string, sentenceIndex: number, text: string): void;
  get(userId: string, textId: string): TranslationProgress;
  listProgress(userId: string): TranslationProgress[];
  mergedTranslationsFor(textId: string): TranslationMap;
  isComplete(userId: string, textId: string): boolean;
}

export type ProgressStore = StoreApi<ProgressState>;

export interface ProgressStoreOptions {
  storage?: StateStorage;
  now?: () => number;
}

function validateContact(input: RegisterUserInput): DeliveryMethod {
  const method = input.preferredMethod;
  if (!isDeliveryMethod(method)) {
    throw new UnsupportedDeliveryMethodError(method);
  }
  if (method === 'email' && !input.email) {
    throw new InvalidUserContactError('Email address is required for email delivery');
  }
  if (method === 'sms' && !input.phone) {
    throw new InvalidUserContactError('Phone number is required for SMS delivery');
  }
  return method;
}

function recordsOf(progress: ProgressByUser, userId: string): TranslationProgress[] {
  const records = progress[userId];
  if (!records) {
    throw new UnknownUserError(userId);
  }
  return records;
}

function replaceRecord(
  progress: ProgressByUser,
  userId: string,
  textId: string,
  update: (record: TranslationProgress) => TranslationProgress
): ProgressByUser {
  const records = recordsOf(progress, userId);
  const index = records.findIndex((record) => record.textId === textId);
  if (index === -1) {
    throw new NotAssignedError(userId, textId);
  }
  const next = [...records];
  next[index] = update(records[index]);
  return { ...progress, [userId]: next };
}

export const createProgressStore = (options: ProgressStoreOptions = {}): ProgressStore => {
  const { storage = createMemoryStateStorage(), now = Date.now } = options;

  // Merges are derived from the per-user records and reused until those records change.
  let mergeCache: { source: ProgressByUser; merged: Map<string, TranslationMap> } | null = null;

  return createStore<ProgressState>()(
    persist(
      (set, get) => ({
        users: [],
        progress: {},
        registerUser(input) {
          const preferredMethod = validateContact(input);
          if (get().users.some((user) => user.id === input.id)) {
            throw new DuplicateIdError('user', input.id);
          }
          const user: User = {
            id: input.id,
            name: input.name,
            email: input.email || undefined,
            phone: input.phone || undefined,
            preferredMethod,
            createdAt: now(),
          };
          set((state) => ({
            users: [...state.users, user],
            progress: { ...state.progress, [user.id]: [] },
          }));
          return user;
        },
        getUser(userId) {
          const user = get().users.find((entry) => entry.id === userId);
          if (!user) {
            throw new UnknownUserError(userId);
          }
          return user;
        },
        listUsers() {
          return get().users;
        },
        findUserByContact(contact) {
          if (!contact) {
            return undefined;
          }
          return get().users.find((user) => user.email === contact || user.phone === contact);
        },
        assign(userId, textId, totalSentences) {
          const record: TranslationProgress = {
            userId,
            textId,
            totalSentences,
            currentPosition: 0,
            translations: {},
          };
          set((state) => {
            const records = recordsOf(state.progress, userId);
            if (records.some((existing) => existing.textId === textId)) {
              throw new AlreadyAssignedError(userId, textId);
            }
            return { progress: { ...state.progress, [userId]: [...records, record] } };
          });
          return record;
        },
        advance(userId, textId, newPosition, sentAt) {
          set((state) => ({
            progress: replaceRecord(state.progress, userId, textId, (record) => {
              if (newPosition < record.currentPosition) {
                throw new ProgressRegressionError(userId, textId, record.currentPosition, newPosition);
              }
              return { ...record, currentPosition: newPosition, lastSentAt: sentAt };
            }),
          }));
          return get().get(userId, textId);
        },
        recordTranslation(userId, textId, sentenceIndex, text) {
          set((state) => ({
            progress: replaceRecord(state.progress, userId, textId, (record) => ({
              ...record,
              translations: { ...record.translations, [sentenceIndex]: text },
            })),
          }));
        },
        get(userId, textId) {
          const record = recordsOf(get().progress, userId).find((entry) => entry.textId === textId);
          if (!record) {
            throw new NotAssignedError(userId, textId);
          }
          return record;
        },
        listProgress(userId) {
          return recordsOf(get().progress, userId);
        },
        mergedTranslationsFor(textId) {
          const { users, progress } = get();
          let cache = mergeCache;
          if (!cache || cache.source !== progress) {
            cache = { source: progress, merged: new Map() };
            mergeCache = cache;
          }
          let merged = cache.merged.get(textId);
          if (!merged) {
            merged = {};
            // Later-registered users overwrite earlier ones on the same sentence.
            for (const user of users) {
              for (const record of progress[user.id] ?? []) {
                if (record.textId === textId) {
                  Object.assign(merged, record.translations);
                }
              }
            }
            cache.merged.set(textId, merged);
          }
          return { ...merged };
        },
        isComplete(userId, textId) {
          const record = get().get(userId, textId);
          for (let index = 0; index < record.currentPosition; index += 1) {
            if (!Object.hasOwn(record.translations, index)) {
              return false;
            }
          }
          return true;
        },
      }),
      {
        name: 'translation-progress',
        version: 1,
        storage: createJSONStorage(() => storage),
        partialize: (state) => ({ users: state.users, progress: state.progress }),
      }
    )
  );
};
