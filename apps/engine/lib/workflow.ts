import { workflowEnv } from '../config/env';
import { createDeliveryChannels, createOutboundTransport } from '../providers/delivery';
import { createOutbox, type Outbox } from '../providers/delivery/outbox';
import type { MessageSink, OutboundTransport } from '../providers/delivery/types';
import { createTextCatalog, type TextCatalog } from '../store/catalog';
import { createProgressStore, type ProgressStore } from '../store/progress';
import { assembleTranslation, translationStatus } from '../utils/assembleTranslation';
import { dispatchDailyPortions, type DispatchReport } from '../utils/dispatchDailyPortions';
import { routeReply, type InboundReply, type RouteReport } from '../utils/routeReply';
import { createId } from './id';
import { logServerEvent, type EventLogger } from './logging/server';
import { createFileStateStorage, createMemoryStateStorage } from './storage';
import { totalDays } from './types';
import type { DeliveryMethod, OutputFormat, TextSource, TranslationProgress, TranslationStatus, User } from './types';

export interface TranslationWorkflowOptions {
  textsDir?: string;
  outputDir?: string;
  /** Persist catalog and progress here; state is kept in memory when omitted. */
  stateDir?: string;
  defaultSentencesPerDay?: number;
  logger?: EventLogger;
  /** Replaces the in-process outbox behind the email and SMS channels. */
  sink?: MessageSink;
  /** Replaces the channels altogether. */
  transport?: OutboundTransport;
  now?: () => number;
}

export interface RegisterTextParams {
  filePath: string;
  title: string;
  id?: string;
  author?: string;
  sourceLanguage?: string;
  targetLanguage?: string;
  sentencesPerDay?: number;
}

export interface RegisterUserParams {
  name: string;
  id?: string;
  email?: string;
  phone?: string;
  preferredMethod?: DeliveryMethod | string;
}

export interface GeneratedTranslation {
  path: string;
  status: TranslationStatus;
}

export interface TranslationWorkflow {
  catalog: TextCatalog;
  progress: ProgressStore;
  outbox: Outbox;
  registerText(params: RegisterTextParams): Promise<TextSource>;
  registerUser(params: RegisterUserParams): User;
  assignText(userId: string, textId: string): Promise<TranslationProgress>;
  sendDailyPortions(userIds?: readonly string[]): Promise<DispatchReport[]>;
  processReply(reply: InboundReply): Promise<RouteReport>;
  generateTranslationFile(textId: string, format?: OutputFormat | string): Promise<GeneratedTranslation>;
  status(textId: string): TranslationStatus;
}

// Without an explicit choice, whichever single contact was given decides the channel.
function inferDeliveryMethod(params: RegisterUserParams): DeliveryMethod | string {
  if (params.preferredMethod) {
    return params.preferredMethod;
  }
  if (params.phone && !params.email) {
    return 'sms';
  }
  return 'email';
}

export function createTranslationWorkflow(options: TranslationWorkflowOptions = {}): TranslationWorkflow {
  const {
    textsDir = workflowEnv.textsDir,
    outputDir = workflowEnv.outputDir,
    defaultSentencesPerDay = workflowEnv.defaultSentencesPerDay,
    logger = logServerEvent,
    now = Date.now,
  } = options;

  const storage = options.stateDir ? createFileStateStorage(options.stateDir) : createMemoryStateStorage();
  const catalog = createTextCatalog({ textsDir, defaultSentencesPerDay, storage, now });
  const progress = createProgressStore({ storage, now });
  const outbox = createOutbox(logger);
  const transport =
    options.transport ?? createOutboundTransport(createDeliveryChannels(options.sink ?? outbox, { now }));

  return {
    catalog,
    progress,
    outbox,
    async registerText(params) {
      const text = await catalog.getState().register({
        id: params.id ?? createId(params.title, 'text'),
        title: params.title,
        filePath: params.filePath,
        author: params.author,
        sourceLanguage: params.sourceLanguage ?? 'en',
        targetLanguage: params.targetLanguage ?? 'es',
        sentencesPerDay: params.sentencesPerDay,
      });
      await logger({
        level: 'info',
        category: 'workflow:text',
        message: `registered text '${text.title}'`,
        details: { textId: text.id, sentences: text.sentences.length },
      });
      return text;
    },
    registerUser(params) {
      return progress.getState().registerUser({
        id: params.id ?? createId(params.name, 'user'),
        name: params.name,
        email: params.email,
        phone: params.phone,
        preferredMethod: inferDeliveryMethod(params),
      });
    },
    async assignText(userId, textId) {
      const text = catalog.getState().get(textId);
      const record = progress.getState().assign(userId, textId, text.sentences.length);
      await logger({
        level: 'info',
        category: 'workflow:assign',
        message: `assigned '${text.title}' to ${progress.getState().getUser(userId).name}`,
        details: { userId, textId, sentences: text.sentences.length, days: totalDays(text) },
      });
      return record;
    },
    sendDailyPortions(userIds) {
      return dispatchDailyPortions({ catalog, progress, transport, userIds, now, logger });
    },
    processReply(reply) {
      return routeReply({ catalog, progress, logger }, reply);
    },
    async generateTranslationFile(textId, format = 'txt') {
      const text = catalog.getState().get(textId);
      const translations = progress.getState().mergedTranslationsFor(textId);
      const path = await assembleTranslation(text, translations, format, { outputDir });
      const status = translationStatus(text, translations);
      await logger({
        level: 'info',
        category: 'workflow:assemble',
        message: `generated translation file for '${text.title}'`,
        details: { path, status },
      });
      return { path, status };
    },
    status(textId) {
      const text = catalog.getState().get(textId);
      return translationStatus(text, progress.getState().mergedTranslationsFor(textId));
    },
  };
}
