import path from "path";

export interface WorkflowEnvConfig {
  textsDir: string;
  outputDir: string;
  stateDir: string;
  logDir: string;
  defaultSentencesPerDay: number;
  email: {
    from: string;
    replyTo: string;
  };
  sms: {
    fromNumber: string;
  };
}

const intFromEnv = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const dataDir = (env: NodeJS.ProcessEnv): string =>
  env.TRANSLATION_DATA_DIR ?? path.join(process.cwd(), "data");

export const readWorkflowEnv = (env: NodeJS.ProcessEnv = process.env): WorkflowEnvConfig => ({
  textsDir: env.TRANSLATION_TEXTS_DIR ?? path.join(dataDir(env), "texts"),
  outputDir: env.TRANSLATION_OUTPUT_DIR ?? path.join(dataDir(env), "translated"),
  stateDir: env.TRANSLATION_STATE_DIR ?? path.join(process.cwd(), ".state"),
  logDir: env.SERVER_LOG_DIR ?? path.join(process.cwd(), ".logs"),
  defaultSentencesPerDay: intFromEnv(env.TRANSLATION_SENTENCES_PER_DAY, 3),
  email: {
    from: env.EMAIL_FROM ?? "translation_service@example.com",
    replyTo: env.TRANSLATION_REPLY_TO_EMAIL ?? "translations@example.com",
  },
  sms: {
    fromNumber: env.SMS_FROM_NUMBER ?? "",
  },
});

export const workflowEnv: WorkflowEnvConfig = readWorkflowEnv();
