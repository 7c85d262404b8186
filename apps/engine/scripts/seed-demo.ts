import { fileURLToPath } from 'url';
import { createTranslationWorkflow, type TranslationWorkflow } from '../lib/workflow';
import type { GeneratedTranslation } from '../lib/workflow';

export const DEMO_TEXTS_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

const DEMO_REPLY = `
[1] El farero subía las escaleras cada tarde al anochecer.
[2] Las contaba en voz alta, aunque conocía el número desde hacía años.
`;

/**
 * Walks one text through the whole workflow: register, assign, send one portion,
 * answer it, and write the partial translation.
 */
export async function seedDemo(workflow: TranslationWorkflow): Promise<GeneratedTranslation> {
  const text = await workflow.registerText({
    filePath: 'example.txt',
    title: 'The Lighthouse Keeper',
    author: 'Demo Author',
    sourceLanguage: 'en',
    targetLanguage: 'es',
    sentencesPerDay: 2,
  });
  const user = workflow.registerUser({
    name: 'Demo Translator',
    email: 'translator@example.com',
    preferredMethod: 'email',
  });

  await workflow.assignText(user.id, text.id);
  await workflow.sendDailyPortions([user.id]);
  await workflow.processReply({
    sender: 'translator@example.com',
    subject: `Daily Translation: ${text.title}`,
    body: DEMO_REPLY,
  });
  return workflow.generateTranslationFile(text.id, 'txt');
}

const isMain = process.argv[1] !== undefined && fileURLToPath(import.meta.url) === process.argv[1];

if (isMain) {
  seedDemo(createTranslationWorkflow({ textsDir: DEMO_TEXTS_DIR }))
    .then(({ path, status }) => {
      console.info(`Completion: ${status.completionPercentage.toFixed(1)}% (${status.translatedCount}/${status.totalSentences} sentences)`);
      console.info(`Output file: ${path}`);
    })
    .catch((error: unknown) => {
      console.error('[seed-demo] failed', error);
      process.exitCode = 1;
    });
}
