import { fileURLToPath } from 'url';
import { workflowEnv } from '../config/env';
import { describeError } from '../lib/errors';
import { totalDays } from '../lib/types';
import { createTranslationWorkflow, type TranslationWorkflow } from '../lib/workflow';
import { DEMO_TEXTS_DIR, seedDemo } from './seed-demo';

export interface ParsedArgs {
  command: string | undefined;
  positionals: string[];
  options: Record<string, string[]>;
}

export interface CliOutput {
  info(message: string): void;
  error(message: string): void;
}

const USAGE = `Usage: daily-translation <command> [arguments]

Commands:
  register-text <file> <title> [--id ID] [--author NAME] [--language CODE]
                [--target-language CODE] [--sentences-per-day N]
  register-user <name> [--id ID] [--email ADDRESS] [--phone NUMBER]
                [--preferred-method email|sms]
  assign-text <userId> <textId>
  send-daily [--users ID...]
  process-reply <sender> <subject> <body>
  generate <textId> [--format txt|json]
  status <textId>
  demo`;

/**
 * Splits argv into a command, positional arguments and `--name value...` options.
 * An option collects every following value up to the next option.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const [command, ...rest] = argv;
  const positionals: string[] = [];
  const options: Record<string, string[]> = {};
  let current: string[] | null = null;

  for (const arg of rest) {
    if (arg.startsWith('--')) {
      current = [];
      options[arg.slice(2)] = current;
    } else if (current) {
      current.push(arg);
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, options };
}

const option = (args: ParsedArgs, name: string): string | undefined => args.options[name]?.[0];

function requirePositionals(args: ParsedArgs, names: string[]): string[] {
  if (args.positionals.length < names.length) {
    throw new Error(`${args.command} expects: ${names.map((name) => `<${name}>`).join(' ')}`);
  }
  return args.positionals.slice(0, names.length);
}

function intOption(args: ParsedArgs, name: string): number | undefined {
  const value = option(args, name);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`--${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

export async function runCli(
  argv: readonly string[],
  workflow: TranslationWorkflow,
  out: CliOutput = console
): Promise<number> {
  const args = parseArgs(argv);

  try {
    switch (args.command) {
      case 'register-text': {
        const [filePath, title] = requirePositionals(args, ['file', 'title']);
        const text = await workflow.registerText({
          filePath,
          title,
          id: option(args, 'id'),
          author: option(args, 'author'),
          sourceLanguage: option(args, 'language'),
          targetLanguage: option(args, 'target-language'),
          sentencesPerDay: intOption(args, 'sentences-per-day'),
        });
        out.info(`Registered text: ${text.title} (ID: ${text.id})`);
        out.info(`Total sentences: ${text.sentences.length}`);
        return 0;
      }
      case 'register-user': {
        const [name] = requirePositionals(args, ['name']);
        const user = workflow.registerUser({
          name,
          id: option(args, 'id'),
          email: option(args, 'email'),
          phone: option(args, 'phone'),
          preferredMethod: option(args, 'preferred-method'),
        });
        out.info(`Registered user: ${user.name} (ID: ${user.id})`);
        return 0;
      }
      case 'assign-text': {
        const [userId, textId] = requirePositionals(args, ['userId', 'textId']);
        await workflow.assignText(userId, textId);
        const text = workflow.catalog.getState().get(textId);
        out.info(`Assigned text '${text.title}' to user '${workflow.progress.getState().getUser(userId).name}'`);
        out.info(
          `The text has ${text.sentences.length} sentences, which will take approximately ` +
            `${totalDays(text)} days to translate at ${text.sentencesPerDay} sentences per day.`
        );
        return 0;
      }
      case 'send-daily': {
        const userIds = args.options.users?.length ? args.options.users : undefined;
        const reports = await workflow.sendDailyPortions(userIds);
        for (const message of workflow.outbox.messages) {
          out.info(`${message.method} to ${message.recipient}${message.subject ? ` (${message.subject})` : ''}:`);
          out.info(message.body);
        }
        workflow.outbox.clear();
        for (const report of reports) {
          const target = `${report.userId}/${report.textId ?? '-'}`;
          if (report.status === 'failed') {
            out.error(`Failed ${target}: ${report.error ?? 'unknown error'}`);
          } else {
            out.info(`${report.status === 'sent' ? 'Sent' : 'Complete'} ${target} ${report.sentenceIndices.length} sentences`);
          }
        }
        return reports.some((report) => report.status === 'failed') ? 1 : 0;
      }
      case 'process-reply': {
        const [sender, subject, body] = requirePositionals(args, ['sender', 'subject', 'body']);
        const report = await workflow.processReply({ sender, subject, body });
        if (report.status === 'saved') {
          out.info(`Saved ${report.count} translations for ${report.textId}`);
          return 0;
        }
        out.error(`Reply not saved: ${report.status}`);
        return 1;
      }
      case 'generate': {
        const [textId] = requirePositionals(args, ['textId']);
        const { path, status } = await workflow.generateTranslationFile(textId, option(args, 'format') ?? 'txt');
        out.info(`Generated translation file for '${status.title}'`);
        out.info(
          `Completion: ${status.completionPercentage.toFixed(1)}% (${status.translatedCount}/${status.totalSentences} sentences)`
        );
        out.info(`Output file: ${path}`);
        return 0;
      }
      case 'status': {
        const [textId] = requirePositionals(args, ['textId']);
        const status = workflow.status(textId);
        out.info(
          `${status.title}: ${status.completionPercentage.toFixed(1)}% ` +
            `(${status.translatedCount}/${status.totalSentences} sentences, ${status.remainingCount} remaining)`
        );
        return 0;
      }
      case 'demo': {
        const { path, status } = await seedDemo(workflow);
        out.info(`Demo completed: ${status.translatedCount}/${status.totalSentences} sentences translated`);
        out.info(`Output file: ${path}`);
        return 0;
      }
      default:
        out.error(USAGE);
        return args.command === undefined || args.command === 'help' ? 0 : 1;
    }
  } catch (error) {
    out.error(`Error: ${describeError(error)}`);
    return 1;
  }
}

const isMain = process.argv[1] !== undefined && fileURLToPath(import.meta.url) === process.argv[1];

if (isMain) {
  const argv = process.argv.slice(2);
  const workflow = createTranslationWorkflow({
    stateDir: workflowEnv.stateDir,
    textsDir: argv[0] === 'demo' ? DEMO_TEXTS_DIR : workflowEnv.textsDir,
  });
  runCli(argv, workflow)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('[cli] unexpected failure', error);
      process.exitCode = 1;
    });
}
