import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MessageSink, OutboundMessage, OutboundTransport } from '../../providers/delivery/types';
import { createTranslationWorkflow, type TranslationWorkflowOptions } from '../workflow';

describe('translation workflow', () => {
  let root: string;
  const logger = vi.fn(async () => {});

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'workflow-'));
    await writeFile(path.join(root, 'five.txt'), 'One. Two. Three. Four. Five.', 'utf8');
    logger.mockClear();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const build = (overrides: TranslationWorkflowOptions = {}) =>
    createTranslationWorkflow({
      textsDir: root,
      outputDir: path.join(root, 'translated'),
      logger,
      now: () => 1000,
      ...overrides,
    });

  it('runs a text from registration to a partial translation file', async () => {
    const workflow = build();
    const text = await workflow.registerText({ id: 'five', filePath: 'five.txt', title: 'Five', sentencesPerDay: 2 });
    const user = workflow.registerUser({ name: 'Ana', email: 'ana@example.com' });
    await workflow.assignText(user.id, text.id);

    const reports = await workflow.sendDailyPortions();
    expect(reports).toEqual([{ userId: user.id, textId: 'five', status: 'sent', sentenceIndices: [0, 1] }]);
    expect(workflow.progress.getState().get(user.id, 'five').currentPosition).toBe(2);
    expect(workflow.outbox.messages).toHaveLength(1);
    expect(workflow.outbox.messages[0]).toMatchObject({
      method: 'email',
      recipient: 'ana@example.com',
      subject: 'Daily Translation: Five',
    });

    const routed = await workflow.processReply({
      sender: 'ana@example.com',
      subject: 'Re: Daily Translation: Five',
      body: '[1] A\n[2] B',
    });
    expect(routed).toMatchObject({ status: 'saved', sentenceIndices: [0, 1] });
    expect(workflow.progress.getState().get(user.id, 'five').translations).toEqual({ 0: 'A', 1: 'B' });

    expect(workflow.status('five')).toEqual({
      title: 'Five',
      totalSentences: 5,
      translatedCount: 2,
      completionPercentage: 40,
      remainingCount: 3,
    });

    const generated = await workflow.generateTranslationFile('five');
    expect(generated.path).toBe(path.join(root, 'translated', 'five_es.txt'));
    expect(await readFile(generated.path, 'utf8')).toBe(
      'A\nB\n[UNTRANSLATED: Three.]\n[UNTRANSLATED: Four.]\n[UNTRANSLATED: Five.]\n'
    );
  });

  it('derives ids from names and defaults the language pair', async () => {
    const workflow = build();
    const text = await workflow.registerText({ filePath: 'five.txt', title: 'Five Little Lines' });
    expect(text.id).toMatch(/^five_little_lines_[0-9a-z]{8}$/);
    expect(text.sourceLanguage).toBe('en');
    expect(text.targetLanguage).toBe('es');

    const user = workflow.registerUser({ name: 'Ana María', email: 'ana@example.com' });
    expect(user.id).toMatch(/^ana_maría_[0-9a-z]{8}$/);
  });

  it('picks SMS for users who only give a phone number', () => {
    const workflow = build();
    expect(workflow.registerUser({ name: 'Ben', phone: '+15550100' }).preferredMethod).toBe('sms');
    expect(
      workflow.registerUser({ name: 'Cy', email: 'cy@example.com', phone: '+15550101' }).preferredMethod
    ).toBe('email');
  });

  it('delivers through an injected sink', async () => {
    const delivered: OutboundMessage[] = [];
    const sink: MessageSink = {
      deliver: async (message) => {
        delivered.push(message);
        return true;
      },
    };
    const workflow = build({ sink });
    await workflow.registerText({ id: 'five', filePath: 'five.txt', title: 'Five', sentencesPerDay: 3 });
    const user = workflow.registerUser({ id: 'ben', name: 'Ben', phone: '+15550100' });
    await workflow.assignText(user.id, 'five');

    await workflow.sendDailyPortions();
    expect(delivered.map((message) => message.body)).toEqual([
      'Translation: Five (sentences 1-3)\n\n1. One.\n2. Two.\n3. Three.',
    ]);
    expect(workflow.outbox.messages).toEqual([]);
  });

  it('delivers through an injected transport', async () => {
    const transport = vi.fn<Parameters<OutboundTransport>, Promise<boolean>>(async () => true);
    const workflow = build({ transport });
    await workflow.registerText({ id: 'five', filePath: 'five.txt', title: 'Five', sentencesPerDay: 5 });
    workflow.registerUser({ id: 'ana', name: 'Ana', email: 'ana@example.com' });
    await workflow.assignText('ana', 'five');

    await workflow.sendDailyPortions(['ana']);
    expect(transport).toHaveBeenCalledWith(
      expect.objectContaining({ id: 'ana' }),
      'Five',
      ['One.', 'Two.', 'Three.', 'Four.', 'Five.'],
      [0, 1, 2, 3, 4]
    );
  });

  it('logs assignments with the expected number of days', async () => {
    const workflow = build();
    await workflow.registerText({ id: 'five', filePath: 'five.txt', title: 'Five', sentencesPerDay: 2 });
    workflow.registerUser({ id: 'ana', name: 'Ana', email: 'ana@example.com' });
    await workflow.assignText('ana', 'five');

    expect(logger).toHaveBeenCalledWith({
      level: 'info',
      category: 'workflow:assign',
      message: "assigned 'Five' to Ana",
      details: { userId: 'ana', textId: 'five', sentences: 5, days: 3 },
    });
  });

  it('picks up where it left off when state is persisted', async () => {
    const stateDir = path.join(root, 'state');
    const first = build({ stateDir });
    await first.registerText({ id: 'five', filePath: 'five.txt', title: 'Five', sentencesPerDay: 2 });
    first.registerUser({ id: 'ana', name: 'Ana', email: 'ana@example.com' });
    await first.assignText('ana', 'five');
    await first.sendDailyPortions();
    await first.processReply({ sender: 'ana@example.com', subject: 'Daily Translation: Five', body: '[1] A' });

    const second = build({ stateDir });
    expect(second.status('five').translatedCount).toBe(1);
    const reports = await second.sendDailyPortions();
    expect(reports).toEqual([{ userId: 'ana', textId: 'five', status: 'sent', sentenceIndices: [2, 3] }]);
  });
});
