import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DuplicateIdError, NotFoundError, ResourceUnavailableError, SourceNotFoundError } from '../../lib/errors';
import { createFileStateStorage } from '../../lib/storage';
import { totalDays } from '../../lib/types';
import { createTextCatalog, type TextCatalog } from '../catalog';

const FIVE_SENTENCES = 'One is first. Two follows.\nThree is here! Four asks why? Five ends it.';

describe('text catalog', () => {
  let textsDir: string;
  let catalog: TextCatalog;

  beforeEach(async () => {
    textsDir = await mkdtemp(path.join(os.tmpdir(), 'catalog-'));
    await writeFile(path.join(textsDir, 'five.txt'), FIVE_SENTENCES, 'utf8');
    catalog = createTextCatalog({ textsDir, defaultSentencesPerDay: 3, now: () => 1000 });
  });

  afterEach(async () => {
    await rm(textsDir, { recursive: true, force: true });
  });

  const registerFive = (sentencesPerDay?: number) =>
    catalog.getState().register({
      id: 'five',
      title: 'Five Sentences',
      sourceLanguage: 'en',
      targetLanguage: 'es',
      filePath: 'five.txt',
      sentencesPerDay,
    });

  it('segments the file on registration', async () => {
    const text = await registerFive(2);
    expect(text.sentences).toEqual([
      'One is first.',
      'Two follows.',
      'Three is here!',
      'Four asks why?',
      'Five ends it.',
    ]);
    expect(text.createdAt).toBe(1000);
    expect(catalog.getState().get('five')).toBe(text);
    expect(catalog.getState().list()).toEqual([text]);
  });

  it('falls back to the configured sentences per day', async () => {
    const text = await registerFive();
    expect(text.sentencesPerDay).toBe(3);
    expect(totalDays(text)).toBe(2);
  });

  it('rejects a duplicate id', async () => {
    await registerFive();
    await expect(registerFive()).rejects.toBeInstanceOf(DuplicateIdError);
  });

  it('rejects a missing source file', async () => {
    await expect(
      catalog.getState().register({
        id: 'missing',
        title: 'Missing',
        sourceLanguage: 'en',
        targetLanguage: 'es',
        filePath: 'missing.txt',
      })
    ).rejects.toBeInstanceOf(SourceNotFoundError);
    expect(catalog.getState().list()).toEqual([]);
  });

  it('rejects a source language without tokenizer resources', async () => {
    await expect(
      catalog.getState().register({
        id: 'five',
        title: 'Five',
        sourceLanguage: 'tlh',
        targetLanguage: 'en',
        filePath: 'five.txt',
      })
    ).rejects.toBeInstanceOf(ResourceUnavailableError);
  });

  it('rejects a non-positive portion size', async () => {
    await expect(registerFive(0)).rejects.toBeInstanceOf(RangeError);
  });

  it('throws NotFoundError for unknown ids', () => {
    expect(() => catalog.getState().get('nope')).toThrow(NotFoundError);
    expect(() => catalog.getState().dailyPortion('nope', 0)).toThrow(NotFoundError);
  });

  it('finds texts by title', async () => {
    const text = await registerFive();
    expect(catalog.getState().findByTitle('Five Sentences')).toBe(text);
    expect(catalog.getState().findByTitle('Other')).toBeUndefined();
  });

  it('slices daily portions and ends with an empty one', async () => {
    await registerFive(2);
    const { dailyPortion } = catalog.getState();
    expect(dailyPortion('five', 0)).toEqual(['One is first.', 'Two follows.']);
    expect(dailyPortion('five', 4)).toEqual(['Five ends it.']);
    expect(dailyPortion('five', 5)).toEqual([]);
    expect(dailyPortion('five', 9)).toEqual([]);
    expect(() => dailyPortion('five', -1)).toThrow(RangeError);
  });

  it('covers every sentence exactly once when walking the portions', async () => {
    for (const perDay of [1, 2, 3, 5, 7]) {
      const local = createTextCatalog({ textsDir });
      const text = await local.getState().register({
        id: `walk-${perDay}`,
        title: 'Walk',
        sourceLanguage: 'en',
        targetLanguage: 'es',
        filePath: 'five.txt',
        sentencesPerDay: perDay,
      });

      const seen: string[] = [];
      let position = 0;
      let days = 0;
      for (;;) {
        const portion = local.getState().dailyPortion(text.id, position);
        if (!portion.length) {
          break;
        }
        seen.push(...portion);
        position += portion.length;
        days += 1;
      }

      expect(seen).toEqual(text.sentences);
      expect(days).toBe(totalDays(text));
      expect(perDay * (days - 1)).toBeLessThan(text.sentences.length);
      expect(text.sentences.length).toBeLessThanOrEqual(perDay * days);
    }
  });

  it('restores registered texts from file storage', async () => {
    const stateDir = path.join(textsDir, 'state');
    const first = createTextCatalog({ textsDir, storage: createFileStateStorage(stateDir) });
    await first.getState().register({
      id: 'five',
      title: 'Five Sentences',
      sourceLanguage: 'en',
      targetLanguage: 'es',
      filePath: 'five.txt',
      sentencesPerDay: 2,
    });

    const second = createTextCatalog({ textsDir, storage: createFileStateStorage(stateDir) });
    expect(second.getState().get('five').sentences).toHaveLength(5);
    expect(second.getState().dailyPortion('five', 2)).toEqual(['Three is here!', 'Four asks why?']);
  });
});
