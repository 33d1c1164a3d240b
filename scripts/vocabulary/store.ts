import { existsSync } from 'node:fs';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { describeError, ValidationError } from './errors';
import type { SaveForm, VocabRecord, VocabRow, Vocabulary, VocabStore } from './types';

const JSON_INDENT = 4;

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readTraduction = (value: unknown): string[] | undefined => {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return undefined;
};

const readRecord = (value: unknown): VocabRecord => {
  if (!isPlainObject(value)) {
    return {};
  }
  const record: VocabRecord = {};
  const traduction = readTraduction(value.traduction);
  if (traduction) {
    record.traduction = traduction;
  }
  // Older files stored the transcription under `pinyin`.
  const pronunciation = value.pronunciation ?? value.pinyin;
  if (typeof pronunciation === 'string') {
    record.pronunciation = pronunciation;
  }
  return record;
};

export const parseVocabulary = (payload: unknown): Vocabulary => {
  const vocabulary: Vocabulary = new Map();

  if (Array.isArray(payload)) {
    payload.forEach((item, index) => {
      if (!isPlainObject(item) || typeof item.character !== 'string') {
        throw new ValidationError(`Vocabulary row ${index} has no character.`);
      }
      if (!vocabulary.has(item.character)) {
        vocabulary.set(item.character, readRecord(item));
      }
    });
    return vocabulary;
  }

  if (isPlainObject(payload)) {
    Object.entries(payload).forEach(([word, value]) => {
      vocabulary.set(word, readRecord(value));
    });
    return vocabulary;
  }

  throw new ValidationError('Vocabulary file must hold an array or an object.');
};

export const toRows = (vocabulary: Vocabulary): VocabRow[] =>
  Array.from(vocabulary, ([character, record]) => ({
    character,
    traduction: record.traduction ?? [''],
    pronunciation: record.pronunciation ?? ''
  }));

export const toMapping = (vocabulary: Vocabulary): Record<string, VocabRecord> => Object.fromEntries(vocabulary);

export const writeJson = async (filePath: string, payload: unknown): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(payload, null, JSON_INDENT), 'utf-8');
};

export interface JsonVocabStoreOptions {
  outputPath: string;
  checkpointPath?: string;
}

/**
 * Final saves write the row array to `outputPath`; checkpoints write the word mapping to
 * `checkpointPath`. Loading prefers the checkpoint, which is removed after a final save.
 */
export class JsonVocabStore implements VocabStore {
  readonly outputPath: string;
  readonly checkpointPath: string;

  constructor(options: JsonVocabStoreOptions) {
    this.outputPath = options.outputPath;
    this.checkpointPath = options.checkpointPath ?? options.outputPath;
  }

  async load(): Promise<Vocabulary> {
    const source = [this.checkpointPath, this.outputPath].find((candidate) => existsSync(candidate));
    if (!source) {
      return new Map();
    }

    const raw = await readFile(source, 'utf-8');
    let payload: unknown;
    try {
      payload = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(`Failed to parse ${source}: ${describeError(error)}`);
    }
    const vocabulary = parseVocabulary(payload);
    console.log(`[vocab:build] Loaded ${vocabulary.size} words from ${source}`);
    return vocabulary;
  }

  async save(vocabulary: Vocabulary, form: SaveForm): Promise<string> {
    if (form === 'checkpoint') {
      await writeJson(this.checkpointPath, toMapping(vocabulary));
      console.log(`[vocab:build] Progress saved to ${this.checkpointPath}`);
      return this.checkpointPath;
    }

    await writeJson(this.outputPath, toRows(vocabulary));
    if (this.checkpointPath !== this.outputPath) {
      await rm(this.checkpointPath, { force: true });
    }
    console.log(`[vocab:build] Vocabulary saved to ${this.outputPath}`);
    return this.outputPath;
  }
}
