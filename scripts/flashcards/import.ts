#!/usr/bin/env tsx
import { readdir, readFile } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';

import { describeError, ValidationError } from '../vocabulary/errors';
import { ROOT_DIR } from '../vocabulary/options';
import { writeJson } from '../vocabulary/store';
import { exportCards, parsePlecoCards, removeCardsByCategories } from './pleco';

interface ImportOptions {
  input?: string;
  output: string;
  exclude: string[];
  parseDefinitions: boolean;
}

const RAW_DIR = join(ROOT_DIR, 'data', 'raw');

const parseArgs = (): ImportOptions => {
  const options: ImportOptions = {
    output: join(ROOT_DIR, 'data', 'processed', 'chinese_pleco.json'),
    exclude: [],
    parseDefinitions: false
  };

  process.argv.slice(2).forEach((arg) => {
    if (arg === '--parse-definitions') {
      options.parseDefinitions = true;
      return;
    }
    if (arg.startsWith('--input=')) {
      options.input = resolve(ROOT_DIR, arg.substring('--input='.length));
      return;
    }
    if (arg.startsWith('--output=')) {
      options.output = resolve(ROOT_DIR, arg.substring('--output='.length));
      return;
    }
    if (arg.startsWith('--exclude=')) {
      options.exclude = arg
        .substring('--exclude='.length)
        .split(',')
        .filter((keyword) => keyword.trim());
      return;
    }
    throw new ValidationError(`Unknown option "${arg}".`);
  });

  return options;
};

const latestExport = async (): Promise<string> => {
  const names = (await readdir(RAW_DIR)).filter((name) => extname(name).toLowerCase() === '.xml').sort();
  const latest = names[names.length - 1];
  if (!latest) {
    throw new ValidationError(`No Pleco export (.xml) found in ${RAW_DIR}`);
  }
  return join(RAW_DIR, latest);
};

const importFlashcards = async (): Promise<void> => {
  const options = parseArgs();
  const input = options.input ?? (await latestExport());

  const cards = parsePlecoCards(await readFile(input, 'utf-8'));
  const kept = options.exclude.length ? removeCardsByCategories(cards, options.exclude) : cards;
  console.log(`[flashcards:import] Read ${cards.length} cards from ${input}, kept ${kept.length}.`);

  await writeJson(options.output, exportCards(kept, options.parseDefinitions));
  console.log(`[flashcards:import] Cards written to ${options.output}`);
};

importFlashcards().catch((error: unknown) => {
  console.error(`[flashcards:import] ${describeError(error)}`);
  process.exitCode = 1;
});
