import { setTimeout as delay } from 'node:timers/promises';

import { translationsOf } from './dictionary';
import { describeError, NetworkError, PipelineError } from './errors';
import type {
  DictionaryClient,
  ErrorPolicy,
  PhoneticConverter,
  TranslationClient,
  VocabRecord,
  Vocabulary,
  VocabStore
} from './types';

export interface PipelineDependencies {
  dictionary: DictionaryClient;
  translator: TranslationClient;
  phonetics: PhoneticConverter;
  store: VocabStore;
}

export interface PipelineOptions {
  policy?: ErrorPolicy;
  retries?: number;
  retryDelayMs?: number;
  progressEvery?: number;
  sleep?: (ms: number) => Promise<unknown>;
}

export interface PipelineSummary {
  total: number;
  alreadyEnriched: number;
  enriched: number;
  failed: number;
  savedTo: string;
}

export const FETCH_FAILED_MESSAGE = 'Failed to fetch data. Progress has been saved.';
export const RUN_FAILED_MESSAGE = 'An error occurred. Progress has been saved.';

export const isMissingTranslation = (traduction: string[] | undefined): boolean =>
  !traduction || traduction.every((value) => value === '');

export const needsEnrichment = (record: VocabRecord): boolean =>
  isMissingTranslation(record.traduction) || !record.pronunciation;

/** Computes whatever the record lacks without touching it; the caller swaps the record in. */
export const enrichWord = async (
  word: string,
  record: VocabRecord,
  deps: Pick<PipelineDependencies, 'dictionary' | 'translator' | 'phonetics'>
): Promise<VocabRecord> => {
  let traduction = record.traduction;
  if (isMissingTranslation(traduction)) {
    traduction = translationsOf(await deps.dictionary.lookup(word));
    if (isMissingTranslation(traduction)) {
      traduction = await deps.translator.translate(word);
    }
  }

  const pronunciation = record.pronunciation ? record.pronunciation : deps.phonetics.toPinyin(word);
  return { ...record, traduction, pronunciation };
};

export const enrichVocabulary = async (
  vocabulary: Vocabulary,
  deps: PipelineDependencies,
  options: PipelineOptions = {}
): Promise<PipelineSummary> => {
  const policy = options.policy ?? 'abort';
  const retries = policy === 'retry' ? (options.retries ?? 3) : 0;
  const retryDelayMs = options.retryDelayMs ?? 1000;
  const progressEvery = options.progressEvery ?? 50;
  const sleep = options.sleep ?? delay;

  const summary: PipelineSummary = { total: vocabulary.size, alreadyEnriched: 0, enriched: 0, failed: 0, savedTo: '' };

  const enrichWithRetry = async (word: string, record: VocabRecord): Promise<VocabRecord> => {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return await enrichWord(word, record, deps);
      } catch (error) {
        if (attempt >= retries || !(error instanceof NetworkError)) {
          throw error;
        }
        const wait = retryDelayMs * 2 ** attempt;
        console.warn(
          `[vocab:build] ${word}: ${describeError(error)} Retrying in ${wait}ms (${attempt + 1}/${retries}).`
        );
        await sleep(wait);
      }
    }
  };

  let position = 0;
  for (const [word, record] of vocabulary) {
    position += 1;
    if (!needsEnrichment(record)) {
      summary.alreadyEnriched += 1;
      continue;
    }

    try {
      vocabulary.set(word, await enrichWithRetry(word, record));
      summary.enriched += 1;
    } catch (error) {
      if (policy === 'skip') {
        summary.failed += 1;
        console.warn(`[vocab:build] Skipping ${word}: ${describeError(error)}`);
        continue;
      }
      console.error(`[vocab:build] Stopped at ${word}: ${describeError(error)}`);
      const savedTo = await deps.store.save(vocabulary, 'checkpoint');
      throw new PipelineError(error instanceof NetworkError ? FETCH_FAILED_MESSAGE : RUN_FAILED_MESSAGE, savedTo, error);
    }

    if (progressEvery > 0 && summary.enriched % progressEvery === 0) {
      console.log(`[vocab:build] Enriched ${summary.enriched} words (${position}/${summary.total}).`);
    }
  }

  summary.savedTo = await deps.store.save(vocabulary, 'final');
  return summary;
};
