#!/usr/bin/env tsx
import { dirname, join } from 'node:path';

import { ChineInDictionaryClient } from './dictionary';
import { DocxFolderSource } from './documents';
import { describeError } from './errors';
import { writeCsv, writeManifest, writeSqlite } from './export';
import { parseArgs, type BuildOptions } from './options';
import { enrichVocabulary } from './pipeline';
import { PinyinProConverter } from './pinyin';
import { JsonVocabStore } from './store';
import { buildVocabulary } from './tokenizer';
import { GoogleTranslateClient } from './translate';
import type { Vocabulary } from './types';

const exportArtifacts = async (options: BuildOptions, store: JsonVocabStore): Promise<void> => {
  const vocabulary = await store.load();
  const outputDir = dirname(options.outputPath);
  const files = [options.outputPath];

  if (options.csv) {
    const csvPath = join(outputDir, 'chinese_vocab.csv');
    const count = await writeCsv(vocabulary, csvPath);
    console.log(`[vocab:build] Wrote ${count} rows to ${csvPath}`);
    files.push(csvPath);
  }
  if (options.sqlite) {
    const sqlitePath = join(outputDir, 'chinese_vocab.sqlite');
    const count = await writeSqlite(vocabulary, sqlitePath);
    console.log(`[vocab:build] Wrote ${count} rows to ${sqlitePath}`);
    files.push(sqlitePath);
  }

  const manifestPath = await writeManifest(outputDir, vocabulary.size, files);
  console.log(`[vocab:build] Manifest written to ${manifestPath}`);
};

const enrich = async (options: BuildOptions, vocabulary: Vocabulary, store: JsonVocabStore): Promise<void> => {
  const summary = await enrichVocabulary(
    vocabulary,
    {
      dictionary: new ChineInDictionaryClient({ timeoutMs: options.timeoutMs }),
      translator: new GoogleTranslateClient({ timeoutMs: options.timeoutMs }),
      phonetics: new PinyinProConverter(),
      store
    },
    { policy: options.policy, retries: options.retries, retryDelayMs: options.retryDelayMs }
  );
  console.log(
    `[vocab:build] Done: ${summary.enriched} enriched, ${summary.alreadyEnriched} already enriched, ${summary.failed} failed.`
  );
};

const build = async (): Promise<void> => {
  const options = parseArgs(process.argv.slice(2));
  const store = new JsonVocabStore({ outputPath: options.outputPath, checkpointPath: options.checkpointPath });

  const vocabulary = await store.load();
  const added = await buildVocabulary(new DocxFolderSource(options.docsDir), vocabulary);
  console.log(`[vocab:build] ${added} new words, ${vocabulary.size} in total.`);

  if (options.buildOnly) {
    await store.save(vocabulary, 'final');
  } else {
    await enrich(options, vocabulary, store);
  }

  if (options.csv || options.sqlite) {
    await exportArtifacts(options, store);
  }
};

build().catch((error: unknown) => {
  console.error(`[vocab:build] ${describeError(error)}`);
  if (error instanceof Error && error.cause !== undefined) {
    console.error(`[vocab:build] Caused by: ${describeError(error.cause)}`);
  }
  process.exitCode = 1;
});
