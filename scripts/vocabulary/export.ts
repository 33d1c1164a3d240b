import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import Database from 'better-sqlite3';

import { toRows } from './store';
import type { VocabRow, Vocabulary } from './types';

export interface ManifestArtifact {
  file: string;
  sha256: string;
}

export interface Manifest {
  generatedAt: string;
  entries: number;
  artifacts: ManifestArtifact[];
}

const toRowPayload = (row: VocabRow) => ({
  character: row.character,
  traduction: JSON.stringify(row.traduction),
  pronunciation: row.pronunciation || null
});

export const checksum = async (filePath: string): Promise<string> => {
  const hash = createHash('sha256');
  const data = await readFile(filePath);
  hash.update(data);
  return hash.digest('hex');
};

const CSV_COLUMNS = ['character', 'traduction', 'pronunciation'] as const;

export const csvField = (value: string): string => (/[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value);

/** One row per word; `traduction` holds the JSON array so multi-sense entries survive a round trip. */
export const toCsv = (vocabulary: Vocabulary): string => {
  const lines = toRows(vocabulary).map((row) =>
    [row.character, JSON.stringify(row.traduction), row.pronunciation].map(csvField).join(',')
  );
  return [CSV_COLUMNS.join(','), ...lines].join('\n') + '\n';
};

export const writeCsv = async (vocabulary: Vocabulary, filePath: string): Promise<number> => {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, toCsv(vocabulary), 'utf-8');
  return vocabulary.size;
};

export const writeSqlite = async (vocabulary: Vocabulary, filePath: string): Promise<number> => {
  if (existsSync(filePath)) {
    await rm(filePath, { force: true });
  }

  const db = new Database(filePath);
  db.pragma('journal_mode = WAL');
  db.exec(`
    CREATE TABLE IF NOT EXISTS vocabulary (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      character TEXT NOT NULL UNIQUE,
      traduction TEXT NOT NULL,
      pronunciation TEXT
    );
  `);

  const insert = db.prepare(
    `INSERT INTO vocabulary (character, traduction, pronunciation)
     VALUES (@character, @traduction, @pronunciation);`
  );

  const payloads = toRows(vocabulary).map(toRowPayload);
  const insertMany = db.transaction((rows: ReturnType<typeof toRowPayload>[]) => {
    rows.forEach((row) => {
      insert.run(row);
    });
  });

  try {
    insertMany(payloads);
    // Fold the WAL back in so the database is a single file.
    db.pragma('journal_mode = DELETE');
    db.exec('VACUUM;');
    return payloads.length;
  } finally {
    db.close();
  }
};

export const writeManifest = async (outputDir: string, entries: number, files: string[]): Promise<string> => {
  const artifacts: ManifestArtifact[] = [];
  for (const file of files) {
    artifacts.push({ file: basename(file), sha256: await checksum(file) });
  }
  const manifest: Manifest = { generatedAt: new Date().toISOString(), entries, artifacts };
  const manifestPath = join(outputDir, 'manifest.json');
  await writeFile(manifestPath, JSON.stringify(manifest, null, 2), 'utf-8');
  return manifestPath;
};
