export type ErrorPolicy = 'abort' | 'skip' | 'retry';

export type SaveForm = 'checkpoint' | 'final';

export interface VocabRecord {
  traduction?: string[];
  pronunciation?: string;
}

export type Vocabulary = Map<string, VocabRecord>;

export interface VocabRow {
  character: string;
  traduction: string[];
  pronunciation: string;
}

export type DictionaryResult =
  | { kind: 'primary'; span: string; translations: string[] }
  | { kind: 'fallback'; span: string; translations: string[] }
  | { kind: 'not-found' };

export interface SourceDocument {
  name: string;
  text: string;
}

export interface DocumentSource {
  list(): Promise<string[]>;
  read(name: string): Promise<SourceDocument>;
}

export interface DictionaryClient {
  lookup(word: string): Promise<DictionaryResult>;
}

export interface TranslationClient {
  translate(word: string): Promise<string[]>;
}

export interface PhoneticConverter {
  toPinyin(word: string): string;
}

export interface VocabStore {
  load(): Promise<Vocabulary>;
  save(vocabulary: Vocabulary, form: SaveForm): Promise<string>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
