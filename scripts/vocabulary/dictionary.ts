import { parse } from 'node-html-parser';

import { ExtractionError } from './errors';
import { DEFAULT_TIMEOUT_MS, fetchText, USER_AGENT } from './http';
import type { DictionaryClient, DictionaryResult, FetchLike } from './types';

const DICTIONARY_URL = 'https://chine.in/mandarin/dictionnaire/index.php?mot=';
const RESULTS_SELECTOR = '.table.invert_img#resultats_dico';

const FALLBACK_START_MARKER = 'Traduction';
const FALLBACK_END_MARKER = 'Editer (projet CFDICT)';
const PRIMARY_END_MARKER = 'Entrées commençant par';

export const primaryStartMarker = (word: string): string => `Entrées pour ${word}`;

/** Each character becomes a URL-encoded numeric character reference, `&#<codepoint>;`. */
export const encodeDictionaryUrl = (word: string, baseUrl: string = DICTIONARY_URL): string =>
  baseUrl +
  Array.from(word)
    .map((char) => `%26%23${char.codePointAt(0)}%3B`)
    .join('');

export const extractBetweenMarkers = (markup: string, startMarker: string, endMarker: string): string | null => {
  const startIndex = markup.indexOf(startMarker);
  if (startIndex === -1) {
    return null;
  }
  const contentStart = startIndex + startMarker.length;
  const endIndex = markup.indexOf(endMarker, contentStart);
  if (endIndex === -1) {
    return null;
  }
  return markup.slice(contentStart, endIndex);
};

export const stripTags = (value: string): string => value.replace(/<[^>]*>/g, '');

const ENTITY_PATTERN = /&(?:#\d+|#x[\da-f]+|[a-z][a-z\d]*);/gi;
const MARKUP_CHARACTERS = new Set(['<', '>', '&']);

export const decodeEntities = (value: string): string => parse(value).text;

/** Decodes character references in markup, except those that would read as markup once decoded. */
export const decodeMarkupEntities = (markup: string): string =>
  markup.replace(ENTITY_PATTERN, (entity) => {
    const decoded = decodeEntities(entity);
    return MARKUP_CHARACTERS.has(decoded) ? entity : decoded;
  });

export const cleanTranslationSpan = (span: string): string[] => {
  const fragments = /<li[\s>]/i.test(span) ? span.split(/<\/li>/i).slice(0, -1) : [span];
  return fragments.map((fragment) => decodeEntities(stripTags(fragment)).trim()).filter(Boolean);
};

export const extractTranslation = (rawMarkup: string, word: string): DictionaryResult => {
  const markup = decodeMarkupEntities(rawMarkup);
  const primary = extractBetweenMarkers(markup, primaryStartMarker(word), PRIMARY_END_MARKER);
  if (primary) {
    return { kind: 'primary', span: primary, translations: cleanTranslationSpan(primary) };
  }

  const fallback = extractBetweenMarkers(markup, FALLBACK_START_MARKER, FALLBACK_END_MARKER);
  if (fallback) {
    return { kind: 'fallback', span: fallback, translations: cleanTranslationSpan(fallback) };
  }

  return { kind: 'not-found' };
};

/** `[""]` marks a word the dictionary had nothing for. */
export const translationsOf = (result: DictionaryResult): string[] => {
  if (result.kind === 'not-found' || !result.translations.length) {
    return [''];
  }
  return result.translations;
};

export interface ChineInOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
  baseUrl?: string;
}

export class ChineInDictionaryClient implements DictionaryClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(options: ChineInOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.baseUrl = options.baseUrl ?? DICTIONARY_URL;
  }

  async lookup(word: string): Promise<DictionaryResult> {
    const url = encodeDictionaryUrl(word, this.baseUrl);
    const html = await fetchText(
      this.fetchImpl,
      url,
      {
        method: 'POST',
        headers: { 'User-Agent': USER_AGENT },
        body: new URLSearchParams({ q: word, Submit: '1' })
      },
      this.timeoutMs
    );

    const results = parse(html).querySelector(RESULTS_SELECTOR);
    if (!results) {
      throw new ExtractionError(url, `No dictionary results block for "${word}".`);
    }
    return extractTranslation(results.outerHTML, word);
  }
}
