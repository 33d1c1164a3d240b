import { parse } from 'node-html-parser';

import { ExtractionError } from './errors';
import { DEFAULT_TIMEOUT_MS, fetchText, USER_AGENT } from './http';
import type { FetchLike, TranslationClient } from './types';

const TRANSLATE_URL = 'https://translate.google.com/m';
const SOURCE_LANGUAGE = 'zh-CN';
const TARGET_LANGUAGE = 'fr';

export const buildTranslateUrl = (word: string, baseUrl: string = TRANSLATE_URL): string => {
  const params = new URLSearchParams({ sl: SOURCE_LANGUAGE, tl: TARGET_LANGUAGE, q: word, op: 'translate' });
  return `${baseUrl}?${params.toString()}`;
};

export interface GoogleTranslateOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
  baseUrl?: string;
}

export class GoogleTranslateClient implements TranslationClient {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(options: GoogleTranslateOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.baseUrl = options.baseUrl ?? TRANSLATE_URL;
  }

  async translate(word: string): Promise<string[]> {
    const url = buildTranslateUrl(word, this.baseUrl);
    const html = await fetchText(this.fetchImpl, url, { headers: { 'User-Agent': USER_AGENT } }, this.timeoutMs);
    const container = parse(html).querySelector('div.result-container');
    if (!container) {
      throw new ExtractionError(url, `No translation result for "${word}".`);
    }
    return [container.text.trim()];
  }
}
