import { readFileSync } from 'node:fs';

import { describe, expect, it, vi } from 'vitest';

import { ExtractionError, NetworkError } from './errors';
import { buildTranslateUrl, GoogleTranslateClient } from './translate';
import type { FetchLike } from './types';

const page = readFileSync(new URL('./__fixtures__/google-translate.html', import.meta.url), 'utf-8');

describe('buildTranslateUrl', () => {
  it('fixes the source and target languages', () => {
    expect(buildTranslateUrl('你好')).toBe(
      'https://translate.google.com/m?sl=zh-CN&tl=fr&q=%E4%BD%A0%E5%A5%BD&op=translate'
    );
  });
});

describe('GoogleTranslateClient', () => {
  it('returns the result container text', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => new Response(page, { status: 200 }));
    const client = new GoogleTranslateClient({ fetch: fetchMock, timeoutMs: 500 });

    await expect(client.translate('你好')).resolves.toEqual(['Bonjour']);
    expect(fetchMock.mock.calls[0][0]).toBe(buildTranslateUrl('你好'));
  });

  it('fails with an extraction error when there is no result', async () => {
    const client = new GoogleTranslateClient({
      fetch: async () => new Response('<html><body></body></html>', { status: 200 })
    });

    await expect(client.translate('你好')).rejects.toBeInstanceOf(ExtractionError);
  });

  it('fails with a network error on a non-success status', async () => {
    const client = new GoogleTranslateClient({
      fetch: async () => new Response('', { status: 429, statusText: 'Too Many Requests' })
    });

    await expect(client.translate('你好')).rejects.toThrow(
      'Request to https://translate.google.com/m?sl=zh-CN&tl=fr&q=%E4%BD%A0%E5%A5%BD&op=translate failed: 429 Too Many Requests'
    );
    await expect(client.translate('你好')).rejects.toBeInstanceOf(NetworkError);
  });
});
