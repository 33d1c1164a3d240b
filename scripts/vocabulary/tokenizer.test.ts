import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { buildVocabulary, cleanToken, extractVocabulary, isAcceptedToken } from './tokenizer';
import type { DocumentSource, Vocabulary } from './types';

const sourceOf = (documents: Record<string, string>): DocumentSource => ({
  list: async () => Object.keys(documents),
  read: async (name) => ({ name, text: documents[name] })
});

describe('cleanToken', () => {
  it('removes punctuation and symbols', () => {
    expect(cleanToken('（你好！）')).toBe('你好');
    expect(cleanToken('测试-document,')).toBe('测试document');
  });

  it('keeps letters and digits from any script', () => {
    expect(cleanToken('第3课')).toBe('第3课');
    expect(cleanToken('café')).toBe('café');
  });

  it('returns an empty string for pure punctuation', () => {
    expect(cleanToken('。，！')).toBe('');
  });
});

describe('isAcceptedToken', () => {
  it('accepts a single character', () => {
    expect(isAcceptedToken('猫')).toBe(true);
  });

  it('accepts eleven characters and rejects twelve', () => {
    expect(isAcceptedToken('一二三四五六七八九十百')).toBe(true);
    expect(isAcceptedToken('一二三四五六七八九十百千')).toBe(false);
  });

  it('rejects empty words', () => {
    expect(isAcceptedToken('')).toBe(false);
  });

  it('rejects words containing 2024', () => {
    expect(isAcceptedToken('2024年')).toBe(false);
    expect(isAcceptedToken('x2024')).toBe(false);
    expect(isAcceptedToken('2023年')).toBe(true);
  });
});

describe('extractVocabulary', () => {
  it('adds accepted tokens as empty records', () => {
    const vocabulary: Vocabulary = new Map();
    const added = extractVocabulary('你好 2024年 测试document', vocabulary);

    expect(added).toEqual(['你好', '测试document']);
    expect(Array.from(vocabulary.keys())).toEqual(['你好', '测试document']);
    expect(vocabulary.get('你好')).toEqual({});
  });

  it('drops tokens that clean to nothing', () => {
    const vocabulary: Vocabulary = new Map();
    expect(extractVocabulary('—— 。 猫', vocabulary)).toEqual(['猫']);
  });

  it('never overwrites an existing record', () => {
    const vocabulary: Vocabulary = new Map([['猫', { traduction: ['chat'], pronunciation: 'māo' }]]);

    const added = extractVocabulary('猫 狗 猫', vocabulary);

    expect(added).toEqual(['狗']);
    expect(vocabulary.get('猫')).toEqual({ traduction: ['chat'], pronunciation: 'māo' });
  });

  it('is idempotent over the same text', () => {
    const vocabulary: Vocabulary = new Map();
    extractVocabulary('学习 中文', vocabulary);
    vocabulary.set('学习', { traduction: ['étudier'], pronunciation: 'xué xí' });

    expect(extractVocabulary('学习 中文', vocabulary)).toEqual([]);
    expect(vocabulary.size).toBe(2);
    expect(vocabulary.get('学习')).toEqual({ traduction: ['étudier'], pronunciation: 'xué xí' });
  });
});

describe('buildVocabulary', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads documents in sorted file name order', async () => {
    const vocabulary: Vocabulary = new Map();
    const source = sourceOf({ 'b.docx': '狗 猫', 'a.docx': '猫 鸟' });

    const added = await buildVocabulary(source, vocabulary);

    expect(added).toBe(3);
    expect(Array.from(vocabulary.keys())).toEqual(['猫', '鸟', '狗']);
    expect(console.log).toHaveBeenCalledWith('[vocab:build] a.docx: 2 new words.');
    expect(console.log).toHaveBeenCalledWith('[vocab:build] b.docx: 1 new words.');
  });
});
