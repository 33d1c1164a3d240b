import { readFileSync } from 'node:fs';

import { describe, expect, it } from 'vitest';

import { ValidationError } from '../vocabulary/errors';
import { exportCards, parsePlecoCards, removeCardsByCategories } from './pleco';

const xml = readFileSync(new URL('./__fixtures__/pleco-export.xml', import.meta.url), 'utf-8');

describe('parsePlecoCards', () => {
  it('reads headword, pronunciation, definition, category and scores', () => {
    const cards = parsePlecoCards(xml);

    expect(cards).toHaveLength(3);
    expect(cards[0]).toEqual({
      character: '你好',
      pronunciation: 'ni3hao3',
      traduction: 'interjection hello; hi',
      category: 'Cours1 ',
      score: '150',
      difficulty: '90',
      correct: '4',
      incorrect: '1',
      reviewed: '5'
    });
  });

  it('uses null for missing fields', () => {
    const [, train, cat] = parsePlecoCards(xml);

    expect(train.character).toBe('火车');
    expect(train.score).toBeNull();
    expect(cat).toMatchObject({ character: '猫', traduction: null, category: null });
  });

  it('rejects documents that are not Pleco exports', () => {
    expect(() => parsePlecoCards('<notes><note/></notes>')).toThrow(ValidationError);
  });

  it('returns no cards for an empty export', () => {
    expect(parsePlecoCards('<plecoflash><cards></cards></plecoflash>')).toEqual([]);
  });
});

describe('removeCardsByCategories', () => {
  it('drops cards whose category contains a keyword, ignoring case', () => {
    const kept = removeCardsByCategories(parsePlecoCards(xml), ['cours1 ']);

    expect(kept.map((card) => card.character)).toEqual(['火车', '猫']);
  });

  it('accepts a single keyword', () => {
    const kept = removeCardsByCategories(parsePlecoCards(xml), 'VOY');

    expect(kept.map((card) => card.character)).toEqual(['你好', '猫']);
  });
});

describe('exportCards', () => {
  it('parses definitions on request', () => {
    const [, train] = exportCards(parsePlecoCards(xml), true);

    expect(train.traduction).toEqual({
      noun: [
        { definition: 'train.', examples: ['我坐火车去北京。'] },
        { definition: 'locomotive.', examples: [] }
      ]
    });
  });

  it('keeps raw definitions otherwise', () => {
    const [hello] = exportCards(parsePlecoCards(xml), false);

    expect(hello.traduction).toBe('interjection hello; hi');
  });
});
