import { describe, expect, it } from 'vitest';

import { PinyinProConverter, toPinyin } from './pinyin';

describe('toPinyin', () => {
  it('gives one tone-marked syllable per character', () => {
    expect(toPinyin('你好')).toBe('nǐ hǎo');
    expect(toPinyin('中国')).toBe('zhōng guó');
  });

  it('returns an empty string for an empty word', () => {
    expect(toPinyin('')).toBe('');
  });
});

describe('PinyinProConverter', () => {
  it('delegates to toPinyin', () => {
    expect(new PinyinProConverter().toPinyin('猫')).toBe('māo');
  });
});
