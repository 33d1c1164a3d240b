import { pinyin } from 'pinyin-pro';

import type { PhoneticConverter } from './types';

/** One tone-marked syllable per character, separated by single spaces. */
export const toPinyin = (word: string): string => {
  if (!word) {
    return '';
  }
  return pinyin(word, { toneType: 'symbol', type: 'array' }).join(' ');
};

export class PinyinProConverter implements PhoneticConverter {
  toPinyin(word: string): string {
    return toPinyin(word);
  }
}
