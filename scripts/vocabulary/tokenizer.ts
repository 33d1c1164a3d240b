import type { DocumentSource, Vocabulary } from './types';

const MAX_WORD_LENGTH = 12;
const STOP_PATTERN = '2024';

export const cleanToken = (token: string): string => token.replace(/[^\p{L}\p{N}]+/gu, '');

/** Length is counted in code points; accepted words have 1 to 11 of them. */
export const isAcceptedToken = (word: string): boolean => {
  const length = Array.from(word).length;
  return length > 0 && length < MAX_WORD_LENGTH && !word.includes(STOP_PATTERN);
};

export const extractVocabulary = (text: string, vocabulary: Vocabulary): string[] => {
  const added: string[] = [];
  text.split(' ').forEach((token) => {
    const word = cleanToken(token);
    if (!isAcceptedToken(word) || vocabulary.has(word)) {
      return;
    }
    vocabulary.set(word, {});
    added.push(word);
  });
  return added;
};

export const buildVocabulary = async (source: DocumentSource, vocabulary: Vocabulary): Promise<number> => {
  const names = [...(await source.list())].sort();
  let total = 0;

  for (const name of names) {
    const document = await source.read(name);
    const added = extractVocabulary(document.text, vocabulary);
    total += added.length;
    console.log(`[vocab:build] ${name}: ${added.length} new words.`);
  }

  return total;
};
