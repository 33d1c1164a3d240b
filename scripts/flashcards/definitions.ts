import type { DefinitionSense, ParsedDefinition } from './types';

const PARTS_OF_SPEECH = [
  'adjective',
  'adverb',
  'affix',
  'auxiliary',
  'idiom',
  'noun',
  'preposition',
  'pronoun',
  'surname',
  'verb'
];

// Word boundaries count letters and digits of any script.
const PART_OF_SPEECH_PATTERN = new RegExp(
  `(?<![\\p{L}\\p{N}_])(${PARTS_OF_SPEECH.join('|')})(?![\\p{L}\\p{N}_])`,
  'giu'
);

export const splitDefinitions = (text: string): DefinitionSense[] =>
  text
    .split(/(?<!\d)(?=\d+\s)/)
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      const withoutNumber = part.replace(/^\d+\s+/, '');
      const [definition, ...examples] = withoutNumber.split(/(?<=\.)\s+/);
      return {
        definition,
        examples: examples.map((example) => example.trim()).filter(Boolean)
      };
    });

/**
 * Splits a Pleco definition into sections keyed by part of speech, each holding numbered
 * senses with their example sentences. Text without a part of speech comes back unchanged.
 */
export const parseDefinition = (definition: string): ParsedDefinition | string => {
  const matches = Array.from(definition.matchAll(PART_OF_SPEECH_PATTERN));
  if (!matches.length) {
    return definition;
  }

  const parsed: ParsedDefinition = {};
  matches.forEach((match, index) => {
    const start = match.index ?? 0;
    const end = matches[index + 1]?.index ?? definition.length;
    const partOfSpeech = match[1].toLowerCase();
    const section = definition.slice(start + match[0].length, end).trim();
    parsed[partOfSpeech] = splitDefinitions(section);
  });
  return parsed;
};
