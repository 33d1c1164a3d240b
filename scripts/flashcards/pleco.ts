import { XMLParser } from 'fast-xml-parser';

import { ValidationError } from '../vocabulary/errors';
import { parseDefinition } from './definitions';
import type { ExportedCard, PlecoCard } from './types';

type XmlObject = Record<string, unknown>;

const isObject = (value: unknown): value is XmlObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const ensureArray = <T>(value: T | T[] | undefined | null): T[] => {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
};

const first = (value: unknown): unknown => ensureArray(value)[0];

const textOf = (value: unknown): string | null => {
  const node = first(value);
  const raw = isObject(node) ? node['#text'] : node;
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    return null;
  }
  const text = String(raw).trim();
  return text ? text : null;
};

const attributeOf = (value: unknown, name: string): string | null => {
  const node = first(value);
  if (!isObject(node)) {
    return null;
  }
  const attribute = node[name];
  return typeof attribute === 'string' ? attribute : null;
};

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  trimValues: false,
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (name) => ['card', 'headword', 'catassign', 'scoreinfo'].includes(name)
});

export const parsePlecoCards = (xml: string): PlecoCard[] => {
  const document: unknown = parser.parse(xml);
  const root = isObject(document) ? document.plecoflash : undefined;
  if (!isObject(root)) {
    throw new ValidationError('Not a Pleco flashcard export: missing <plecoflash>.');
  }
  const cards = isObject(root.cards) ? ensureArray(root.cards.card) : [];

  return cards.filter(isObject).flatMap((card): PlecoCard[] => {
    const entry = isObject(card.entry) ? card.entry : undefined;
    const character = entry ? textOf(entry.headword) : null;
    if (!entry || !character) {
      return [];
    }
    return [
      {
        character,
        pronunciation: textOf(entry.pron),
        traduction: textOf(entry.defn),
        category: attributeOf(card.catassign, 'category'),
        score: attributeOf(card.scoreinfo, 'score'),
        difficulty: attributeOf(card.scoreinfo, 'difficulty'),
        correct: attributeOf(card.scoreinfo, 'correct'),
        incorrect: attributeOf(card.scoreinfo, 'incorrect'),
        reviewed: attributeOf(card.scoreinfo, 'reviewed')
      }
    ];
  });
};

/** Drops cards whose category contains any keyword, ignoring case. Uncategorised cards stay. */
export const removeCardsByCategories = (cards: PlecoCard[], keywords: string | string[]): PlecoCard[] => {
  const lowered = ensureArray(keywords).map((keyword) => keyword.toLowerCase());
  return cards.filter((card) => {
    if (!card.category) {
      return true;
    }
    const category = card.category.toLowerCase();
    return !lowered.some((keyword) => category.includes(keyword));
  });
};

export const exportCards = (cards: PlecoCard[], parseDefinitions: boolean): ExportedCard[] =>
  cards.map((card) => ({
    ...card,
    traduction: parseDefinitions && card.traduction ? parseDefinition(card.traduction) : card.traduction
  }));
