export interface PlecoCard {
  character: string;
  pronunciation: string | null;
  traduction: string | null;
  category: string | null;
  score: string | null;
  difficulty: string | null;
  correct: string | null;
  incorrect: string | null;
  reviewed: string | null;
}

export interface DefinitionSense {
  definition: string;
  examples: string[];
}

export type ParsedDefinition = Record<string, DefinitionSense[]>;

export type ExportedCard = Omit<PlecoCard, 'traduction'> & {
  traduction: string | ParsedDefinition | null;
};
