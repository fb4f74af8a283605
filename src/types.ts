export type SearchOperator = 'AND' | 'OR';

export interface Passage {
  id: number;
  content: string;
  createdAt: string;
}

export interface WordFrequency {
  word: string;
  count: number;
}

export interface WordDefinition {
  word: string;
  definition: string;
  frequency: number;
}

export interface SearchResult {
  passages: Passage[];
  total: number;
}

export interface IngestResult {
  passage: Passage;
  /** normalized tokens counted, repeats included */
  words: number;
  distinctWords: number;
  indexed: boolean;
  cacheRefreshed: boolean;
}
