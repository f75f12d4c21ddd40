import { EnrichedWord } from '../entities/EnrichedWord';
import { Outcome } from '../entities/Outcome';

export interface DictionaryLookup {
  readonly name: string;
  // found: definition data; absent: word not in the dictionary; failed: transport/format error
  lookup(word: string): Promise<Outcome<EnrichedWord>>;
}
