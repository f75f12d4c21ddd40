import { Outcome } from '../entities/Outcome';

export interface Translator {
  readonly name: string;
  translate(text: string, targetLanguage: string): Promise<Outcome<string>>;
}
