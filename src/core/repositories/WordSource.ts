import { InputWord } from '../entities/InputWord';

export interface WordSource {
  // Rows in file order, including rows with an empty keyword.
  readWords(): Promise<InputWord[]>;
}
