import fs from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify';
import { ANKI_CSV_COLUMNS, AnkiCard } from '../../core/entities/AnkiCard';
import { FatalIOError } from '../../core/errors/FatalIOError';
import { CardSink } from '../../core/repositories/CardSink';

export function formatCardsCsv(cards: AnkiCard[]): Promise<string> {
  const header = ANKI_CSV_COLUMNS.map((column) => column.header);
  const rows = cards.map((card) => ANKI_CSV_COLUMNS.map(({ key }) => String(card[key])));
  return new Promise((resolve, reject) => {
    // The header row is always written, so an empty run still yields an importable file.
    stringify([header, ...rows], (err, output) => (err ? reject(err) : resolve(output)));
  });
}

export class CsvCardSink implements CardSink {
  constructor(private filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  async writeCards(cards: AnkiCard[]): Promise<void> {
    const content = await formatCardsCsv(cards);
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, content, 'utf-8');
    } catch (error) {
      throw new FatalIOError(`Cannot write output file: ${this.filePath}`, this.filePath, { cause: error });
    }
  }
}
