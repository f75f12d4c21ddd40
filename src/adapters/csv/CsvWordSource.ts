import fs from 'fs/promises';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { InputWord } from '../../core/entities/InputWord';
import { FatalIOError } from '../../core/errors/FatalIOError';
import { WordSource } from '../../core/repositories/WordSource';

// Headers are matched case-insensitively; "Translation" is accepted for "Vietnamese".
const rowSchema = z.object({
  keyword: z.string().optional(),
  vietnamese: z.string().optional(),
  translation: z.string().optional(),
});

export function parseWordsCsv(content: string): Promise<InputWord[]> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      {
        bom: true,
        columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
        skip_empty_lines: true,
        relax_column_count: true,
        trim: true,
      },
      (err, records: unknown) => {
        if (err) return reject(err);
        const rows = z.array(rowSchema).safeParse(records);
        if (!rows.success) return reject(new Error('Input CSV rows are not keyword/translation records'));
        resolve(rows.data.map((r) => InputWord.create(r.keyword ?? '', r.vietnamese ?? r.translation ?? '')));
      }
    );
  });
}

export class CsvWordSource implements WordSource {
  constructor(private filePath: string) {}

  async readWords(): Promise<InputWord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new FatalIOError(`Input file not found or unreadable: ${this.filePath}`, this.filePath, { cause: error });
    }

    try {
      return await parseWordsCsv(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FatalIOError(`Cannot parse input file ${this.filePath}: ${reason}`, this.filePath, { cause: error });
    }
  }
}
