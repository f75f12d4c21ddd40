import fs from 'fs/promises';
import path from 'path';
import { MissedWordsLog } from '../../core/repositories/MissedWordsLog';

const HEADER = ['# Words/phrases not found in dictionary', '# Add these manually or review later', ''];

export class TextMissedWordsLog implements MissedWordsLog {
  constructor(private filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  async write(words: string[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, [...HEADER, ...words].join('\n') + '\n', 'utf-8');
  }
}
