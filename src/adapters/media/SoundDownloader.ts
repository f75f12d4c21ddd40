import path from 'path';
import { Outcome, absent, failed, found } from '../../core/entities/Outcome';
import { Logger } from '../../core/services/Logger';
import { AudioFetcher } from '../../core/services/MediaFetcher';
import { FetchFn, downloadToFile, fileExists, mediaBaseName } from '../http/fetch';

// Some pronunciation hosts refuse requests without a browser-like profile.
const AUDIO_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'audio/webm,audio/ogg,audio/wav,audio/*;q=0.9,application/ogg;q=0.7,video/*;q=0.6,*/*;q=0.5',
  'Accept-Language': 'en-US,en;q=0.9',
  Referer: 'https://dictionary.cambridge.org/',
};

export function audioExtension(url: string): string {
  const lower = url.toLowerCase();
  if (lower.includes('.mp3')) return '.mp3';
  if (lower.includes('.wav')) return '.wav';
  if (lower.includes('.ogg')) return '.ogg';
  return '.mp3';
}

export class SoundDownloader implements AudioFetcher {
  constructor(
    private logger: Logger,
    private options: { suffix?: string; timeoutMs?: number; fetchFn?: FetchFn } = {}
  ) {}

  async fetchAudio(word: string, destinationDir: string, sourceUrl?: string | null): Promise<Outcome<string>> {
    if (!sourceUrl) return absent('no pronunciation url');

    const fileName = `${mediaBaseName(word)}${this.options.suffix ?? '_auto_tool'}${audioExtension(sourceUrl)}`;
    const filePath = path.join(destinationDir, fileName);

    if (await fileExists(filePath)) {
      this.logger.info(`Sound file already exists: ${fileName}`);
      return found(fileName);
    }

    try {
      await downloadToFile(this.options.fetchFn ?? fetch, sourceUrl, filePath, {
        headers: AUDIO_HEADERS,
        timeoutMs: this.options.timeoutMs ?? 30000,
      });
      this.logger.info(`Downloaded sound: ${fileName}`);
      return found(fileName);
    } catch (error) {
      return failed(error);
    }
  }
}
