import path from 'path';
import { z } from 'zod';
import { Outcome, absent, failed, found } from '../../core/entities/Outcome';
import { Logger } from '../../core/services/Logger';
import { ImageFetcher } from '../../core/services/MediaFetcher';
import { FetchFn, downloadToFile, fileExists, getJson, mediaBaseName } from '../http/fetch';

const searchResponseSchema = z.object({
  photos: z
    .array(
      z.object({
        src: z.object({ medium: z.string() }),
      })
    )
    .default([]),
});

export function imageExtension(url: string): string {
  const lower = url.toLowerCase().split('?')[0];
  if (lower.endsWith('.jpg') || lower.endsWith('.jpeg')) return '.jpg';
  if (lower.endsWith('.png')) return '.png';
  if (lower.endsWith('.webp')) return '.webp';
  return '.jpg';
}

type Options = {
  baseUrl?: string;
  suffix?: string;
  searchTimeoutMs?: number;
  downloadTimeoutMs?: number;
  fetchFn?: FetchFn;
};

export class PexelsImageFetcher implements ImageFetcher {
  private baseUrl: string;

  constructor(
    private apiKey: string,
    private logger: Logger,
    private options: Options = {}
  ) {
    this.baseUrl = (options.baseUrl ?? 'https://api.pexels.com/v1').replace(/\/+$/, '');
  }

  async fetchImage(word: string, destinationDir: string): Promise<Outcome<string>> {
    const fetchFn = this.options.fetchFn ?? fetch;
    try {
      const query = new URLSearchParams({ query: word, per_page: '1', orientation: 'square' });
      const { status, body } = await getJson(fetchFn, `${this.baseUrl}/search?${query.toString()}`, {
        headers: { Authorization: this.apiKey },
        timeoutMs: this.options.searchTimeoutMs ?? 10000,
      });
      if (status === 429) return failed(`Pexels rate limit hit for '${word}'`);
      if (body === null) return failed(`Pexels search returned status ${status}`);

      const parsed = searchResponseSchema.safeParse(body);
      if (!parsed.success) return failed('unexpected Pexels search payload');

      const photo = parsed.data.photos[0];
      if (!photo) return absent(`no images found for '${word}'`);

      const imageUrl = photo.src.medium;
      const fileName = `${mediaBaseName(word)}${this.options.suffix ?? '_auto_tool'}${imageExtension(imageUrl)}`;
      const filePath = path.join(destinationDir, fileName);

      if (await fileExists(filePath)) {
        this.logger.info(`Image already exists: ${fileName}`);
        return found(fileName);
      }

      await downloadToFile(fetchFn, imageUrl, filePath, { timeoutMs: this.options.downloadTimeoutMs ?? 30000 });
      this.logger.info(`Downloaded image: ${fileName}`);
      return found(fileName);
    } catch (error) {
      return failed(error);
    }
  }
}
