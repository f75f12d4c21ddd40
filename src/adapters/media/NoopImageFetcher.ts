import { Outcome, absent } from '../../core/entities/Outcome';
import { ImageFetcher } from '../../core/services/MediaFetcher';

// Used when no image search key is configured. Every word gets no image.
export class NoopImageFetcher implements ImageFetcher {
  async fetchImage(word: string, destinationDir: string): Promise<Outcome<string>> {
    void word;
    void destinationDir;
    return absent('image search not configured');
  }
}
