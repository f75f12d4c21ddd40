import { Outcome } from '../entities/Outcome';

// Both fetchers resolve to the bare file name written inside destinationDir.
export interface AudioFetcher {
  fetchAudio(word: string, destinationDir: string, sourceUrl?: string | null): Promise<Outcome<string>>;
}

export interface ImageFetcher {
  fetchImage(word: string, destinationDir: string): Promise<Outcome<string>>;
}
