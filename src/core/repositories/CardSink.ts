import { AnkiCard } from '../entities/AnkiCard';

export interface CardSink {
  readonly location: string;
  writeCards(cards: AnkiCard[]): Promise<void>;
}
