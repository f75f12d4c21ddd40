export interface MissedWordsLog {
  readonly location: string;
  write(words: string[]): Promise<void>;
}
