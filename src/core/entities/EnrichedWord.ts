export class EnrichedWord {
  constructor(
    public readonly word: string,
    public readonly transcription: string,
    public readonly primarySense: string,
    public readonly examples: readonly string[],
    public readonly audioUrl: string | null = null
  ) {}

  static create(params: {
    word: string;
    transcription?: string | null;
    primarySense?: string | null;
    examples?: readonly string[];
    audioUrl?: string | null;
  }): EnrichedWord {
    return new EnrichedWord(
      params.word.trim(),
      (params.transcription ?? '').trim(),
      (params.primarySense ?? '').trim(),
      (params.examples ?? []).map((e) => e.trim()).filter((e) => e.length > 0),
      params.audioUrl?.trim() || null
    );
  }
}
