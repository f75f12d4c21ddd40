export class AnkiCard {
  constructor(
    public readonly number: number,
    public readonly imageHtml: string,
    public readonly vietnamese: string,
    public readonly suggestion: string,
    public readonly keyword: string,
    public readonly transcription: string,
    public readonly explanation: string,
    public readonly soundTag: string,
    public readonly example: string
  ) {}
}

export type AnkiCardField = keyof AnkiCard;

// Column order of the Anki import file.
export const ANKI_CSV_COLUMNS: ReadonlyArray<{ key: AnkiCardField; header: string }> = [
  { key: 'number', header: 'No' },
  { key: 'imageHtml', header: 'Image' },
  { key: 'vietnamese', header: 'Vietnamese' },
  { key: 'suggestion', header: 'Suggestion' },
  { key: 'keyword', header: 'Keyword' },
  { key: 'transcription', header: 'Transcription' },
  { key: 'explanation', header: 'Explanation' },
  { key: 'soundTag', header: 'Sound' },
  { key: 'example', header: 'Example' },
];
