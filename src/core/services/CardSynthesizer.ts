import { AnkiCard } from '../entities/AnkiCard';
import { EnrichedWord } from '../entities/EnrichedWord';
import { InputWord } from '../entities/InputWord';
import { Outcome, valueOr } from '../entities/Outcome';
import { HintGenerator } from './HintGenerator';

export type CardSources = {
  word: InputWord;
  lookup: Outcome<EnrichedWord>;
  sound: Outcome<string>;
  image: Outcome<string>;
  translation: Outcome<string>;
  number: number;
};

export function formatImage(fileName: string): string {
  return fileName ? `<img src="${fileName}">` : '';
}

export function formatSound(fileName: string): string {
  return fileName ? `[sound:${fileName}]` : '';
}

export function formatExplanation(keyword: string, sense: string): string {
  return sense ? `{{c1::${keyword}}} - ${sense}` : '';
}

// One CSV cell rendered as HTML by Anki, hence <br> rather than a newline.
export function formatExamples(examples: readonly string[]): string {
  return examples.map((ex) => `- ${ex}`).join('<br>');
}

export class CardSynthesizer {
  constructor(private hintGenerator: HintGenerator) {}

  synthesize(sources: CardSources): AnkiCard {
    const { word } = sources;
    const entry = sources.lookup.status === 'found' ? sources.lookup.value : null;

    const vietnamese = word.hasTranslation()
      ? word.translation
      : valueOr(sources.translation, '').trim();

    return new AnkiCard(
      sources.number,
      formatImage(valueOr(sources.image, '')),
      vietnamese,
      this.hintGenerator.generate(word.keyword),
      word.keyword,
      entry?.transcription ?? '',
      entry ? formatExplanation(word.keyword, entry.primarySense) : '',
      formatSound(valueOr(sources.sound, '')),
      entry ? formatExamples(entry.examples) : ''
    );
  }
}
