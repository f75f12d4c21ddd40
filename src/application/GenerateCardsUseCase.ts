import { AnkiCard } from '../core/entities/AnkiCard';
import { EnrichedWord } from '../core/entities/EnrichedWord';
import { InputWord } from '../core/entities/InputWord';
import { Outcome, absent, describeError, failed } from '../core/entities/Outcome';
import { CardSink } from '../core/repositories/CardSink';
import { MissedWordsLog } from '../core/repositories/MissedWordsLog';
import { WordSource } from '../core/repositories/WordSource';
import { CardSynthesizer } from '../core/services/CardSynthesizer';
import { DictionaryLookup } from '../core/services/DictionaryLookup';
import { Logger } from '../core/services/Logger';
import { AudioFetcher, ImageFetcher } from '../core/services/MediaFetcher';
import { Translator } from '../core/services/Translator';

export type EnrichmentSource = 'lookup' | 'sound' | 'image' | 'translation';

const SOURCES: readonly EnrichmentSource[] = ['lookup', 'sound', 'image', 'translation'];

export type Collaborators = {
  dictionary: DictionaryLookup;
  audioFetcher: AudioFetcher;
  imageFetcher: ImageFetcher;
  translator: Translator;
  synthesizer: CardSynthesizer;
};

type Options = {
  soundsDir?: string;
  imagesDir?: string;
  targetLanguage?: string;
  callTimeoutMs?: number;
};

export type GenerationResult = {
  cards: AnkiCard[];
  skipped: number;
  lookupMisses: string[];
  degraded: Record<EnrichmentSource, number>;
};

export type GenerationSummary = {
  read: number;
  written: number;
  skipped: number;
  lookupMisses: string[];
  degraded: Record<EnrichmentSource, number>;
  outputPath: string;
};

export class GenerateCardsUseCase {
  private soundsDir: string;
  private imagesDir: string;
  private targetLanguage: string;
  private callTimeoutMs: number;

  constructor(
    private collaborators: Collaborators,
    private wordSource: WordSource,
    private cardSink: CardSink,
    private logger: Logger,
    private missedWordsLog?: MissedWordsLog,
    options: Options = {}
  ) {
    this.soundsDir = options.soundsDir ?? 'output/sounds';
    this.imagesDir = options.imagesDir ?? 'output/images';
    this.targetLanguage = options.targetLanguage ?? 'vi';
    this.callTimeoutMs = options.callTimeoutMs ?? 45000;
  }

  // Reads the input table, builds every card and writes the output table.
  // Only source/sink failures reach the caller.
  async execute(): Promise<GenerationSummary> {
    this.logger.time('generate-cards');

    const words = await this.wordSource.readWords();
    this.logger.info(`Read ${words.length} input rows`);

    const result = await this.generate(words);

    this.logger.time('write-cards');
    await this.cardSink.writeCards(result.cards);
    this.logger.timeEnd('write-cards');
    this.logger.info(`Written ${result.cards.length} cards to ${this.cardSink.location}`);

    if (result.lookupMisses.length > 0) {
      this.logger.warn(`${result.lookupMisses.length} word(s) not found in dictionary:`);
      for (const w of result.lookupMisses) this.logger.warn(`  - ${w}`);
      await this.writeMissedWords(result.lookupMisses);
    }

    const totalTime = this.logger.timeEnd('generate-cards');
    this.logger.info(
      `Generated ${result.cards.length} cards in ${totalTime}ms ` +
        `(skipped ${result.skipped} invalid rows; degraded lookup=${result.degraded.lookup}, ` +
        `sound=${result.degraded.sound}, image=${result.degraded.image}, translation=${result.degraded.translation})`
    );

    return {
      read: words.length,
      written: result.cards.length,
      skipped: result.skipped,
      lookupMisses: result.lookupMisses,
      degraded: result.degraded,
      outputPath: this.cardSink.location,
    };
  }

  // Side report: a write failure is logged, not raised.
  private async writeMissedWords(words: string[]): Promise<void> {
    if (!this.missedWordsLog) return;
    try {
      await this.missedWordsLog.write(words);
      this.logger.info(`Missed words saved to: ${this.missedWordsLog.location}`);
    } catch (error) {
      this.logger.warn(`Could not write missed words to ${this.missedWordsLog.location}: ${describeError(error)}`);
    }
  }

  // Processes words strictly in input order; a word is finished before the next starts.
  async generate(words: InputWord[]): Promise<GenerationResult> {
    const cards: AnkiCard[] = [];
    const lookupMisses: string[] = [];
    const degraded: Record<EnrichmentSource, number> = { lookup: 0, sound: 0, image: 0, translation: 0 };
    let skipped = 0;

    for (let i = 0; i < words.length; i++) {
      const word = words[i];
      if (!word.isValid()) {
        skipped++;
        this.logger.warn(`Row ${i + 1}: empty keyword, skipping`);
        continue;
      }

      const number = cards.length + 1;
      this.logger.info(`Processing ${i + 1}/${words.length}: ${word.keyword}`);
      this.logger.time(`word-${number}`);

      const sources = await this.enrich(word);
      for (const source of SOURCES) {
        if (sources[source].status === 'failed') degraded[source]++;
      }
      if (sources.lookup.status !== 'found') lookupMisses.push(word.keyword);

      cards.push(this.collaborators.synthesizer.synthesize({ word, number, ...sources }));
      this.logger.timeEnd(`word-${number}`);
    }

    return { cards, skipped, lookupMisses, degraded };
  }

  private async enrich(word: InputWord): Promise<{
    lookup: Outcome<EnrichedWord>;
    sound: Outcome<string>;
    image: Outcome<string>;
    translation: Outcome<string>;
  }> {
    const { dictionary, audioFetcher, imageFetcher, translator } = this.collaborators;
    const keyword = word.keyword;

    // Image and translation do not depend on the lookup; audio needs its URL.
    const imagePending = this.settle('image', keyword, () => imageFetcher.fetchImage(keyword, this.imagesDir));
    const translationPending: Promise<Outcome<string>> = word.hasTranslation()
      ? Promise.resolve(absent('translation provided'))
      : this.settle('translation', keyword, () => translator.translate(keyword, this.targetLanguage));

    const lookup = await this.settle('lookup', keyword, () => dictionary.lookup(keyword));
    const audioUrl = lookup.status === 'found' ? lookup.value.audioUrl : null;
    const sound = await this.settle('sound', keyword, () =>
      audioFetcher.fetchAudio(keyword, this.soundsDir, audioUrl)
    );

    const [image, translation] = await Promise.all([imagePending, translationPending]);
    return { lookup, sound, image, translation };
  }

  // Turns a throw or a timeout into a failed outcome so one call cannot sink the row.
  private async settle<T>(
    source: EnrichmentSource,
    keyword: string,
    call: () => Promise<Outcome<T>>
  ): Promise<Outcome<T>> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<Outcome<T>>((resolve) => {
      timer = setTimeout(
        () => resolve(failed(`${source} timed out after ${this.callTimeoutMs}ms`)),
        this.callTimeoutMs
      );
    });

    let outcome: Outcome<T>;
    try {
      outcome = await Promise.race([call(), timeout]);
    } catch (error) {
      outcome = failed(error);
    } finally {
      clearTimeout(timer);
    }

    if (outcome.status === 'failed') {
      this.logger.warn(`  -> ${source} failed for '${keyword}': ${outcome.error}`);
    } else if (outcome.status === 'absent') {
      this.logger.debug(`  -> no ${source} for '${keyword}'${outcome.reason ? ` (${outcome.reason})` : ''}`);
    }
    return outcome;
  }
}
