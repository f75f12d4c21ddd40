import { GenerateCardsUseCase } from '../GenerateCardsUseCase';
import { EnrichedWord } from '../../core/entities/EnrichedWord';
import { InputWord } from '../../core/entities/InputWord';
import { absent, failed, found } from '../../core/entities/Outcome';
import { FatalIOError } from '../../core/errors/FatalIOError';
import { CardSink } from '../../core/repositories/CardSink';
import { MissedWordsLog } from '../../core/repositories/MissedWordsLog';
import { WordSource } from '../../core/repositories/WordSource';
import { CardSynthesizer } from '../../core/services/CardSynthesizer';
import { DictionaryLookup } from '../../core/services/DictionaryLookup';
import { AlternatingHintGenerator } from '../../core/services/HintGenerator';
import { Logger } from '../../core/services/Logger';
import { AudioFetcher, ImageFetcher } from '../../core/services/MediaFetcher';
import { Translator } from '../../core/services/Translator';
import { createMockLogger } from '../../test/mocks';

const absorbEntry = EnrichedWord.create({
  word: 'absorb',
  transcription: '/əbˈzɔːrb/',
  primarySense: 'to take in a liquid',
  examples: ['Plants absorb water.'],
  audioUrl: 'https://audio.test/absorb.mp3',
});

describe('GenerateCardsUseCase', () => {
  let useCase: GenerateCardsUseCase;
  let mockDictionary: jest.Mocked<DictionaryLookup>;
  let mockAudioFetcher: jest.Mocked<AudioFetcher>;
  let mockImageFetcher: jest.Mocked<ImageFetcher>;
  let mockTranslator: jest.Mocked<Translator>;
  let mockWordSource: jest.Mocked<WordSource>;
  let mockCardSink: jest.Mocked<CardSink>;
  let mockMissedWordsLog: jest.Mocked<MissedWordsLog>;
  let mockLogger: jest.Mocked<Logger>;

  const words = [InputWord.create('absorb'), InputWord.create('  '), InputWord.create('abuse', 'lạm dụng')];

  beforeEach(() => {
    mockDictionary = {
      name: 'test-dictionary',
      lookup: jest.fn(async (word: string) =>
        word === 'absorb' ? found(absorbEntry) : absent<EnrichedWord>('not found in dictionary')
      ),
    };
    mockAudioFetcher = {
      fetchAudio: jest.fn(async (word: string, _dir: string, sourceUrl?: string | null) =>
        sourceUrl ? found(`${word}_auto_tool.mp3`) : absent<string>('no pronunciation url')
      ),
    };
    mockImageFetcher = {
      fetchImage: jest.fn(async (word: string, _dir: string) => found(`${word}_auto_tool.jpg`)),
    };
    mockTranslator = {
      name: 'test-translator',
      translate: jest.fn().mockResolvedValue(found('hấp thụ')),
    };
    mockWordSource = { readWords: jest.fn().mockResolvedValue(words) };
    mockCardSink = { location: 'out/cards.csv', writeCards: jest.fn().mockResolvedValue(undefined) };
    mockMissedWordsLog = { location: 'out/skipped.txt', write: jest.fn().mockResolvedValue(undefined) };
    mockLogger = createMockLogger();

    useCase = createUseCase(1000);
  });

  function createUseCase(callTimeoutMs: number): GenerateCardsUseCase {
    return new GenerateCardsUseCase(
      {
        dictionary: mockDictionary,
        audioFetcher: mockAudioFetcher,
        imageFetcher: mockImageFetcher,
        translator: mockTranslator,
        synthesizer: new CardSynthesizer(new AlternatingHintGenerator()),
      },
      mockWordSource,
      mockCardSink,
      mockLogger,
      mockMissedWordsLog,
      { soundsDir: 'out/sounds', imagesDir: 'out/images', targetLanguage: 'vi', callTimeoutMs }
    );
  }

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('generate', () => {
    it('numbers cards densely and skips rows without a keyword', async () => {
      const result = await useCase.generate(words);

      expect(result.cards.map((c) => [c.number, c.keyword])).toEqual([
        [1, 'absorb'],
        [2, 'abuse'],
      ]);
      expect(result.skipped).toBe(1);
      expect(mockLogger.warn).toHaveBeenCalledWith('Row 2: empty keyword, skipping');
    });

    it('builds a full card from every source', async () => {
      const result = await useCase.generate([InputWord.create('absorb')]);

      expect(result.cards[0]).toEqual({
        number: 1,
        imageHtml: '<img src="absorb_auto_tool.jpg">',
        vietnamese: 'hấp thụ',
        suggestion: '_ b _ o _ b',
        keyword: 'absorb',
        transcription: '/əbˈzɔːrb/',
        explanation: '{{c1::absorb}} - to take in a liquid',
        soundTag: '[sound:absorb_auto_tool.mp3]',
        example: '- Plants absorb water.',
      });
      expect(mockAudioFetcher.fetchAudio).toHaveBeenCalledWith(
        'absorb',
        'out/sounds',
        'https://audio.test/absorb.mp3'
      );
      expect(mockImageFetcher.fetchImage).toHaveBeenCalledWith('absorb', 'out/images');
      expect(mockTranslator.translate).toHaveBeenCalledWith('absorb', 'vi');
    });

    it('does not call the translator when the row has a translation', async () => {
      const result = await useCase.generate([InputWord.create('abuse', 'lạm dụng')]);

      expect(mockTranslator.translate).not.toHaveBeenCalled();
      expect(result.cards[0].vietnamese).toBe('lạm dụng');
    });

    it('keeps a row the dictionary does not know and records it as missed', async () => {
      const result = await useCase.generate([InputWord.create('abuse', 'lạm dụng')]);

      expect(result.lookupMisses).toEqual(['abuse']);
      expect(mockAudioFetcher.fetchAudio).toHaveBeenCalledWith('abuse', 'out/sounds', null);
      expect(result.cards[0]).toEqual({
        number: 1,
        imageHtml: '<img src="abuse_auto_tool.jpg">',
        vietnamese: 'lạm dụng',
        suggestion: '_ b _ s _',
        keyword: 'abuse',
        transcription: '',
        explanation: '',
        soundTag: '',
        example: '',
      });
      expect(result.degraded).toEqual({ lookup: 0, sound: 0, image: 0, translation: 0 });
    });

    it('leaves the translation empty when the translator fails', async () => {
      mockTranslator.translate.mockResolvedValue(failed('service unavailable'));

      const result = await useCase.generate([InputWord.create('absorb')]);

      expect(result.cards[0].vietnamese).toBe('');
      expect(result.degraded.translation).toBe(1);
      expect(mockLogger.warn).toHaveBeenCalledWith("  -> translation failed for 'absorb': service unavailable");
    });

    it('turns a thrown lookup error into a degraded row', async () => {
      mockDictionary.lookup.mockRejectedValue(new Error('socket hang up'));

      const result = await useCase.generate([InputWord.create('absorb')]);

      expect(result.cards).toHaveLength(1);
      expect(result.cards[0].explanation).toBe('');
      expect(result.degraded.lookup).toBe(1);
      expect(result.lookupMisses).toEqual(['absorb']);
      expect(mockAudioFetcher.fetchAudio).toHaveBeenCalledWith('absorb', 'out/sounds', null);
      expect(mockLogger.warn).toHaveBeenCalledWith("  -> lookup failed for 'absorb': socket hang up");
    });

    it('gives up on a call that does not settle in time', async () => {
      mockImageFetcher.fetchImage.mockReturnValue(new Promise(() => undefined));
      useCase = createUseCase(50);

      const result = await useCase.generate([InputWord.create('absorb')]);

      expect(result.cards[0].imageHtml).toBe('');
      expect(result.cards[0].soundTag).toBe('[sound:absorb_auto_tool.mp3]');
      expect(result.degraded.image).toBe(1);
      expect(mockLogger.warn).toHaveBeenCalledWith("  -> image failed for 'absorb': image timed out after 50ms");
    });

    it('fills an empty translation from the translator', async () => {
      mockTranslator.translate.mockResolvedValue(found('hút'));

      const result = await useCase.generate([InputWord.create('absorb', '')]);

      expect(result.cards[0].vietnamese).toBe('hút');
    });

    it('builds cards from looked-up and unknown words alike', async () => {
      mockDictionary.lookup.mockImplementation(async (word: string) =>
        word === 'abuse'
          ? found(
              EnrichedWord.create({
                word: 'abuse',
                transcription: '/əˈbjuːs/',
                primarySense: 'to use wrongly',
                examples: ['He abused his power.'],
              })
            )
          : absent<EnrichedWord>('not found in dictionary')
      );
      mockImageFetcher.fetchImage.mockResolvedValue(absent('no images'));
      mockTranslator.translate.mockResolvedValue(found('mua được'));

      const result = await useCase.generate([
        InputWord.create('abuse', 'lăng mạ, xỉ nhục'),
        InputWord.create('acquire', ''),
      ]);

      expect(result.cards).toEqual([
        {
          number: 1,
          imageHtml: '',
          vietnamese: 'lăng mạ, xỉ nhục',
          suggestion: '_ b _ s _',
          keyword: 'abuse',
          transcription: '/əˈbjuːs/',
          explanation: '{{c1::abuse}} - to use wrongly',
          soundTag: '',
          example: '- He abused his power.',
        },
        {
          number: 2,
          imageHtml: '',
          vietnamese: 'mua được',
          suggestion: '_ c _ u _ r _',
          keyword: 'acquire',
          transcription: '',
          explanation: '',
          soundTag: '',
          example: '',
        },
      ]);
      expect(mockTranslator.translate).toHaveBeenCalledTimes(1);
      expect(mockTranslator.translate).toHaveBeenCalledWith('acquire', 'vi');
      expect(result.lookupMisses).toEqual(['acquire']);
    });

    it('produces a card even when every source fails', async () => {
      mockDictionary.lookup.mockResolvedValue(failed('dictionary returned status 500'));
      mockAudioFetcher.fetchAudio.mockRejectedValue(new Error('disk full'));
      mockImageFetcher.fetchImage.mockResolvedValue(failed('Pexels rate limit hit'));
      mockTranslator.translate.mockRejectedValue(new Error('offline'));

      const result = await useCase.generate([InputWord.create('absorb')]);

      expect(result.cards[0]).toEqual({
        number: 1,
        imageHtml: '',
        vietnamese: '',
        suggestion: '_ b _ o _ b',
        keyword: 'absorb',
        transcription: '',
        explanation: '',
        soundTag: '',
        example: '',
      });
      expect(result.degraded).toEqual({ lookup: 1, sound: 1, image: 1, translation: 1 });
    });
  });

  describe('execute', () => {
    it('writes the cards and the missed words', async () => {
      const summary = await useCase.execute();

      expect(mockCardSink.writeCards).toHaveBeenCalledTimes(1);
      expect(mockCardSink.writeCards.mock.calls[0][0].map((c) => c.keyword)).toEqual(['absorb', 'abuse']);
      expect(mockMissedWordsLog.write).toHaveBeenCalledWith(['abuse']);
      expect(summary).toEqual({
        read: 3,
        written: 2,
        skipped: 1,
        lookupMisses: ['abuse'],
        degraded: { lookup: 0, sound: 0, image: 0, translation: 0 },
        outputPath: 'out/cards.csv',
      });
      expect(mockLogger.info).toHaveBeenCalledWith('Written 2 cards to out/cards.csv');
    });

    it('does not write the missed words log when every word was found', async () => {
      mockWordSource.readWords.mockResolvedValue([InputWord.create('absorb')]);

      await useCase.execute();

      expect(mockMissedWordsLog.write).not.toHaveBeenCalled();
    });

    it('still succeeds when the missed words log cannot be written', async () => {
      mockMissedWordsLog.write.mockRejectedValue(new Error('EEXIST: file already exists'));

      const summary = await useCase.execute();

      expect(mockCardSink.writeCards).toHaveBeenCalledTimes(1);
      expect(summary.written).toBe(2);
      expect(summary.lookupMisses).toEqual(['abuse']);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        'Could not write missed words to out/skipped.txt: EEXIST: file already exists'
      );
      expect(mockLogger.info).not.toHaveBeenCalledWith('Missed words saved to: out/skipped.txt');
    });

    it('writes a header-only table for an empty input', async () => {
      mockWordSource.readWords.mockResolvedValue([]);

      const summary = await useCase.execute();

      expect(mockCardSink.writeCards).toHaveBeenCalledWith([]);
      expect(summary.written).toBe(0);
    });

    it('propagates a fatal input error without writing anything', async () => {
      mockWordSource.readWords.mockRejectedValue(new FatalIOError('Input file not found', 'missing.csv'));

      await expect(useCase.execute()).rejects.toBeInstanceOf(FatalIOError);
      expect(mockCardSink.writeCards).not.toHaveBeenCalled();
    });

    it('propagates a fatal output error', async () => {
      mockCardSink.writeCards.mockRejectedValue(new FatalIOError('Cannot write output file', 'out/cards.csv'));

      await expect(useCase.execute()).rejects.toThrow('Cannot write output file');
    });
  });
});
