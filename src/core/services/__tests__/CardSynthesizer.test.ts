import { EnrichedWord } from '../../entities/EnrichedWord';
import { InputWord } from '../../entities/InputWord';
import { absent, failed, found } from '../../entities/Outcome';
import {
  CardSynthesizer,
  formatExamples,
  formatExplanation,
  formatImage,
  formatSound,
} from '../CardSynthesizer';
import { AlternatingHintGenerator } from '../HintGenerator';

describe('card field formatting', () => {
  it('wraps the image file in an img tag', () => {
    expect(formatImage('absorb_auto_tool.jpg')).toBe('<img src="absorb_auto_tool.jpg">');
    expect(formatImage('')).toBe('');
  });

  it('wraps the sound file in an Anki sound tag', () => {
    expect(formatSound('absorb_auto_tool.mp3')).toBe('[sound:absorb_auto_tool.mp3]');
    expect(formatSound('')).toBe('');
  });

  it('builds a cloze explanation only when there is a sense', () => {
    expect(formatExplanation('absorb', 'to take something in')).toBe('{{c1::absorb}} - to take something in');
    expect(formatExplanation('absorb', '')).toBe('');
  });

  it('joins examples with <br>', () => {
    expect(formatExamples(['One.', 'Two.'])).toBe('- One.<br>- Two.');
    expect(formatExamples([])).toBe('');
  });
});

describe('CardSynthesizer', () => {
  const synthesizer = new CardSynthesizer(new AlternatingHintGenerator());
  const entry = EnrichedWord.create({
    word: 'absorb',
    transcription: '/əbˈzɔːrb/',
    primarySense: 'to take in a liquid',
    examples: ['Plants absorb water.', 'A sponge absorbs liquid.'],
    audioUrl: 'https://audio.test/absorb.mp3',
  });

  it('fills every column when all sources succeed', () => {
    const card = synthesizer.synthesize({
      word: InputWord.create('absorb'),
      number: 1,
      lookup: found(entry),
      sound: found('absorb_auto_tool.mp3'),
      image: found('absorb_auto_tool.jpg'),
      translation: found('hấp thụ'),
    });

    expect(card).toEqual({
      number: 1,
      imageHtml: '<img src="absorb_auto_tool.jpg">',
      vietnamese: 'hấp thụ',
      suggestion: '_ b _ o _ b',
      keyword: 'absorb',
      transcription: '/əbˈzɔːrb/',
      explanation: '{{c1::absorb}} - to take in a liquid',
      soundTag: '[sound:absorb_auto_tool.mp3]',
      example: '- Plants absorb water.<br>- A sponge absorbs liquid.',
    });
  });

  it('prefers the translation from the input row', () => {
    const card = synthesizer.synthesize({
      word: InputWord.create('abuse', 'lạm dụng'),
      number: 2,
      lookup: absent(),
      sound: absent(),
      image: absent(),
      translation: found('ngược đãi'),
    });
    expect(card.vietnamese).toBe('lạm dụng');
  });

  it('still produces a card when every source failed', () => {
    const card = synthesizer.synthesize({
      word: InputWord.create('absorb'),
      number: 3,
      lookup: failed('dictionary returned status 500'),
      sound: failed(new Error('socket hang up')),
      image: failed('timed out'),
      translation: failed('offline'),
    });

    expect(card).toEqual({
      number: 3,
      imageHtml: '',
      vietnamese: '',
      suggestion: '_ b _ o _ b',
      keyword: 'absorb',
      transcription: '',
      explanation: '',
      soundTag: '',
      example: '',
    });
  });

  it('leaves the explanation empty when the entry has no sense', () => {
    const card = synthesizer.synthesize({
      word: InputWord.create('absorb'),
      number: 1,
      lookup: found(EnrichedWord.create({ word: 'absorb', transcription: '/x/' })),
      sound: absent(),
      image: absent(),
      translation: absent(),
    });
    expect(card.explanation).toBe('');
    expect(card.transcription).toBe('/x/');
  });
});
