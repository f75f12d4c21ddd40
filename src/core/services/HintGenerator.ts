export type HintStrategy = 'alternating' | 'spaced';

export interface HintGenerator {
  generate(keyword: string): string;
}

const MASK = '_';

function render(chars: string[], isRevealed: (index: number) => boolean): string {
  return chars.map((ch, i) => (isRevealed(i) ? ch : MASK)).join(' ');
}

/**
 * Masks every even position and reveals every odd one, counting from 0:
 * "abuse" -> "_ b _ s _". Every character position is treated the same way,
 * whether or not it is a letter.
 */
export class AlternatingHintGenerator implements HintGenerator {
  generate(keyword: string): string {
    if (keyword.length === 0) {
      throw new RangeError('Cannot build a hint for an empty keyword');
    }
    return render(Array.from(keyword), (i) => i % 2 === 1);
  }
}

/**
 * Reveals two letters (three for words longer than 7) at evenly spaced
 * positions of the lowercased word. The last letter is never revealed; a
 * reveal landing there moves one position left. Words of one or two letters
 * are shown in full.
 */
export class SpacedHintGenerator implements HintGenerator {
  constructor(private readonly revealCount?: number) {}

  generate(keyword: string): string {
    const word = keyword.trim().toLowerCase();
    if (word.length === 0) {
      throw new RangeError('Cannot build a hint for an empty keyword');
    }
    const chars = Array.from(word);
    const length = chars.length;
    if (length <= 2) return chars.join(' ');

    const count = Math.min(this.revealCount ?? (length <= 7 ? 2 : 3), length);
    const step = length / (count + 1);
    const revealed = new Set<number>();
    for (let i = 0; i < count; i++) {
      revealed.add(Math.floor(step * (i + 1)));
    }
    if (revealed.has(length - 1)) {
      revealed.delete(length - 1);
      revealed.add(length - 2);
    }
    return render(chars, (i) => revealed.has(i));
  }
}

export function createHintGenerator(strategy: HintStrategy): HintGenerator {
  switch (strategy) {
    case 'spaced':
      return new SpacedHintGenerator();
    case 'alternating':
      return new AlternatingHintGenerator();
  }
}
