export class InputWord {
  constructor(
    public readonly keyword: string,
    public readonly translation: string = ''
  ) {}

  static create(keyword: string, translation?: string | null): InputWord {
    return new InputWord((keyword ?? '').trim(), (translation ?? '').trim());
  }

  isValid(): boolean {
    return this.keyword.length > 0;
  }

  hasTranslation(): boolean {
    return this.translation.length > 0;
  }
}
