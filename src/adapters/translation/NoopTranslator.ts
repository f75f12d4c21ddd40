import { Outcome, absent } from '../../core/entities/Outcome';
import { Translator } from '../../core/services/Translator';

// Placeholder translator used when translation is disabled. Returns nothing.
export class NoopTranslator implements Translator {
  readonly name = 'none';

  async translate(text: string, targetLanguage: string): Promise<Outcome<string>> {
    void text;
    void targetLanguage;
    return absent('translation disabled');
  }
}
