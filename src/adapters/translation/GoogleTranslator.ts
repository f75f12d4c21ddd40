import { z } from 'zod';
import { Outcome, absent, failed, found } from '../../core/entities/Outcome';
import { Logger } from '../../core/services/Logger';
import { Translator } from '../../core/services/Translator';
import { FetchFn, getJson } from '../http/fetch';

// translate_a/single answers with nested arrays: [[["dịch", "source", ...], ...], ...]
const responseSchema = z
  .tuple([z.array(z.tuple([z.string().nullable()]).rest(z.unknown()))])
  .rest(z.unknown());

export function joinTranslatedSegments(body: unknown): string | null {
  const parsed = responseSchema.safeParse(body);
  if (!parsed.success) return null;
  return parsed.data[0].map((segment) => segment[0] ?? '').join('').trim();
}

export class GoogleTranslator implements Translator {
  readonly name = 'google';
  private baseUrl: string;

  constructor(
    private logger: Logger,
    private options: { baseUrl?: string; sourceLanguage?: string; timeoutMs?: number; fetchFn?: FetchFn } = {}
  ) {
    this.baseUrl = (options.baseUrl ?? 'https://translate.googleapis.com').replace(/\/+$/, '');
  }

  async translate(text: string, targetLanguage: string): Promise<Outcome<string>> {
    if (!text.trim()) return absent('nothing to translate');

    const params = new URLSearchParams({
      client: 'gtx',
      sl: this.options.sourceLanguage ?? 'en',
      tl: targetLanguage,
      dt: 't',
      q: text,
    });
    try {
      const { status, body } = await getJson(this.options.fetchFn ?? fetch, `${this.baseUrl}/translate_a/single?${params.toString()}`, {
        timeoutMs: this.options.timeoutMs ?? 10000,
      });
      if (body === null) return failed(`translation service returned status ${status}`);

      const translated = joinTranslatedSegments(body);
      if (translated === null) return failed('unexpected translation payload');
      if (!translated) return absent('empty translation');

      this.logger.debug(`Translated '${text}' -> '${translated}'`);
      return found(translated);
    } catch (error) {
      return failed(error);
    }
  }
}
