import { z } from 'zod';
import { EnrichedWord } from '../../core/entities/EnrichedWord';
import { Outcome, absent, failed, found } from '../../core/entities/Outcome';
import { DictionaryLookup } from '../../core/services/DictionaryLookup';
import { Logger } from '../../core/services/Logger';
import { FetchFn, getJson } from '../http/fetch';

const pronunciationSchema = z.object({
  lang: z.string().optional(),
  url: z.string().optional(),
  pron: z.string().optional(),
});

const definitionSchema = z.object({
  text: z.string().optional(),
  example: z.array(z.object({ text: z.string().optional() })).optional(),
});

const responseSchema = z.object({
  pronunciation: z.array(pronunciationSchema).optional(),
  definition: z.array(definitionSchema).optional(),
});

export type CambridgeResponse = z.infer<typeof responseSchema>;

/**
 * Normalize a Cambridge-style dictionary payload. Prefers the US
 * pronunciation, takes the first definition as the primary sense and collects
 * examples across all definitions. Returns null when there is no definition.
 */
export function normalizeCambridgeResponse(
  word: string,
  data: CambridgeResponse,
  maxExamples: number
): EnrichedWord | null {
  const pronunciations = data.pronunciation ?? [];
  const pron = pronunciations.find((p) => p.lang === 'us') ?? pronunciations[0];

  const definitions = data.definition ?? [];
  const sense = (definitions[0]?.text ?? '').trim().replace(/:+$/, '').trim();
  if (!sense) return null;

  const examples: string[] = [];
  for (const def of definitions) {
    for (const ex of def.example ?? []) {
      const text = (ex.text ?? '').trim();
      if (text && examples.length < maxExamples) examples.push(text);
    }
  }

  return EnrichedWord.create({
    word,
    transcription: pron?.pron ?? null,
    primarySense: sense,
    examples,
    audioUrl: pron?.url ?? null,
  });
}

export class CambridgeDictionaryGateway implements DictionaryLookup {
  readonly name = 'cambridge';
  private baseUrl: string;

  constructor(
    baseUrl: string,
    private logger: Logger,
    private options: { timeoutMs?: number; maxExamples?: number; fetchFn?: FetchFn } = {}
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async lookup(word: string): Promise<Outcome<EnrichedWord>> {
    const url = `${this.baseUrl}/api/dictionary/en/${encodeURIComponent(word)}`;
    this.logger.debug(`Dictionary request: ${url}`);
    try {
      const { status, body } = await getJson(this.options.fetchFn ?? fetch, url, {
        timeoutMs: this.options.timeoutMs ?? 10000,
      });
      if (status === 404) return absent('not found in dictionary');
      if (body === null) return failed(`dictionary returned status ${status}`);

      const parsed = responseSchema.safeParse(body);
      if (!parsed.success) return failed(`unexpected dictionary payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);

      const entry = normalizeCambridgeResponse(word, parsed.data, this.options.maxExamples ?? 3);
      return entry ? found(entry) : absent('no definition');
    } catch (error) {
      return failed(error);
    }
  }
}
