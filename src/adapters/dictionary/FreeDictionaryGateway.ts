import { z } from 'zod';
import { EnrichedWord } from '../../core/entities/EnrichedWord';
import { Outcome, absent, failed, found } from '../../core/entities/Outcome';
import { DictionaryLookup } from '../../core/services/DictionaryLookup';
import { Logger } from '../../core/services/Logger';
import { FetchFn, getJson } from '../http/fetch';

const entrySchema = z.object({
  word: z.string(),
  phonetic: z.string().optional(),
  phonetics: z.array(z.object({ text: z.string().optional(), audio: z.string().optional() })).optional(),
  meanings: z
    .array(
      z.object({
        partOfSpeech: z.string().optional(),
        definitions: z.array(z.object({ definition: z.string(), example: z.string().optional() })),
      })
    )
    .default([]),
});

const responseSchema = z.array(entrySchema);

export type FreeDictionaryResponse = z.infer<typeof responseSchema>;

/**
 * Normalize a dictionaryapi.dev response. Prefers a phonetic that carries
 * audio; falls back to any phonetic text.
 */
export function normalizeFreeDictionaryResponse(
  entries: FreeDictionaryResponse,
  maxExamples: number
): EnrichedWord | null {
  const entry = entries[0];
  if (!entry) return null;

  const phonetics = entry.phonetics ?? [];
  const withAudio = phonetics.find((p) => p.audio && p.audio.length > 0);
  const transcription = withAudio?.text ?? phonetics.find((p) => p.text)?.text ?? entry.phonetic ?? '';

  const definitions = entry.meanings.flatMap((m) => m.definitions);
  const sense = definitions[0]?.definition ?? '';
  if (!sense.trim()) return null;

  const examples = definitions
    .map((d) => d.example ?? '')
    .filter((ex) => ex.trim().length > 0)
    .slice(0, maxExamples);

  return EnrichedWord.create({
    word: entry.word,
    transcription,
    primarySense: sense,
    examples,
    audioUrl: withAudio?.audio ?? null,
  });
}

export class FreeDictionaryGateway implements DictionaryLookup {
  readonly name = 'free-dictionary';
  private baseUrl: string;

  constructor(
    baseUrl: string,
    private logger: Logger,
    private options: { timeoutMs?: number; maxExamples?: number; fetchFn?: FetchFn } = {}
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async lookup(word: string): Promise<Outcome<EnrichedWord>> {
    const url = `${this.baseUrl}/api/v2/entries/en/${encodeURIComponent(word)}`;
    this.logger.debug(`Dictionary request: ${url}`);
    try {
      const { status, body } = await getJson(this.options.fetchFn ?? fetch, url, {
        timeoutMs: this.options.timeoutMs ?? 10000,
      });
      // 404 means word not found in dictionary
      if (status === 404) return absent('not found in dictionary');
      if (body === null) return failed(`dictionary returned status ${status}`);

      const parsed = responseSchema.safeParse(body);
      if (!parsed.success) return failed(`unexpected dictionary payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);

      const entry = normalizeFreeDictionaryResponse(parsed.data, this.options.maxExamples ?? 3);
      return entry ? found(entry) : absent('no definition');
    } catch (error) {
      return failed(error);
    }
  }
}
