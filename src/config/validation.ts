import { z } from 'zod';

type AdapterTimeouts = {
  media: { downloadTimeoutMs: number };
  dictionary: { timeoutMs: number };
  pexels: { timeoutMs: number };
  translation: { timeoutMs: number };
};

// Worst case of one enrichment call; an image is a search followed by a download.
export function longestAdapterCallMs(cfg: AdapterTimeouts): number {
  return Math.max(
    cfg.dictionary.timeoutMs,
    cfg.media.downloadTimeoutMs,
    cfg.pexels.timeoutMs + cfg.media.downloadTimeoutMs,
    cfg.translation.timeoutMs
  );
}

export const configSchema = z
  .object({
    output: z.object({
      path: z.string().min(1),
      missedLogPath: z.string().min(1),
    }),
    media: z.object({
      soundsDir: z.string().min(1),
      imagesDir: z.string().min(1),
      fileSuffix: z.string(),
      downloadTimeoutMs: z.number().int().min(100),
    }),
    dictionary: z.object({
      provider: z.enum(['cambridge', 'free-dictionary']),
      url: z.string().url(),
      timeoutMs: z.number().int().min(100),
      maxExamples: z.number().int().min(0).max(20),
    }),
    pexels: z.object({
      apiKey: z.string().optional(),
      url: z.string().url(),
      timeoutMs: z.number().int().min(100),
    }),
    translation: z.object({
      provider: z.enum(['google', 'openai', 'none']),
      sourceLanguage: z.string().min(2),
      targetLanguage: z.string().min(2),
      url: z.string().url(),
      timeoutMs: z.number().int().min(100),
    }),
    llm: z.object({
      apiKey: z.string().optional(),
      baseUrl: z.string().url(),
      model: z.string().min(1),
    }),
    hint: z.object({
      strategy: z.enum(['alternating', 'spaced']),
    }),
    // Greater than longestAdapterCallMs(): adapters abort their own requests first.
    callTimeoutMs: z.number().int().min(100),
    logging: z.object({
      level: z.enum(['debug', 'info', 'warn', 'error']),
      filePath: z.string().optional(),
      rotate: z.enum(['none', 'size']).default('none'),
      maxSizeMB: z.number().min(1).max(1024).default(10),
      maxFiles: z.number().min(1).max(100).default(5),
    }),
    nodeEnv: z.string(),
  })
  .superRefine((cfg, ctx) => {
    const longest = longestAdapterCallMs(cfg);
    if (cfg.callTimeoutMs <= longest) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['callTimeoutMs'],
        message: `CALL_TIMEOUT_MS (${cfg.callTimeoutMs}) must be greater than the longest adapter call (${longest}ms)`,
      });
    }
    if (cfg.translation.provider === 'openai' && !cfg.llm.apiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['llm', 'apiKey'],
        message: 'OPENAI_API_KEY is required when TRANSLATION_PROVIDER=openai',
      });
    }
  });

export type Config = z.infer<typeof configSchema>;
