import dotenv from 'dotenv';
import { configSchema, Config } from './validation';

export type { Config } from './validation';

// Values given on the command line; they win over the environment.
export type ConfigOverrides = {
  outputPath?: string;
  soundsDir?: string;
  imagesDir?: string;
  dictionaryUrl?: string;
  missedLogPath?: string;
};

type Env = Record<string, string | undefined>;

const DEFAULT_DICTIONARY_URLS = {
  cambridge: 'https://dictionary-api.eliaschen.dev',
  'free-dictionary': 'https://api.dictionaryapi.dev',
} as const;

// Load environment variables based on NODE_ENV
export function loadEnv(env: Env = process.env): void {
  const envFile = env.NODE_ENV === 'production' ? '.env.production' : '.env';
  dotenv.config({ path: envFile });
}

function int(value: string | undefined, fallback: number): number {
  return value === undefined || value.trim() === '' ? fallback : Number(value);
}

function str(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

// Build and validate the single configuration object threaded into every adapter.
export function buildConfig(env: Env = process.env, overrides: ConfigOverrides = {}): Config {
  const dictionaryProvider = str(env.DICTIONARY_PROVIDER) ?? 'cambridge';
  const defaultDictionaryUrl =
    dictionaryProvider === 'free-dictionary' ? DEFAULT_DICTIONARY_URLS['free-dictionary'] : DEFAULT_DICTIONARY_URLS.cambridge;

  return configSchema.parse({
    output: {
      path: overrides.outputPath ?? str(env.OUTPUT_PATH) ?? 'output.csv',
      missedLogPath: overrides.missedLogPath ?? str(env.MISSED_LOG_PATH) ?? 'skipped_words.txt',
    },
    media: {
      soundsDir: overrides.soundsDir ?? str(env.SOUNDS_DIR) ?? 'output/sounds',
      imagesDir: overrides.imagesDir ?? str(env.IMAGES_DIR) ?? 'output/images',
      fileSuffix: env.MEDIA_FILE_SUFFIX ?? '_auto_tool',
      downloadTimeoutMs: int(env.DOWNLOAD_TIMEOUT_MS, 30000),
    },
    dictionary: {
      provider: dictionaryProvider,
      url: overrides.dictionaryUrl ?? str(env.DICTIONARY_URL) ?? defaultDictionaryUrl,
      timeoutMs: int(env.DICTIONARY_TIMEOUT_MS, 10000),
      maxExamples: int(env.DICTIONARY_MAX_EXAMPLES, 3),
    },
    pexels: {
      apiKey: str(env.PEXELS_API_KEY),
      url: str(env.PEXELS_URL) ?? 'https://api.pexels.com/v1',
      timeoutMs: int(env.PEXELS_TIMEOUT_MS, 10000),
    },
    translation: {
      provider: str(env.TRANSLATION_PROVIDER) ?? 'google',
      sourceLanguage: str(env.TRANSLATION_SOURCE_LANG) ?? 'en',
      targetLanguage: str(env.TRANSLATION_TARGET_LANG) ?? 'vi',
      url: str(env.TRANSLATION_URL) ?? 'https://translate.googleapis.com',
      timeoutMs: int(env.TRANSLATION_TIMEOUT_MS, 10000),
    },
    llm: {
      apiKey: str(env.OPENAI_API_KEY),
      baseUrl: str(env.OPENAI_BASE_URL) ?? 'https://api.openai.com/v1',
      model: str(env.LLM_MODEL) ?? 'gpt-5-nano',
    },
    hint: {
      strategy: str(env.HINT_STRATEGY) ?? 'alternating',
    },
    callTimeoutMs: int(env.CALL_TIMEOUT_MS, 45000),
    logging: {
      level: str(env.LOG_LEVEL) ?? 'info',
      filePath: str(env.LOG_FILE),
      rotate: str(env.LOG_ROTATE) ?? 'none',
      maxSizeMB: int(env.LOG_MAX_SIZE_MB, 10),
      maxFiles: int(env.LOG_MAX_FILES, 5),
    },
    nodeEnv: env.NODE_ENV || 'development',
  });
}
