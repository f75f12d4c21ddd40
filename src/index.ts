#!/usr/bin/env node

import OpenAI from 'openai';
import { ZodError } from 'zod';
import { CambridgeDictionaryGateway } from './adapters/dictionary/CambridgeDictionaryGateway';
import { FreeDictionaryGateway } from './adapters/dictionary/FreeDictionaryGateway';
import { CsvCardSink } from './adapters/csv/CsvCardSink';
import { CsvWordSource } from './adapters/csv/CsvWordSource';
import { ConsoleLogger } from './adapters/logging/ConsoleLogger';
import { NoopImageFetcher } from './adapters/media/NoopImageFetcher';
import { PexelsImageFetcher } from './adapters/media/PexelsImageFetcher';
import { SoundDownloader } from './adapters/media/SoundDownloader';
import { TextMissedWordsLog } from './adapters/report/TextMissedWordsLog';
import { GoogleTranslator } from './adapters/translation/GoogleTranslator';
import { NoopTranslator } from './adapters/translation/NoopTranslator';
import { OpenAITranslator } from './adapters/translation/OpenAITranslator';
import { GenerateCardsUseCase } from './application/GenerateCardsUseCase';
import { parseArgs, USAGE } from './cli/args';
import { buildConfig, Config, loadEnv } from './config';
import { FatalIOError } from './core/errors/FatalIOError';
import { CardSynthesizer } from './core/services/CardSynthesizer';
import { DictionaryLookup } from './core/services/DictionaryLookup';
import { createHintGenerator } from './core/services/HintGenerator';
import { Logger } from './core/services/Logger';
import { ImageFetcher } from './core/services/MediaFetcher';
import { Translator } from './core/services/Translator';

function createDictionary(config: Config, logger: Logger): DictionaryLookup {
  const options = { timeoutMs: config.dictionary.timeoutMs, maxExamples: config.dictionary.maxExamples };
  return config.dictionary.provider === 'free-dictionary'
    ? new FreeDictionaryGateway(config.dictionary.url, logger, options)
    : new CambridgeDictionaryGateway(config.dictionary.url, logger, options);
}

function createImageFetcher(config: Config, logger: Logger): ImageFetcher {
  if (!config.pexels.apiKey) {
    logger.warn('PEXELS_API_KEY not set; cards will have no images');
    return new NoopImageFetcher();
  }
  return new PexelsImageFetcher(config.pexels.apiKey, logger, {
    baseUrl: config.pexels.url,
    suffix: config.media.fileSuffix,
    searchTimeoutMs: config.pexels.timeoutMs,
    downloadTimeoutMs: config.media.downloadTimeoutMs,
  });
}

function createTranslator(config: Config, logger: Logger): Translator {
  switch (config.translation.provider) {
    case 'none':
      return new NoopTranslator();
    case 'openai': {
      // No SDK retries: a retried request could outlive CALL_TIMEOUT_MS.
      const client = new OpenAI({ apiKey: config.llm.apiKey, baseURL: config.llm.baseUrl, maxRetries: 0 });
      return new OpenAITranslator(client, config.llm.model, logger, {
        sourceLanguage: config.translation.sourceLanguage,
        temperature: 0.2,
        timeoutMs: config.translation.timeoutMs,
      });
    }
    case 'google':
      return new GoogleTranslator(logger, {
        baseUrl: config.translation.url,
        sourceLanguage: config.translation.sourceLanguage,
        timeoutMs: config.translation.timeoutMs,
      });
  }
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (args.errors.length > 0 || !args.input) {
    for (const e of args.errors) console.error(`Error: ${e}`);
    console.error(USAGE);
    return 2;
  }

  loadEnv();
  let config: Config;
  try {
    config = buildConfig(process.env, args);
  } catch (error) {
    if (error instanceof ZodError) {
      for (const issue of error.issues) console.error(`Invalid configuration ${issue.path.join('.')}: ${issue.message}`);
      return 1;
    }
    throw error;
  }

  // Initialize logger first
  const logger = new ConsoleLogger(config.logging.level, config.logging.filePath, {
    rotate: config.logging.rotate,
    maxSizeBytes: config.logging.maxSizeMB * 1024 * 1024,
    maxFiles: config.logging.maxFiles,
  });

  try {
    logger.info(`Environment: ${config.nodeEnv}`);
    logger.info(`Dictionary: ${config.dictionary.provider} (${config.dictionary.url})`);
    logger.info(`Translation: ${config.translation.provider} -> ${config.translation.targetLanguage}`);

    const useCase = new GenerateCardsUseCase(
      {
        dictionary: createDictionary(config, logger),
        audioFetcher: new SoundDownloader(logger, {
          suffix: config.media.fileSuffix,
          timeoutMs: config.media.downloadTimeoutMs,
        }),
        imageFetcher: createImageFetcher(config, logger),
        translator: createTranslator(config, logger),
        synthesizer: new CardSynthesizer(createHintGenerator(config.hint.strategy)),
      },
      new CsvWordSource(args.input),
      new CsvCardSink(config.output.path),
      logger,
      new TextMissedWordsLog(config.output.missedLogPath),
      {
        soundsDir: config.media.soundsDir,
        imagesDir: config.media.imagesDir,
        targetLanguage: config.translation.targetLanguage,
        callTimeoutMs: config.callTimeoutMs,
      }
    );

    const summary = await useCase.execute();
    logger.info(`Success! Generated ${summary.written} Anki cards.`);
    logger.info(`Output file: ${summary.outputPath}`);
    logger.info(`Sound files: ${config.media.soundsDir}/`);
    logger.info(`Image files: ${config.media.imagesDir}/`);
    return 0;
  } catch (error) {
    if (error instanceof FatalIOError) {
      logger.error(error.message);
    } else {
      logger.error('Card generation failed:', error);
    }
    return 1;
  } finally {
    await logger.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('Unexpected error:', err);
    process.exitCode = 1;
  });
