// OpenAI-based Translator implementation using the Responses API.
// Note: Requires an API key; selected with TRANSLATION_PROVIDER=openai.

import OpenAI from 'openai';
import type { Response as OpenAIResponse } from 'openai/resources/responses/responses';
import { Outcome, absent, failed, found } from '../../core/entities/Outcome';
import { Logger } from '../../core/services/Logger';
import { Translator } from '../../core/services/Translator';
import { buildSystemPrompt, buildUserPrompt } from './prompts';

export class OpenAITranslator implements Translator {
  readonly name = 'openai';

  constructor(
    private client: OpenAI,
    private model: string,
    private logger: Logger,
    private options: { sourceLanguage?: string; temperature?: number; timeoutMs?: number } = {}
  ) {}

  private isTemperatureSupported(): boolean {
    // Reasoning models reject the temperature parameter
    const temperatureSupportedModels = ['gpt-4o', 'gpt-4.1', 'gpt-4-turbo'];
    return temperatureSupportedModels.some((model) => this.model.includes(model));
  }

  private extractText(res: OpenAIResponse): { text: string } | { refusal: string } {
    if (typeof res.output_text === 'string' && res.output_text.trim()) {
      return { text: res.output_text };
    }
    const parts: string[] = [];
    for (const item of res.output ?? []) {
      if (item.type !== 'message') continue;
      for (const content of item.content) {
        if (content.type === 'refusal') return { refusal: content.refusal };
        if (content.type === 'output_text') parts.push(content.text);
      }
    }
    return { text: parts.join('') };
  }

  async translate(text: string, targetLanguage: string): Promise<Outcome<string>> {
    if (!text.trim()) return absent('nothing to translate');

    try {
      const startTime = Date.now();
      const res = await this.client.responses.create(
        {
          model: this.model,
          instructions: buildSystemPrompt(this.options.sourceLanguage ?? 'en', targetLanguage),
          input: buildUserPrompt(text),
          stream: false,
          ...(this.options.temperature != null && this.isTemperatureSupported()
            ? { temperature: this.options.temperature }
            : {}),
        },
        { timeout: this.options.timeoutMs ?? 30000 }
      );
      this.logger.debug(`OpenAI translation received in ${Date.now() - startTime}ms`);

      const extracted = this.extractText(res);
      if ('refusal' in extracted) return failed(`Model refused to respond: ${extracted.refusal}`);

      const translated = extracted.text.trim().replace(/^["'“”]+|["'“”]+$/g, '').trim();
      return translated ? found(translated) : absent('empty translation');
    } catch (error) {
      if (error instanceof Error && error.message.includes('API key')) {
        this.logger.error('Invalid or missing OpenAI API key');
      }
      return failed(error);
    }
  }
}
