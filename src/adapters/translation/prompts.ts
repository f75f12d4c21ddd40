// Centralized prompt templates for LLM translation

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  vi: 'Vietnamese',
  fr: 'French',
  de: 'German',
  es: 'Spanish',
  ja: 'Japanese',
  ko: 'Korean',
  zh: 'Chinese',
};

export function languageName(code: string): string {
  return LANGUAGE_NAMES[code.toLowerCase()] ?? code;
}

export function buildSystemPrompt(sourceLanguage: string, targetLanguage: string): string {
  return [
    `You translate ${languageName(sourceLanguage)} vocabulary into ${languageName(targetLanguage)} for flashcards.`,
    'Reply with the translation only: no quotes, no explanations, no transliteration.',
    'Give the most common meaning; when two meanings are equally common, separate them with a comma.',
    'Keep it short enough to fit on a card.',
  ].join(' ');
}

export function buildUserPrompt(text: string): string {
  return `Word or phrase: ${JSON.stringify(text)}`;
}
