import catalogue from './messages.json';
import { DEFAULT_LANGUAGE } from '../screening/sessionState';

export type MessageKey = keyof typeof catalogue.nl;

const MESSAGES: Record<string, Partial<Record<MessageKey, string>>> = catalogue;

export const SUPPORTED_LANGUAGES: readonly string[] = Object.keys(MESSAGES);

export function isSupportedLanguage(language: string): boolean {
  return SUPPORTED_LANGUAGES.includes(language);
}

/**
 * Fixed utterance in the requested language, Dutch when the language or key is
 * missing. `{placeholder}` tokens are filled from `vars`; unknown ones stay.
 */
export function message(
  language: string,
  key: MessageKey,
  vars: Record<string, string> = {},
): string {
  const template = MESSAGES[language]?.[key] ?? catalogue[DEFAULT_LANGUAGE][key];
  return template.replace(/\{(\w+)\}/g, (token: string, name: string) => vars[name] ?? token);
}
