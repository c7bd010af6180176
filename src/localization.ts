import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { LocalizationMissingError } from './errors.js';

export const LANG_DIR = fileURLToPath(new URL('../lang/', import.meta.url));

export interface Messages {
  language: string;
  templates: Readonly<Record<string, string>>;
}

export type MessageParams = Record<string, string | number>;

export function availableLanguages(dir: string = LANG_DIR): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.json'))
    .map((f) => f.slice(0, -'.json'.length))
    .sort();
}

export function loadMessages(language: string, dir: string = LANG_DIR): Messages {
  const available = availableLanguages(dir);
  if (!available.includes(language)) {
    throw new LocalizationMissingError(language, available);
  }
  const data: unknown = JSON.parse(fs.readFileSync(path.join(dir, `${language}.json`), 'utf-8'));
  if (typeof data !== 'object' || data === null) {
    throw new Error(`Localization file for '${language}' is not an object`);
  }
  const templates: Record<string, string> = {};
  for (const [id, value] of Object.entries(data)) {
    if (typeof value === 'string') templates[id] = value;
  }
  return { language, templates: Object.freeze(templates) };
}

/**
 * Looks up `id` and fills its `{name}` placeholders. Unknown ids and missing
 * values throw, except in production builds where the placeholder is left as is.
 */
export function translate(messages: Messages, id: string, params: MessageParams = {}): string {
  const strict = process.env.NODE_ENV !== 'production';
  const template = messages.templates[id];
  if (template === undefined) {
    if (strict) throw new Error(`Unknown message id '${id}' for language '${messages.language}'`);
    return id;
  }
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = params[name];
    if (value !== undefined) return String(value);
    if (strict) throw new Error(`Missing value for {${name}} in message '${id}'`);
    return placeholder;
  });
}
