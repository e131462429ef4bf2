import { extname } from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../errors.js';

// Поддерживаемые языки исходного кода.
export const LANGUAGES = ['csharp', 'javascript', 'typescript', 'python'] as const;

export const LanguageSchema = z.enum(LANGUAGES);

export type Language = z.infer<typeof LanguageSchema>;

// Расширения файлов по языкам (в нижнем регистре, с точкой).
export const LANGUAGE_EXTENSIONS: Readonly<Record<Language, readonly string[]>> = {
  csharp: ['.cs'],
  javascript: ['.js', '.jsx', '.mjs', '.cjs'],
  typescript: ['.ts', '.tsx', '.mts', '.cts'],
  python: ['.py', '.pyi'],
};

// Синонимы, которые принимают CLI и HTTP.
const LANGUAGE_ALIASES: Readonly<Record<string, Language>> = {
  'cs': 'csharp',
  'c#': 'csharp',
  'js': 'javascript',
  'ts': 'typescript',
  'py': 'python',
};

const EXTENSION_TO_LANGUAGE = new Map<string, Language>(
  LANGUAGES.flatMap((language) =>
    LANGUAGE_EXTENSIONS[language].map((ext): [string, Language] => [ext, language]),
  ),
);

// Определяет язык файла по расширению.
export function detectLanguage(filePath: string): Language | null {
  return EXTENSION_TO_LANGUAGE.get(extname(filePath).toLowerCase()) ?? null;
}

// Расширения для набора языков.
export function extensionsFor(languages: readonly Language[]): string[] {
  return languages.flatMap((language) => [...LANGUAGE_EXTENSIONS[language]]);
}

// Разбирает имя языка из пользовательского ввода. null — неизвестный язык.
export function parseLanguage(value: string): Language | null {
  const normalized = value.trim().toLowerCase();
  const parsed = LanguageSchema.safeParse(normalized);
  if (parsed.success) {
    return parsed.data;
  }
  return LANGUAGE_ALIASES[normalized] ?? null;
}

// Разбирает список языков; бросает ошибку на первом неизвестном.
export function parseLanguages(values: readonly string[]): Language[] {
  const result: Language[] = [];
  for (const value of values) {
    const language = parseLanguage(value);
    if (!language) {
      throw new ValidationError(`Unknown language: ${value}. Supported: ${LANGUAGES.join(', ')}`);
    }
    if (!result.includes(language)) {
      result.push(language);
    }
  }
  return result;
}
