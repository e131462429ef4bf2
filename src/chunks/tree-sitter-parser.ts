import { createRequire } from 'node:module';
import { extname } from 'node:path';
import { errorMessage } from '../errors.js';
import type { Language } from './languages.js';
import type { SourceParser, SyntaxTree } from './syntax.js';

const require = createRequire(import.meta.url);

// Нативный парсер tree-sitter в объёме, который мы используем.
interface NativeParser {
  setLanguage(language: unknown): void;
  parse(input: string, oldTree?: SyntaxTree | null, options?: { bufferSize?: number }): SyntaxTree;
}

type NativeParserConstructor = new () => NativeParser;

// TSX разбирается отдельным диалектом грамматики TypeScript.
type Dialect = Language | 'tsx';

// Достаёт именованный экспорт модуля грамматики.
function grammarExport(module: unknown, key: string): unknown {
  if (typeof module === 'object' && module !== null && key in module) {
    return Reflect.get(module, key);
  }
  throw new Error(`Grammar module has no "${key}" export`);
}

// Ленивые загрузчики грамматик: модуль подгружается при первом обращении к языку.
const GRAMMAR_LOADERS: Readonly<Record<Dialect, () => unknown>> = {
  csharp: () => require('tree-sitter-c-sharp'),
  javascript: () => require('tree-sitter-javascript'),
  python: () => require('tree-sitter-python'),
  typescript: () => grammarExport(require('tree-sitter-typescript'), 'typescript'),
  tsx: () => grammarExport(require('tree-sitter-typescript'), 'tsx'),
};

function dialectFor(language: Language, filePath?: string): Dialect {
  if (language === 'typescript' && filePath && extname(filePath).toLowerCase() === '.tsx') {
    return 'tsx';
  }
  return language;
}

// SourceParser поверх нативных биндингов tree-sitter.
// Отсутствующая грамматика не ошибка: язык просто не поддерживается.
export class TreeSitterParser implements SourceParser {
  private readonly parsers = new Map<Dialect, NativeParser>();
  private readonly unavailable = new Set<Dialect>();

  parse(source: string, language: Language, filePath?: string): SyntaxTree | null {
    const parser = this.getParser(dialectFor(language, filePath));
    if (!parser) {
      return null;
    }

    // Буфер tree-sitter должен быть минимум 2x размера контента,
    // иначе крупные файлы падают с EINVAL.
    const bufferSize = Math.max(source.length * 2, 65536);
    return parser.parse(source, null, { bufferSize });
  }

  supports(language: Language): boolean {
    return this.getParser(language) !== null;
  }

  private getParser(dialect: Dialect): NativeParser | null {
    const cached = this.parsers.get(dialect);
    if (cached) {
      return cached;
    }
    if (this.unavailable.has(dialect)) {
      return null;
    }

    try {
      const ParserClass: NativeParserConstructor = require('tree-sitter');
      const parser = new ParserClass();
      parser.setLanguage(GRAMMAR_LOADERS[dialect]());
      this.parsers.set(dialect, parser);
      return parser;
    } catch (error) {
      console.warn(`[parser] tree-sitter grammar for ${dialect} is unavailable: ${errorMessage(error)}`);
      this.unavailable.add(dialect);
      return null;
    }
  }
}
