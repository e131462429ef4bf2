// Минимальный контракт синтаксического дерева, на который опирается экстрактор.
// Ему структурно соответствуют узлы нативного tree-sitter, и его же реализуют
// рукописные деревья в тестах.
import type { Language } from './languages.js';

export interface Point {
  row: number;
  column: number;
}

export interface SyntaxNode {
  readonly type: string;
  readonly text: string;
  readonly startPosition: Point;
  readonly endPosition: Point;
  readonly children: readonly SyntaxNode[];
  readonly parent: SyntaxNode | null;
  childForFieldName(fieldName: string): SyntaxNode | null;
}

export interface SyntaxTree {
  readonly rootNode: SyntaxNode;
}

// Парсер исходного кода. null — грамматика для языка недоступна.
export interface SourceParser {
  parse(source: string, language: Language, filePath?: string): SyntaxTree | null;
  supports(language: Language): boolean;
}
