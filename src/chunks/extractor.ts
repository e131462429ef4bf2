import type { Language } from './languages.js';
import {
  CHUNKABLE_NODE_TYPES,
  CONTAINER_NODE_TYPES,
  NAMESPACE_NODE_TYPES,
  mapNodeType,
} from './node-types.js';
import type { SourceParser, SyntaxNode } from './syntax.js';
import { estimateTokens } from './types.js';
import type { CodeChunk } from './types.js';

// Дочерние узлы, которые могут нести имя объявления.
const IDENTIFIER_NODE_TYPES = new Set([
  'identifier',
  'property_identifier',
  'private_property_identifier',
  'type_identifier',
  'method_identifier',
]);

// Обёртки, внутри которых имя лежит на уровень глубже (поля C#: field -> variable_declaration -> declarator).
const DECLARATOR_WRAPPER_TYPES = new Set(['variable_declaration', 'variable_declarator']);

// Для анонимных функций имя берётся у родителя-привязки: тип родителя -> поле с именем.
const BINDING_NAME_FIELDS: Readonly<Record<string, string>> = {
  variable_declarator: 'name',
  public_field_definition: 'name',
  field_definition: 'property',
  pair: 'key',
};

// Конвертирует строку tree-sitter (0-based) в 1-based.
export function toLine(row: number): number {
  return row + 1;
}

function findIdentifierChild(node: SyntaxNode): string | null {
  // Сначала декларатор: в variable_declaration идентификатор типа стоит раньше имени.
  for (const child of node.children) {
    if (DECLARATOR_WRAPPER_TYPES.has(child.type)) {
      const nested = findIdentifierChild(child);
      if (nested) {
        return nested;
      }
    }
  }
  for (const child of node.children) {
    if (IDENTIFIER_NODE_TYPES.has(child.type)) {
      return child.text;
    }
  }
  return null;
}

/**
 * Имя объявления: поле name, затем имя привязки для анонимных функций,
 * затем первый идентификатор среди детей.
 */
export function resolveName(node: SyntaxNode): string | null {
  const nameNode = node.childForFieldName('name');
  if (nameNode && nameNode.text.trim()) {
    return nameNode.text;
  }

  const parent = node.parent;
  if (parent) {
    const field = BINDING_NAME_FIELDS[parent.type];
    const bindingNode = field ? parent.childForFieldName(field) : null;
    if (bindingNode && bindingNode.text.trim()) {
      return bindingNode.text;
    }
  }

  // Идентификатор-ребёнок стрелочной функции — это её параметр, а не имя.
  if (node.type === 'arrow_function') {
    return null;
  }

  return findIdentifierChild(node);
}

/**
 * Цепочка пространств имён файла до самого глубокого вложения (A.B для namespace A { namespace B }).
 * Берётся первое вхождение максимальной глубины.
 */
export function findNamespace(root: SyntaxNode, language: Language): string | null {
  const namespaceTypes = NAMESPACE_NODE_TYPES[language];
  if (namespaceTypes.size === 0) {
    return null;
  }

  let deepest: string[] = [];
  const stack: Array<{ node: SyntaxNode; chain: string[] }> = [{ node: root, chain: [] }];

  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) {
      break;
    }

    let chain = entry.chain;
    if (namespaceTypes.has(entry.node.type)) {
      const name = entry.node.childForFieldName('name')?.text;
      if (name) {
        chain = [...chain, name];
        if (chain.length > deepest.length) {
          deepest = chain;
        }
      }
    }

    const children = entry.node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) {
        stack.push({ node: child, chain });
      }
    }
  }

  return deepest.length > 0 ? deepest.join('.') : null;
}

/**
 * Делает полные имена уникальными в пределах файла (перегрузки, getter/setter).
 * Первое вхождение сохраняет имя, повторы получают суффикс @строка.
 */
export function withUniqueNames(chunks: CodeChunk[]): CodeChunk[] {
  const used = new Set<string>();
  return chunks.map((chunk) => {
    const base = chunk.fullyQualifiedName;
    let name = base;
    if (used.has(name)) {
      name = `${base}@${chunk.startLine}`;
      for (let n = 2; used.has(name); n++) {
        name = `${base}@${chunk.startLine}_${n}`;
      }
    }
    used.add(name);
    return name === base ? chunk : { ...chunk, fullyQualifiedName: name };
  });
}

/**
 * Извлекает структурные чанки из исходного файла.
 * Не обращается к файловой системе, эмбеддеру и хранилищу.
 */
export class ChunkExtractor {
  constructor(private readonly parser: SourceParser) {}

  // Есть ли грамматика для языка.
  supports(language: Language): boolean {
    return this.parser.supports(language);
  }

  extract(content: string, language: Language, filePath: string): CodeChunk[] {
    if (!content.trim()) {
      return [];
    }

    // Исключение парсера уходит вызывающему: это ошибка файла, а не пустой файл.
    const tree = this.parser.parse(content, language, filePath);
    if (!tree) {
      return [];
    }

    return this.extractFromTree(tree.rootNode, language, filePath);
  }

  // Обход дерева в прямом порядке с явным стеком: глубина вложенности не ограничена стеком вызовов.
  extractFromTree(root: SyntaxNode, language: Language, filePath: string): CodeChunk[] {
    const chunkable = CHUNKABLE_NODE_TYPES[language];
    const namespace = findNamespace(root, language);
    const chunks: CodeChunk[] = [];

    const stack: Array<{ node: SyntaxNode; scope: string[] }> = [{ node: root, scope: [] }];

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) {
        break;
      }

      const { node } = entry;
      let scope = entry.scope;

      if (chunkable.has(node.type)) {
        const chunk = this.createChunk(node, language, filePath, namespace, scope);
        if (chunk) {
          chunks.push(chunk);
          const name = resolveName(node);
          if (name && CONTAINER_NODE_TYPES.has(chunk.nodeType)) {
            scope = [...scope, name];
          }
        }
      }

      const children = node.children;
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) {
          stack.push({ node: child, scope });
        }
      }
    }

    return withUniqueNames(chunks);
  }

  private createChunk(
    node: SyntaxNode,
    language: Language,
    filePath: string,
    namespace: string | null,
    scope: string[],
  ): CodeChunk | null {
    const content = node.text;
    if (!content.trim()) {
      return null;
    }

    const nodeType = mapNodeType(node.type);
    const startLine = toLine(node.startPosition.row);
    const name = resolveName(node) ?? `${nodeType}_${startLine}`;
    const qualifiedParts = namespace ? [namespace, ...scope, name] : [...scope, name];

    return {
      filePath,
      fullyQualifiedName: qualifiedParts.join('.'),
      nodeType,
      language,
      content,
      startLine,
      endLine: toLine(node.endPosition.row),
      tokenCount: estimateTokens(content),
      charCount: content.length,
    };
  }
}
