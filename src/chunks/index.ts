// Barrel-файл модуля извлечения чанков.
export type { CodeChunk, NodeType } from './types.js';
export { NODE_TYPES, NodeTypeSchema, CHARS_PER_TOKEN, estimateTokens, parseNodeTypes } from './types.js';

export type { Language } from './languages.js';
export {
  LANGUAGES,
  LanguageSchema,
  LANGUAGE_EXTENSIONS,
  detectLanguage,
  extensionsFor,
  parseLanguage,
  parseLanguages,
} from './languages.js';

export type { SourceParser, SyntaxNode, SyntaxTree, Point } from './syntax.js';
export { TreeSitterParser } from './tree-sitter-parser.js';
export { ChunkExtractor, resolveName, findNamespace, toLine } from './extractor.js';
export { mapNodeType, CHUNKABLE_NODE_TYPES } from './node-types.js';
