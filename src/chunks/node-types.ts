import type { Language } from './languages.js';
import type { NodeType } from './types.js';

const JAVASCRIPT_CHUNKABLE = [
  'class_declaration',
  'function_declaration',
  'generator_function_declaration',
  'method_definition',
  'arrow_function',
] as const;

// Типы узлов, из которых получаются чанки.
export const CHUNKABLE_NODE_TYPES: Readonly<Record<Language, ReadonlySet<string>>> = {
  csharp: new Set([
    'class_declaration',
    'interface_declaration',
    'struct_declaration',
    'record_declaration',
    'record_struct_declaration',
    'enum_declaration',
    'method_declaration',
    'constructor_declaration',
    'property_declaration',
    'field_declaration',
    'event_declaration',
    'event_field_declaration',
    'delegate_declaration',
  ]),
  javascript: new Set(JAVASCRIPT_CHUNKABLE),
  typescript: new Set([
    ...JAVASCRIPT_CHUNKABLE,
    'abstract_class_declaration',
    'interface_declaration',
    'enum_declaration',
  ]),
  python: new Set([
    'class_definition',
    'function_definition',
    'async_function_definition',
  ]),
};

// Узлы пространств имён; их имена префиксуют полные имена чанков.
export const NAMESPACE_NODE_TYPES: Readonly<Record<Language, ReadonlySet<string>>> = {
  csharp: new Set(['namespace_declaration', 'file_scoped_namespace_declaration']),
  javascript: new Set(),
  typescript: new Set(['internal_module', 'module']),
  python: new Set(),
};

const NODE_TYPE_MAP: Readonly<Record<string, NodeType>> = {
  class_declaration: 'class',
  abstract_class_declaration: 'class',
  class_definition: 'class',
  interface_declaration: 'interface',
  struct_declaration: 'struct',
  record_declaration: 'record',
  record_struct_declaration: 'record',
  enum_declaration: 'enum',
  method_declaration: 'method',
  method_definition: 'method',
  constructor_declaration: 'constructor',
  property_declaration: 'property',
  field_declaration: 'field',
  event_declaration: 'event',
  event_field_declaration: 'event',
  delegate_declaration: 'delegate',
  namespace_declaration: 'namespace',
  file_scoped_namespace_declaration: 'namespace',
  internal_module: 'namespace',
  function_declaration: 'function',
  generator_function_declaration: 'function',
  function_definition: 'function',
  async_function_definition: 'function',
  arrow_function: 'arrow_function',
  block: 'block',
};

// Тип узла парсера -> NodeType. Неизвестные типы -> 'unknown'.
export function mapNodeType(parserNodeType: string): NodeType {
  return NODE_TYPE_MAP[parserNodeType] ?? 'unknown';
}

// Типы-контейнеры: их имена входят в полные имена вложенных чанков.
export const CONTAINER_NODE_TYPES: ReadonlySet<NodeType> = new Set<NodeType>([
  'class',
  'interface',
  'struct',
  'record',
  'enum',
]);
