import { describe, it, expect, vi, afterEach } from 'vitest';
import { ChunkExtractor, findNamespace, resolveName, withUniqueNames } from '../extractor.js';
import { mapNodeType } from '../node-types.js';
import type { Language } from '../languages.js';
import type { SourceParser, SyntaxNode } from '../syntax.js';
import { ident, node } from './fake-tree.js';

// Парсер, всегда возвращающий заданное дерево.
function parserFor(root: SyntaxNode | null): SourceParser {
  return {
    parse: () => (root ? { rootNode: root } : null),
    supports: () => root !== null,
  };
}

function summarize(chunks: Array<{ fullyQualifiedName: string; nodeType: string }>): string[] {
  return chunks.map((c) => `${c.nodeType}:${c.fullyQualifiedName}`);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ChunkExtractor', () => {
  it('C#: пространство имён и охватывающий класс входят в полное имя', () => {
    const field = node('field_declaration', {
      text: 'private Logger _logger;',
      rows: [3, 3],
      children: [
        node('variable_declaration', {
          children: [
            ident('Logger'),
            node('variable_declarator', { children: [ident('_logger')] }),
          ],
        }),
      ],
    });
    const method = node('method_declaration', {
      text: 'public void Run() {}',
      rows: [4, 6],
      fields: { name: ident('Run') },
    });
    const cls = node('class_declaration', {
      text: 'public class Service { ... }',
      rows: [2, 10],
      fields: { name: ident('Service') },
      children: [node('declaration_list', { children: [field, method] })],
    });
    const root = node('compilation_unit', {
      children: [
        node('namespace_declaration', {
          fields: { name: ident('Acme.Core', 'qualified_name') },
          children: [node('declaration_list', { children: [cls] })],
        }),
      ],
    });

    const chunks = new ChunkExtractor(parserFor(root)).extract('class Service {}', 'csharp', 'src/Service.cs');

    expect(summarize(chunks)).toEqual([
      'class:Acme.Core.Service',
      'field:Acme.Core.Service._logger',
      'method:Acme.Core.Service.Run',
    ]);
    expect(chunks[0]).toMatchObject({
      filePath: 'src/Service.cs',
      language: 'csharp',
      startLine: 3,
      endLine: 11,
      content: 'public class Service { ... }',
      charCount: 28,
      tokenCount: 7,
    });
  });

  it('стрелочная функция получает имя переменной', () => {
    const arrow = node('arrow_function', { text: '() => 1', rows: [0, 0] });
    const root = node('program', {
      children: [
        node('lexical_declaration', {
          children: [
            node('variable_declarator', {
              fields: { name: ident('handler'), value: arrow },
            }),
          ],
        }),
      ],
    });

    const chunks = new ChunkExtractor(parserFor(root)).extract('const handler = () => 1;', 'javascript', 'a.js');

    expect(summarize(chunks)).toEqual(['arrow_function:handler']);
  });

  it('анонимная стрелочная функция не берёт имя параметра', () => {
    const arrow = node('arrow_function', {
      text: 'x => x * 2',
      rows: [7, 7],
      fields: { parameter: ident('x') },
    });
    const root = node('program', {
      children: [node('call_expression', { children: [node('arguments', { children: [arrow] })] })],
    });

    const chunks = new ChunkExtractor(parserFor(root)).extract('xs.map(x => x * 2)', 'typescript', 'a.ts');

    expect(summarize(chunks)).toEqual(['arrow_function:arrow_function_8']);
  });

  it('узел без имени получает имя {nodeType}_{startLine}', () => {
    const root = node('module', {
      children: [node('class_definition', { text: 'class:\n  pass', rows: [4, 5] })],
    });

    const chunks = new ChunkExtractor(parserFor(root)).extract('class:\n  pass', 'python', 'broken.py');

    expect(chunks[0]?.fullyQualifiedName).toBe('class_5');
  });

  it('Python: метод внутри класса квалифицируется именем класса', () => {
    const method = node('function_definition', { text: 'def m(self): pass', rows: [1, 1], fields: { name: ident('m') } });
    const root = node('module', {
      children: [
        node('class_definition', {
          text: 'class A:\n    def m(self): pass',
          rows: [0, 1],
          fields: { name: ident('A'), body: node('block', { children: [method] }) },
        }),
      ],
    });

    const chunks = new ChunkExtractor(parserFor(root)).extract('class A: ...', 'python', 'a.py');

    expect(summarize(chunks)).toEqual(['class:A', 'function:A.m']);
  });

  it('отбрасывает узлы из одних пробелов', () => {
    const root = node('module', {
      children: [node('function_definition', { text: '   \n  ', fields: { name: ident('f') } })],
    });

    const chunks = new ChunkExtractor(parserFor(root)).extract('def f(): pass', 'python', 'a.py');

    expect(chunks).toEqual([]);
  });

  it('пустой файл не парсится', () => {
    const parser = parserFor(node('module'));
    const parseSpy = vi.spyOn(parser, 'parse');

    const chunks = new ChunkExtractor(parser).extract('  \n\t', 'python', 'empty.py');

    expect(chunks).toEqual([]);
    expect(parseSpy).not.toHaveBeenCalled();
  });

  it('недоступная грамматика даёт пустой результат', () => {
    const extractor = new ChunkExtractor(parserFor(null));

    expect(extractor.extract('class A {}', 'csharp', 'A.cs')).toEqual([]);
    expect(extractor.supports('csharp')).toBe(false);
  });

  it('ошибка парсера пробрасывается вызывающему', () => {
    const parser: SourceParser = {
      parse: () => {
        throw new Error('boom');
      },
      supports: () => true,
    };

    expect(() => new ChunkExtractor(parser).extract('def f(): pass', 'python', 'f.py')).toThrow('boom');
  });

  it('одноимённые узлы получают суффикс строки', () => {
    const root = node('module', {
      children: [
        node('function_definition', { text: 'def x(self): pass', rows: [1, 1], fields: { name: ident('x') } }),
        node('function_definition', { text: 'def x(self, v): pass', rows: [4, 4], fields: { name: ident('x') } }),
      ],
    });

    const chunks = new ChunkExtractor(parserFor(root)).extract('def x(self): pass', 'python', 'p.py');

    expect(summarize(chunks)).toEqual(['function:x', 'function:x@5']);
  });

  it('повторы на одной строке различаются порядковым номером', () => {
    const base = {
      filePath: 'a.js', nodeType: 'function' as const, language: 'javascript' as const,
      content: '() => 1', startLine: 3, endLine: 3, tokenCount: 2, charCount: 7,
    };
    const chunks = withUniqueNames([
      { ...base, fullyQualifiedName: 'function_3' },
      { ...base, fullyQualifiedName: 'function_3' },
      { ...base, fullyQualifiedName: 'function_3' },
    ]);

    expect(chunks.map((c) => c.fullyQualifiedName)).toEqual(['function_3', 'function_3@3', 'function_3@3_2']);
  });

  it('повторное извлечение даёт тот же результат', () => {
    const root = node('module', {
      children: [node('function_definition', { text: 'def f(): pass', fields: { name: ident('f') } })],
    });
    const extractor = new ChunkExtractor(parserFor(root));

    expect(extractor.extract('def f(): pass', 'python', 'f.py'))
      .toEqual(extractor.extract('def f(): pass', 'python', 'f.py'));
  });

  it('глубокая вложенность не переполняет стек', () => {
    let inner = node('function_definition', { text: 'def leaf(): pass', fields: { name: ident('leaf') } });
    for (let i = 0; i < 20_000; i++) {
      inner = node('block', { text: 'block', children: [inner] });
    }
    const root = node('module', { text: 'module', children: [inner] });

    const chunks = new ChunkExtractor(parserFor(root)).extract('def leaf(): pass', 'python', 'deep.py');

    expect(summarize(chunks)).toEqual(['function:leaf']);
  });
});

describe('findNamespace', () => {
  it('собирает вложенные пространства имён', () => {
    const root = node('compilation_unit', {
      children: [
        node('namespace_declaration', {
          fields: { name: ident('Outer') },
          children: [node('namespace_declaration', { fields: { name: ident('Inner') } })],
        }),
      ],
    });

    expect(findNamespace(root, 'csharp')).toBe('Outer.Inner');
  });

  it('возвращает null для языков без пространств имён', () => {
    const language: Language = 'python';
    expect(findNamespace(node('module'), language)).toBeNull();
  });
});

describe('resolveName', () => {
  it('берёт ключ пары для функции-значения объекта', () => {
    const arrow = node('arrow_function', { text: '() => 1' });
    node('pair', { fields: { key: ident('load', 'property_identifier'), value: arrow } });

    expect(resolveName(arrow)).toBe('load');
  });
});

describe('mapNodeType', () => {
  it('сопоставляет известные типы узлов', () => {
    expect(mapNodeType('record_struct_declaration')).toBe('record');
    expect(mapNodeType('class_definition')).toBe('class');
    expect(mapNodeType('abstract_class_declaration')).toBe('class');
    expect(mapNodeType('event_field_declaration')).toBe('event');
  });

  it('неизвестный тип узла -> unknown', () => {
    expect(mapNodeType('decorated_definition')).toBe('unknown');
  });
});
