// Извлечение на реальных грамматиках tree-sitter.
import { describe, it, expect } from 'vitest';
import { ChunkExtractor } from '../extractor.js';
import { TreeSitterParser } from '../tree-sitter-parser.js';
import type { CodeChunk } from '../types.js';

const extractor = new ChunkExtractor(new TreeSitterParser());

function summarize(chunks: CodeChunk[]): string[] {
  return chunks.map((c) => `${c.nodeType}:${c.fullyQualifiedName}:${c.startLine}-${c.endLine}`);
}

describe('TreeSitterParser + ChunkExtractor', () => {
  it('поддерживает все четыре языка', () => {
    expect(extractor.supports('csharp')).toBe(true);
    expect(extractor.supports('javascript')).toBe(true);
    expect(extractor.supports('typescript')).toBe(true);
    expect(extractor.supports('python')).toBe(true);
  });

  it('Python: класс, метод и функция', () => {
    const content = [
      'class Greeter:',
      '    def greet(self, name):',
      '        return f"hi {name}"',
      '',
      'def main():',
      '    Greeter().greet("x")',
      '',
    ].join('\n');

    const chunks = extractor.extract(content, 'python', 'app/greeter.py');

    expect(summarize(chunks)).toEqual([
      'class:Greeter:1-3',
      'function:Greeter.greet:2-3',
      'function:main:5-6',
    ]);
    expect(chunks[2]?.content).toBe('def main():\n    Greeter().greet("x")');
  });

  it('TypeScript: интерфейс, класс, методы, стрелочная функция, enum', () => {
    const content = [
      'export interface Shape {',
      '  area(): number;',
      '}',
      '',
      'export class Circle implements Shape {',
      '  constructor(private r: number) {}',
      '  area(): number {',
      '    return Math.PI * this.r ** 2;',
      '  }',
      '}',
      '',
      'export const double = (x: number) => x * 2;',
      '',
      'enum Color { Red, Green }',
    ].join('\n');

    const chunks = extractor.extract(content, 'typescript', 'src/shapes.ts');

    expect(summarize(chunks)).toEqual([
      'interface:Shape:1-3',
      'class:Circle:5-10',
      'method:Circle.constructor:6-6',
      'method:Circle.area:7-9',
      'arrow_function:double:12-12',
      'enum:Color:14-14',
    ]);
  });

  it('TSX разбирается диалектом tsx', () => {
    const content = 'export const App = () => <div>hello</div>;\n';

    const chunks = extractor.extract(content, 'typescript', 'web/App.tsx');

    expect(summarize(chunks)).toEqual(['arrow_function:App:1-1']);
  });

  it('JavaScript: генератор, класс, метод и функция в объекте', () => {
    const content = [
      'function* ids() { yield 1; }',
      'class Store { get(key) { return key; } }',
      'module.exports = { load: () => 1 };',
    ].join('\n');

    const chunks = extractor.extract(content, 'javascript', 'lib/store.js');

    expect(summarize(chunks)).toEqual([
      'function:ids:1-1',
      'class:Store:2-2',
      'method:Store.get:2-2',
      'arrow_function:load:3-3',
    ]);
  });

  it('C#: пространство имён, члены класса и интерфейс', () => {
    const content = [
      'namespace Acme.Billing',
      '{',
      '    public class Invoice',
      '    {',
      '        private readonly decimal _total;',
      '        public decimal Total { get; set; }',
      '        public Invoice(decimal total) { _total = total; }',
      '        public decimal Tax() => _total * 0.2m;',
      '    }',
      '',
      '    public interface IRepo { }',
      '}',
    ].join('\n');

    const chunks = extractor.extract(content, 'csharp', 'Billing/Invoice.cs');

    expect(summarize(chunks)).toEqual([
      'class:Acme.Billing.Invoice:3-9',
      'field:Acme.Billing.Invoice._total:5-5',
      'property:Acme.Billing.Invoice.Total:6-6',
      'constructor:Acme.Billing.Invoice.Invoice:7-7',
      'method:Acme.Billing.Invoice.Tax:8-8',
      'interface:Acme.Billing.IRepo:11-11',
    ]);
  });

  it('Python: getter и setter свойства получают разные имена', () => {
    const content = [
      'class P:',
      '    @property',
      '    def x(self):',
      '        return 1',
      '',
      '    @x.setter',
      '    def x(self, v):',
      '        pass',
      '',
    ].join('\n');

    const chunks = extractor.extract(content, 'python', 'p.py');

    expect(summarize(chunks)).toEqual([
      'class:P:1-8',
      'function:P.x:3-4',
      'function:P.x@7:7-8',
    ]);
  });

  it('C#: перегрузки методов и конструкторов различаются', () => {
    const content = [
      'public class Calc',
      '{',
      '    public Calc() { }',
      '    public Calc(int seed) { }',
      '    public int Add(int a, int b) => a + b;',
      '    public double Add(double a, double b) => a + b;',
      '}',
    ].join('\n');

    const chunks = extractor.extract(content, 'csharp', 'Calc.cs');

    expect(summarize(chunks)).toEqual([
      'class:Calc:1-7',
      'constructor:Calc.Calc:3-3',
      'constructor:Calc.Calc@4:4-4',
      'method:Calc.Add:5-5',
      'method:Calc.Add@6:6-6',
    ]);
  });

  it('файл без структурных узлов даёт пустой список', () => {
    expect(extractor.extract('import os\nprint(os.name)\n', 'python', 'script.py')).toEqual([]);
  });
});
