// Тесты для FileFilter и scanSourceFiles.
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileFilter } from '../file-filter.js';
import { scanSourceFiles } from '../local.js';

describe('FileFilter', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'file-filter-test-'));
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe('встроенные исключения', () => {
    it('исключает скрытые каталоги и файлы', async () => {
      const filter = new FileFilter(tmpDir);
      await filter.init();
      expect(filter.shouldInclude('.git/hooks/pre-commit.py')).toBe(false);
      expect(filter.shouldInclude('.venv/lib/site.py')).toBe(false);
      expect(filter.shouldInclude('src/.generated/api.ts')).toBe(false);
      expect(filter.shouldInclude('.eslintrc.js')).toBe(false);
    });

    it('исключает каталоги сборки', async () => {
      const filter = new FileFilter(tmpDir);
      await filter.init();
      expect(filter.shouldInclude('App/bin/Debug/App.cs')).toBe(false);
      expect(filter.shouldInclude('App/obj/Generated.cs')).toBe(false);
      expect(filter.shouldInclude('dist/index.js')).toBe(false);
      expect(filter.shouldInclude('build/lib/x.py')).toBe(false);
    });

    it('исключает каталоги зависимостей', async () => {
      const filter = new FileFilter(tmpDir);
      await filter.init();
      expect(filter.shouldInclude('node_modules/lodash/index.js')).toBe(false);
      expect(filter.shouldInclude('pkg/__pycache__/mod.py')).toBe(false);
      expect(filter.shouldInclude('venv/lib/site.py')).toBe(false);
    });

    it('пропускает обычные исходники', async () => {
      const filter = new FileFilter(tmpDir);
      await filter.init();
      expect(filter.shouldInclude('src/app.ts')).toBe(true);
      expect(filter.shouldInclude('Services\\Billing.cs')).toBe(true);
    });
  });

  it('учитывает .gitignore корня', async () => {
    await writeFile(join(tmpDir, '.gitignore'), 'generated/\n*.gen.ts\n');
    const filter = new FileFilter(tmpDir);
    await filter.init();

    expect(filter.shouldInclude('generated/schema.py')).toBe(false);
    expect(filter.shouldInclude('src/api.gen.ts')).toBe(false);
    expect(filter.shouldInclude('src/api.ts')).toBe(true);
  });

  it('игнорирует .gitignore при respectGitignore: false', async () => {
    await writeFile(join(tmpDir, '.gitignore'), 'generated/\n');
    const filter = new FileFilter(tmpDir, { respectGitignore: false });
    await filter.init();

    expect(filter.shouldInclude('generated/schema.py')).toBe(true);
  });

  it('применяет exclude из конфига', async () => {
    const filter = new FileFilter(tmpDir, { exclude: ['tests/**'] });
    await filter.init();

    expect(filter.shouldInclude('tests/test_app.py')).toBe(false);
    expect(filter.shouldInclude('app/main.py')).toBe(true);
  });
});

describe('scanSourceFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'scan-test-'));
    await mkdir(join(root, 'src'), { recursive: true });
    await mkdir(join(root, 'node_modules', 'dep'), { recursive: true });
    await mkdir(join(root, 'bin'), { recursive: true });
    await writeFile(join(root, 'src', 'app.py'), 'def main(): pass\n');
    await writeFile(join(root, 'src', 'Service.cs'), 'class Service {}\n');
    await writeFile(join(root, 'src', 'README.md'), '# readme\n');
    await writeFile(join(root, 'node_modules', 'dep', 'index.js'), 'module.exports = 1;\n');
    await writeFile(join(root, 'bin', 'Tool.cs'), 'class Tool {}\n');
    await writeFile(join(root, 'big.py'), 'x = 1\n'.repeat(100));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('находит файлы выбранных языков и отсекает исключённые каталоги', async () => {
    const { files } = await scanSourceFiles(root, { languages: ['python', 'csharp', 'javascript'] });

    expect(files.map((f) => [f.filePath, f.language])).toEqual([
      ['big.py', 'python'],
      ['src/Service.cs', 'csharp'],
      ['src/app.py', 'python'],
    ]);
    expect(files[2]?.absolutePath).toBe(join(root, 'src', 'app.py'));
  });

  it('учитывает только запрошенные языки', async () => {
    const { files } = await scanSourceFiles(root, { languages: ['csharp'] });

    expect(files.map((f) => f.filePath)).toEqual(['src/Service.cs']);
  });

  it('пропускает файлы крупнее maxFileSize', async () => {
    const { files, excludedCount } = await scanSourceFiles(root, { languages: ['python'], maxFileSize: 100 });

    expect(files.map((f) => f.filePath)).toEqual(['src/app.py']);
    expect(excludedCount).toBe(1);
  });
});
