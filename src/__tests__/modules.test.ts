import path from 'path';

import { describe, expect, test } from 'vitest';

import { discoverPythonFiles } from '../core/files';
import { fileToImportPath, fileToModulePath, ModuleIndex } from '../core/modules';
import { makeTempRepo, py, repoFiles } from './fixtures';

describe('module paths', () => {
  test('turns relative file paths into dotted module paths', () => {
    expect(fileToModulePath('pkg/sub/mod.py')).toBe('pkg.sub.mod');
    expect(fileToModulePath('pkg/__init__.py')).toBe('pkg.__init__');
    expect(fileToImportPath('pkg/__init__.py')).toBe('pkg');
    expect(fileToImportPath('pkg/sub/mod.py')).toBe('pkg.sub.mod');
  });
});

describe('ModuleIndex', () => {
  const FILES: Record<string, string> = {
    'pkg/__init__.py': '',
    'pkg/mod.py': py('X = 1'),
    'pkg/sub/__init__.py': '',
    'pkg/sub/deep.py': py('Y = 2'),
    'pkg/twin.py': py('Z = 3'),
    'pkg/twin/__init__.py': '',
  };
  const root = makeTempRepo(FILES);
  const index = new ModuleIndex(root, repoFiles(root, FILES));
  const file = (...parts: string[]): string => path.join(root, ...parts);

  test('knows the root package and every module prefix', () => {
    expect(index.rootPackage).toBe('repo_root');
    expect(index.size).toBe(6);
    expect(index.isRepoModule('pkg')).toBe(true);
    expect(index.isRepoModule('pkg.sub.deep')).toBe(true);
    expect(index.isRepoModule('os')).toBe(false);
    expect(index.modulePathOf('pkg/sub/__init__.py')).toBe('pkg.sub.__init__');
    expect(index.importPathOf('pkg/sub/__init__.py')).toBe('pkg.sub');
  });

  test('resolves absolute imports, with or without the root package prefix', () => {
    expect(index.resolveModuleFile('pkg.mod', file('pkg', 'sub', 'deep.py'))).toBe(file('pkg', 'mod.py'));
    expect(index.resolveModuleFile('repo_root.pkg.mod', file('pkg', 'sub', 'deep.py'))).toBe(file('pkg', 'mod.py'));
    expect(index.resolveModuleFile('pkg.sub', file('pkg', 'mod.py'))).toBe(file('pkg', 'sub', '__init__.py'));
    expect(index.resolveModuleFile('json', file('pkg', 'mod.py'))).toBeNull();
  });

  test('resolves relative imports by climbing one directory per extra dot', () => {
    expect(index.resolveModuleFile('mod', file('pkg', 'twin.py'), 1)).toBe(file('pkg', 'mod.py'));
    expect(index.resolveModuleFile('mod', file('pkg', 'sub', 'deep.py'), 2)).toBe(file('pkg', 'mod.py'));
    expect(index.resolveModuleFile(null, file('pkg', 'sub', 'deep.py'), 1)).toBe(file('pkg', 'sub', '__init__.py'));
  });

  test('prefers a module file over a package of the same name', () => {
    expect(index.resolveModuleFile('pkg.twin', file('pkg', 'mod.py'))).toBe(file('pkg', 'twin.py'));
    expect(index.resolveSibling('twin', file('pkg', 'mod.py'))).toBe(file('pkg', 'twin', '__init__.py'));
  });
});

describe('discoverPythonFiles', () => {
  test('skips tests, caches and virtualenvs', async () => {
    const root = makeTempRepo({
      'pkg/mod.py': '',
      'pkg/test_mod.py': '',
      'pkg/mod_test.py': '',
      'tests/test_all.py': '',
      '__pycache__/mod.py': '',
      '.venv/lib/site.py': '',
      'README.md': '',
    });

    expect(await discoverPythonFiles(root)).toEqual([path.join(root, 'pkg', 'mod.py')]);
    expect(await discoverPythonFiles(root, ['**/pkg/**'])).toEqual([]);
  });
});
