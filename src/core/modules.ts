import * as fs from 'fs';
import * as path from 'path';

import { ModuleEntry } from '../types';
import { normalizeRepoPath, relativeRepoPath } from '../utils/path';
import { PACKAGE_INIT_FILE, PACKAGE_INIT_MODULE, PYTHON_EXTENSION } from './constants';

/** `pkg/mod.py` → `pkg.mod`; `pkg/__init__.py` → `pkg.__init__`. */
export function fileToModulePath(relativePath: string): string {
  const normalized = normalizeRepoPath(relativePath);
  const withoutExt = normalized.endsWith(PYTHON_EXTENSION)
    ? normalized.slice(0, -PYTHON_EXTENSION.length)
    : normalized;
  return withoutExt.split('/').filter(Boolean).join('.');
}

/** Like {@link fileToModulePath} but folds `__init__` into its package. */
export function fileToImportPath(relativePath: string): string {
  const parts = fileToModulePath(relativePath).split('.');
  if (parts[parts.length - 1] === PACKAGE_INIT_MODULE) {
    parts.pop();
  }
  return parts.join('.');
}

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

function firstExisting(candidates: string[]): string | null {
  for (const candidate of candidates) {
    if (isFile(candidate)) {
      return path.resolve(candidate);
    }
  }
  return null;
}

export class ModuleIndex {
  readonly rootDir: string;
  /** Name of the repository root folder, which call-graph tools may prepend to module paths. */
  readonly rootPackage: string;

  private readonly byFile = new Map<string, ModuleEntry>();
  private readonly prefixes = new Set<string>();

  constructor(rootDir: string, files: Iterable<string>) {
    this.rootDir = path.resolve(rootDir);
    this.rootPackage = path.basename(this.rootDir);

    for (const file of files) {
      const filePath = path.resolve(this.rootDir, file);
      const relativePath = relativeRepoPath(this.rootDir, filePath);
      const entry: ModuleEntry = {
        dottedPath: fileToModulePath(relativePath),
        filePath,
        relativePath,
        isPackage: path.basename(filePath) === PACKAGE_INIT_FILE,
      };
      this.byFile.set(filePath, entry);

      this.addPrefixes(entry.dottedPath);
      this.addPrefixes(fileToImportPath(relativePath));
    }
  }

  private addPrefixes(dottedPath: string): void {
    const parts = dottedPath.split('.').filter(Boolean);
    for (let i = 1; i <= parts.length; i += 1) {
      this.prefixes.add(parts.slice(0, i).join('.'));
    }
  }

  get size(): number {
    return this.byFile.size;
  }

  /** Whether a dotted path names a module or package of this repository. */
  isRepoModule(dottedPath: string): boolean {
    return this.prefixes.has(dottedPath);
  }

  /** Module path as used in component ids. */
  modulePathOf(filePath: string): string {
    return fileToModulePath(relativeRepoPath(this.rootDir, path.resolve(this.rootDir, filePath)));
  }

  /** Module path as Python would import it (`__init__` folded). */
  importPathOf(filePath: string): string {
    return fileToImportPath(relativeRepoPath(this.rootDir, path.resolve(this.rootDir, filePath)));
  }

  /**
   * File that `from <level dots><moduleName> import ...` refers to when
   * written in `currentFile`. `X.py` wins over `X/__init__.py`.
   */
  resolveModuleFile(moduleName: string | null, currentFile: string, level = 0): string | null {
    let basePath: string;

    if (level === 0) {
      if (!moduleName) {
        return null;
      }
      const parts = moduleName.split('.');
      basePath =
        parts[0] === this.rootPackage
          ? path.join(this.rootDir, ...parts.slice(1))
          : path.join(this.rootDir, ...parts);
    } else {
      let packageDir = path.dirname(path.resolve(this.rootDir, currentFile));
      for (let i = 0; i < level - 1; i += 1) {
        packageDir = path.dirname(packageDir);
      }
      basePath = moduleName ? path.join(packageDir, ...moduleName.split('.')) : packageDir;
    }

    return firstExisting([`${basePath}${PYTHON_EXTENSION}`, path.join(basePath, PACKAGE_INIT_FILE)]);
  }

  /** Sibling package (`name/__init__.py`) or module (`name.py`) next to `currentFile`. */
  resolveSibling(name: string, currentFile: string): string | null {
    const dir = path.dirname(path.resolve(this.rootDir, currentFile));
    return firstExisting([path.join(dir, name, PACKAGE_INIT_FILE), path.join(dir, `${name}${PYTHON_EXTENSION}`)]);
  }
}
