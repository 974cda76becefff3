import * as path from 'path';

import { ImportEdge, OriginKind, ResolvedOrigin } from '../types';
import { DEFAULT_MAX_RESOLVE_DEPTH } from './constants';
import { ModuleIndex } from './modules';
import { ParsedPythonFile, SyntaxTreeCache } from './parser';
import {
  baseClassNames,
  classMethods,
  collectImports,
  DefinitionNode,
  findTopLevelDefinition,
  hasTopLevelVariable,
} from './syntax';

export interface ResolverOptions {
  modules: ModuleIndex;
  cache: SyntaxTreeCache;
  maxDepth?: number;
}

/** The import table of one file, rebuilt on every visit. */
interface FileScope {
  parsed: ParsedPythonFile;
  imports: ImportEdge[];
  wildcardFiles: string[];
}

/** Where following one import takes a symbol path. */
type ImportHop =
  | { type: 'trace'; filePath: string; symbolPath: string }
  | { type: 'module'; filePath: string; name: string };

interface ImportMatch {
  score: number;
  hop: ImportHop;
}

interface TraceState {
  visited: Set<string>;
}

function splitPath(symbolPath: string): { head: string; rest: string[] } {
  const [head, ...rest] = symbolPath.split('.');
  return { head, rest };
}

function startsWithPath(symbolPath: string, prefix: string): boolean {
  return symbolPath === prefix || symbolPath.startsWith(`${prefix}.`);
}

function remainderAfter(symbolPath: string, prefix: string): string {
  return symbolPath === prefix ? '' : symbolPath.slice(prefix.length + 1);
}

function origin(filePath: string, qualifiedPath: string, kind: OriginKind, name?: string): ResolvedOrigin {
  const segments = qualifiedPath.split('.');
  return {
    filePath,
    symbolPath: name ?? segments[segments.length - 1],
    qualifiedPath,
    kind,
  };
}

/**
 * Static, best-effort answer to "where is this name really defined?" for a
 * Python repository. Follows imports, re-exports, wildcard imports and base
 * classes without executing anything; the most specific, most local match
 * wins and anything ambiguous resolves to `null`.
 */
export class SymbolOriginResolver {
  private readonly modules: ModuleIndex;
  private readonly cache: SyntaxTreeCache;
  private readonly maxDepth: number;

  constructor(options: ResolverOptions) {
    this.modules = options.modules;
    this.cache = options.cache;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_RESOLVE_DEPTH;
  }

  /** Origin of `symbolPath` as seen from inside `referencingFile`. */
  resolve(symbolPath: string, referencingFile: string): ResolvedOrigin | null {
    if (!symbolPath) {
      return null;
    }
    return this.trace(symbolPath, this.absolute(referencingFile), { visited: new Set() }, 0);
  }

  /**
   * Like {@link resolve}, but starts from the import in `entryFile` whose
   * alias or imported name is the longest dotted prefix of `name`. Wildcard
   * imports are tried after that, and the entry file's own definitions last.
   */
  findTrueOrigin(entryFile: string, name: string): ResolvedOrigin | null {
    const entryPath = this.absolute(entryFile);
    const scope = this.scopeOf(entryPath);
    if (!scope || !name) {
      return null;
    }

    const state: TraceState = { visited: new Set() };
    let best: ImportMatch | null = null;
    for (const edge of scope.imports) {
      const match = this.matchImport(edge, name, true);
      if (match && (!best || match.score > best.score)) {
        best = match;
      }
    }

    if (best) {
      const found = this.followHop(best.hop, state, 0);
      if (found) {
        return found;
      }
    }

    for (const wildcardFile of scope.wildcardFiles) {
      const found = this.trace(name, wildcardFile, state, 1);
      if (found) {
        return found;
      }
    }

    return this.trace(name, entryPath, state, 0);
  }

  /** Dotted path of an origin in component-id form (`pkg.__init__.name` stays as is). */
  toComponentId(found: ResolvedOrigin): string {
    return this.joinModulePath(this.modules.modulePathOf(found.filePath), found);
  }

  /** Dotted path of an origin as Python would import it (`__init__` folded into its package). */
  toDottedPath(found: ResolvedOrigin): string {
    return this.joinModulePath(this.modules.importPathOf(found.filePath), found);
  }

  private joinModulePath(modulePath: string, found: ResolvedOrigin): string {
    if (found.kind === 'module' || !found.qualifiedPath) {
      return modulePath;
    }
    return modulePath ? `${modulePath}.${found.qualifiedPath}` : found.qualifiedPath;
  }

  private absolute(filePath: string): string {
    return path.resolve(this.modules.rootDir, filePath);
  }

  private scopeOf(filePath: string): FileScope | null {
    const parsed = this.cache.get(filePath);
    if (!parsed) {
      return null;
    }

    const imports: ImportEdge[] = [];
    const wildcardFiles: string[] = [];
    for (const edge of collectImports(parsed.root, filePath)) {
      if (!edge.isWildcard) {
        imports.push(edge);
        continue;
      }
      const target = this.modules.resolveModuleFile(edge.sourceModule, filePath, edge.level);
      if (target) {
        wildcardFiles.push(target);
      }
    }
    return { parsed, imports, wildcardFiles };
  }

  private trace(symbolPath: string, filePath: string, state: TraceState, depth: number): ResolvedOrigin | null {
    if (depth > this.maxDepth) {
      return null;
    }
    const key = `${filePath}\u0000${symbolPath}`;
    if (state.visited.has(key)) {
      return null;
    }
    state.visited.add(key);

    const scope = this.scopeOf(filePath);
    if (!scope) {
      return null;
    }

    const { head, rest } = splitPath(symbolPath);
    const root = scope.parsed.root;

    if (rest.length === 0) {
      const definition = findTopLevelDefinition(root, head);
      if (definition) {
        return origin(filePath, head, definition.type);
      }
      if (hasTopLevelVariable(root, head)) {
        return origin(filePath, head, 'variable');
      }
    } else {
      const classDef = findTopLevelDefinition(root, head, 'class');
      if (classDef) {
        return this.traceClassMember(classDef, rest, scope, filePath, state, depth);
      }
    }

    // Walked last to first: a later import of the same alias rebinds it.
    for (let i = scope.imports.length - 1; i >= 0; i -= 1) {
      const match = this.matchImport(scope.imports[i], symbolPath, false);
      if (!match) {
        continue;
      }
      const found = this.followHop(match.hop, state, depth + 1);
      if (found) {
        return found;
      }
    }

    for (const wildcardFile of scope.wildcardFiles) {
      const found = this.trace(symbolPath, wildcardFile, state, depth + 1);
      if (found) {
        return found;
      }
    }

    const sibling = this.modules.resolveSibling(head, filePath);
    if (sibling && sibling !== filePath) {
      if (rest.length === 0) {
        return origin(sibling, '', 'module', head);
      }
      return this.trace(rest.join('.'), sibling, state, depth + 1);
    }

    return null;
  }

  /**
   * Own methods first, then each base class in declaration order. Attributes
   * of a method (`Cls.meth.x`) have no origin.
   */
  private traceClassMember(
    classDef: DefinitionNode,
    rest: string[],
    scope: FileScope,
    filePath: string,
    state: TraceState,
    depth: number,
  ): ResolvedOrigin | null {
    const member = rest[0];
    if (classMethods(classDef.node).some((method) => method.name === member)) {
      return rest.length === 1 ? origin(filePath, `${classDef.name}.${member}`, 'method') : null;
    }

    for (const base of baseClassNames(classDef.node)) {
      const inherited = `${base}.${rest.join('.')}`;

      const explicit = this.lastMatchingImport(scope.imports, inherited);
      if (explicit) {
        const found = this.followHop(explicit.hop, state, depth + 1);
        if (found) {
          return found;
        }
        continue;
      }

      for (const wildcardFile of scope.wildcardFiles) {
        const found = this.trace(inherited, wildcardFile, state, depth + 1);
        if (found) {
          return found;
        }
      }

      const local = this.trace(inherited, filePath, state, depth + 1);
      if (local) {
        return local;
      }
    }

    return null;
  }

  /** A later import of the same alias shadows an earlier one. */
  private lastMatchingImport(imports: ImportEdge[], symbolPath: string): ImportMatch | null {
    for (let i = imports.length - 1; i >= 0; i -= 1) {
      const match = this.matchImport(imports[i], symbolPath, false);
      if (match) {
        return match;
      }
    }
    return null;
  }

  private followHop(hop: ImportHop, state: TraceState, depth: number): ResolvedOrigin | null {
    if (hop.type === 'module') {
      return origin(hop.filePath, '', 'module', hop.name);
    }
    return this.trace(hop.symbolPath, hop.filePath, state, depth);
  }

  /**
   * How `edge` explains `symbolPath`, if it does. With `byOriginalName`, a
   * `from m import x as y` also matches paths starting with `x`, which is how
   * call-graph tools tend to spell callees.
   */
  private matchImport(edge: ImportEdge, symbolPath: string, byOriginalName: boolean): ImportMatch | null {
    if (edge.isWildcard) {
      return null;
    }
    if (edge.isModuleImport) {
      return this.matchModuleImport(edge, symbolPath);
    }

    let rewritten: string | null = null;
    if (startsWithPath(symbolPath, edge.alias)) {
      const rest = remainderAfter(symbolPath, edge.alias);
      rewritten = rest ? `${edge.originalName}.${rest}` : edge.originalName;
    } else if (byOriginalName && startsWithPath(symbolPath, edge.originalName)) {
      rewritten = symbolPath;
    }
    if (rewritten === null) {
      return null;
    }

    const hop = this.hopFromImport(edge, rewritten);
    // A from-import binds exactly one name, so it always matches one segment.
    return hop ? { score: 1, hop } : null;
  }

  private hopFromImport(edge: ImportEdge, rewritten: string): ImportHop | null {
    const { head, rest } = splitPath(rewritten);

    if (edge.sourceModule === null) {
      // `from . import name`: name is usually a submodule of the package.
      const moduleFile = this.modules.resolveModuleFile(head, edge.importingFile, edge.level);
      if (moduleFile) {
        return rest.length === 0
          ? { type: 'module', filePath: moduleFile, name: head }
          : { type: 'trace', filePath: moduleFile, symbolPath: rest.join('.') };
      }
      const packageFile = this.modules.resolveModuleFile(null, edge.importingFile, edge.level);
      return packageFile ? { type: 'trace', filePath: packageFile, symbolPath: rewritten } : null;
    }

    const moduleFile = this.modules.resolveModuleFile(edge.sourceModule, edge.importingFile, edge.level);
    return moduleFile ? { type: 'trace', filePath: moduleFile, symbolPath: rewritten } : null;
  }

  private matchModuleImport(edge: ImportEdge, symbolPath: string): ImportMatch | null {
    let moduleName: string;
    let rest: string;
    let score: number;

    if (startsWithPath(symbolPath, edge.alias)) {
      moduleName = edge.originalName;
      rest = remainderAfter(symbolPath, edge.alias);
      score = edge.alias.split('.').length;
    } else {
      // `import a.b` also binds `a`.
      const top = edge.originalName.split('.')[0];
      if (edge.alias !== edge.originalName || !startsWithPath(symbolPath, top)) {
        return null;
      }
      moduleName = top;
      rest = remainderAfter(symbolPath, top);
      score = 1;
    }

    const moduleFile = this.modules.resolveModuleFile(moduleName, edge.importingFile, 0);
    if (!moduleFile) {
      return null;
    }
    if (!rest) {
      const segments = moduleName.split('.');
      return { score, hop: { type: 'module', filePath: moduleFile, name: segments[segments.length - 1] } };
    }
    return { score, hop: { type: 'trace', filePath: moduleFile, symbolPath: rest } };
  }
}
