import * as fs from 'fs/promises';
import * as path from 'path';

import { Component, ComponentKind, Logger } from '../types';
import { consoleLogger, describeError, logVerbose, logWarn } from '../utils/log';
import { relativeRepoPath, toAbsolutePath } from '../utils/path';
import { CONSTRUCTOR_NAME, DEFAULT_MAX_WORKERS } from './constants';
import { ModuleIndex } from './modules';
import { mapLimit } from './parallel';
import { decodePythonSource, ParsedPythonFile, parsePythonSource, SyntaxTreeCache } from './parser';
import { classSignature, functionSignature, headerEndRow } from './signature';
import { classMethods, DefinitionNode, docstringOf, endLineOf, lineOf, topLevelDefinitions } from './syntax';

export interface ExtractOptions {
  rootDir: string;
  files: string[];
  maxWorkers?: number;
  verbose?: boolean;
  logger?: Logger;
  cache?: SyntaxTreeCache;
}

export interface ExtractionResult {
  components: Map<string, Component>;
  modules: ModuleIndex;
  cache: SyntaxTreeCache;
  parsedFiles: string[];
  failedFiles: string[];
}

type LoadResult = { filePath: string; parsed: ParsedPythonFile } | { filePath: string; error: unknown };

interface FileContext {
  filePath: string;
  relativePath: string;
  modulePath: string;
}

function makeComponent(
  context: FileContext,
  definition: DefinitionNode,
  id: string,
  kind: ComponentKind,
  headerEndLine: number,
): Component {
  const docstring = docstringOf(definition.node);
  return {
    id,
    kind,
    filePath: context.filePath,
    relativePath: context.relativePath,
    startLine: lineOf(definition.statement),
    endLine: endLineOf(definition.statement),
    headerEndLine,
    signature: kind === 'class' ? classSignature(definition.node) : functionSignature(definition.node),
    hasDocstring: docstring !== null,
    docstring: docstring ?? '',
    sourceCode: definition.statement.text,
    dependsOn: new Set<string>(),
    usedBy: new Set<string>(),
  };
}

/**
 * Skeleton context for a class reaches the end of `__init__`, or the start
 * of the last method when there is no constructor.
 */
function classHeaderEndLine(definition: DefinitionNode, methods: DefinitionNode[]): number {
  const init = methods.find((method) => method.name === CONSTRUCTOR_NAME);
  if (init) {
    return endLineOf(init.statement);
  }
  if (methods.length > 0) {
    return lineOf(methods[methods.length - 1].statement);
  }
  return headerEndRow(definition.node);
}

export function collectFileComponents(parsed: ParsedPythonFile, context: FileContext): Component[] {
  const components: Component[] = [];

  for (const definition of topLevelDefinitions(parsed.root)) {
    const id = `${context.modulePath}.${definition.name}`;

    if (definition.type === 'function') {
      components.push(makeComponent(context, definition, id, 'function', headerEndRow(definition.node)));
      continue;
    }

    const methods = classMethods(definition.node);
    components.push(makeComponent(context, definition, id, 'class', classHeaderEndLine(definition, methods)));
    for (const method of methods) {
      components.push(makeComponent(context, method, `${id}.${method.name}`, 'method', headerEndRow(method.node)));
    }
  }

  return components;
}

async function loadFile(filePath: string): Promise<LoadResult> {
  try {
    const buffer = await fs.readFile(filePath);
    return { filePath, parsed: parsePythonSource(decodePythonSource(buffer, filePath), filePath) };
  } catch (error) {
    return { filePath, error };
  }
}

export async function extractComponents(options: ExtractOptions): Promise<ExtractionResult> {
  const rootDir = path.resolve(options.rootDir);
  const logger = options.logger ?? consoleLogger;
  const verbose = options.verbose ?? false;
  const cache = options.cache ?? new SyntaxTreeCache();

  const files = Array.from(new Set(options.files.map((file) => toAbsolutePath(rootDir, file)))).sort((a, b) =>
    relativeRepoPath(rootDir, a).localeCompare(relativeRepoPath(rootDir, b)),
  );
  const modules = new ModuleIndex(rootDir, files);

  logVerbose(verbose, `[extract] parsing ${files.length} files`, logger);
  const loaded = await mapLimit(files, options.maxWorkers ?? DEFAULT_MAX_WORKERS, (file) => loadFile(file));

  const components = new Map<string, Component>();
  const parsedFiles: string[] = [];
  const failedFiles: string[] = [];

  for (const result of loaded) {
    const relativePath = relativeRepoPath(rootDir, result.filePath);
    if ('error' in result) {
      logWarn(`[extract] skipping ${relativePath}: ${describeError(result.error)}`, logger);
      cache.markFailed(result.filePath);
      failedFiles.push(result.filePath);
      continue;
    }

    cache.insert(result.parsed);
    parsedFiles.push(result.filePath);

    const context: FileContext = {
      filePath: result.filePath,
      relativePath,
      modulePath: modules.modulePathOf(result.filePath),
    };
    for (const component of collectFileComponents(result.parsed, context)) {
      if (components.has(component.id)) {
        logVerbose(verbose, `[extract] ${component.id} redefined in ${relativePath}; keeping the later definition`, logger);
      }
      components.set(component.id, component);
    }
  }

  logVerbose(verbose, `[extract] collected ${components.size} components from ${parsedFiles.length} files`, logger);
  return { components, modules, cache, parsedFiles, failedFiles };
}
