import * as path from 'path';

import { AnalysisResult, AnalyzeOptions, CallGraphFacts, Logger } from '../types';
import { consoleLogger, describeError, logVerbose, logWarn } from '../utils/log';
import { relativeRepoPath } from '../utils/path';
import { loadCallGraphToolConfig, runCallGraphTool } from './callgraph';
import { ComponentCatalog } from './catalog';
import { DEFAULT_MAX_RESOLVE_DEPTH } from './constants';
import { extractComponents } from './extractor';
import { discoverPythonFiles } from './files';
import { SyntaxTreeCache } from './parser';
import { computeImportance } from './ranker';
import { reconcileCallGraph } from './reconcile';
import { SymbolOriginResolver } from './resolver';
import { addClassMethodEdges, addDecoratorEdges, addInheritanceEdges } from './structural';
import { topologicalOrder } from './toposort';

async function loadFacts(options: AnalyzeOptions, files: string[], logger: Logger): Promise<CallGraphFacts> {
  if (options.callGraph) {
    return options.callGraph;
  }
  const tool = options.callGraphTool ?? loadCallGraphToolConfig();
  return runCallGraphTool({
    ...tool,
    packageRoot: options.rootDir,
    files,
    verbose: options.verbose,
    logger,
  });
}

/**
 * Full analysis of one repository snapshot: components, their dependency
 * graph, a processing order with dependencies first, and importance scores.
 * Files that fail to parse are skipped; a failing call-graph tool aborts the
 * run with a `CallGraphError`.
 */
export async function analyzeRepository(options: AnalyzeOptions): Promise<AnalysisResult> {
  const rootDir = path.resolve(options.rootDir);
  const logger = options.logger ?? consoleLogger;
  const verbose = options.verbose ?? false;

  const files = options.files ?? (await discoverPythonFiles(rootDir, options.ignore));
  logVerbose(verbose, `[extract] analyzing ${files.length} files in ${rootDir}`, logger);

  const cache = new SyntaxTreeCache((filePath, error) => {
    logWarn(`[resolve] cannot parse ${relativeRepoPath(rootDir, filePath)}: ${describeError(error)}`, logger);
  });
  const extraction = await extractComponents({
    rootDir,
    files,
    maxWorkers: options.maxWorkers,
    verbose,
    logger,
    cache,
  });

  const catalog = new ComponentCatalog(extraction.components);
  const resolver = new SymbolOriginResolver({
    modules: extraction.modules,
    cache,
    maxDepth: options.maxDepth ?? DEFAULT_MAX_RESOLVE_DEPTH,
  });

  const facts = await loadFacts({ ...options, rootDir }, extraction.parsedFiles, logger);
  reconcileCallGraph(catalog, facts, { modules: extraction.modules, resolver, verbose, logger });
  catalog.rebuildUsedBy();

  const structural = { resolver, cache, verbose, logger };
  const methodEdges = addClassMethodEdges(catalog);
  catalog.rebuildUsedBy();
  const inheritanceEdges = addInheritanceEdges(catalog, structural);
  catalog.rebuildUsedBy();
  const decoratorEdges = addDecoratorEdges(catalog, structural);
  catalog.rebuildUsedBy();
  logVerbose(
    verbose,
    `[resolve] structural edges: ${methodEdges} class-method, ${inheritanceEdges} inheritance, ${decoratorEdges} decorator`,
    logger,
  );

  const graph = catalog.toDependencyGraph();
  const { order, condensation } = topologicalOrder(graph);
  const cyclic = condensation.groups.filter((group) => group.members.length > 1).length;
  logVerbose(verbose, `[rank] ${graph.order} components, ${graph.size} edges, ${cyclic} cyclic groups`, logger);

  const importance = computeImportance(graph, { ...options.pagerank, verbose, logger });

  return {
    rootDir,
    rootPackage: extraction.modules.rootPackage,
    components: catalog.toMap(),
    graph,
    order,
    condensation,
    importance,
    failedFiles: extraction.failedFiles,
  };
}
