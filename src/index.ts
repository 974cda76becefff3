export * from './types';

export { analyzeRepository } from './core/analyzer';
export { callSiteKey, loadCallGraphToolConfig, parseCallGraphFacts, runCallGraphTool } from './core/callgraph';
export type { RunCallGraphOptions } from './core/callgraph';
export { ComponentCatalog, serializeComponent } from './core/catalog';
export { DEFAULT_PAGERANK, ENV_CALLGRAPH_OUTPUT, ENV_PYTHON_EXECUTABLE } from './core/constants';
export { CallGraphError, CondensationError, PythonParseError } from './core/errors';
export type { CallGraphFailureReason } from './core/errors';
export { collectFileComponents, extractComponents } from './core/extractor';
export type { ExtractionResult, ExtractOptions } from './core/extractor';
export { discoverPythonFiles } from './core/files';
export { fileToImportPath, fileToModulePath, ModuleIndex } from './core/modules';
export { parsePythonSource, SyntaxTreeCache } from './core/parser';
export { computeImportance, rankComponents } from './core/ranker';
export {
  DEFAULT_STRATEGIES,
  matchCallerPackage,
  matchNormalized,
  matchResolverSeeded,
  matchRootPrefix,
  normalizeSeparators,
  reconcileCallee,
  reconcileCallGraph,
} from './core/reconcile';
export type { ReconcileContext, ReconcileStats, ReconcileStrategy } from './core/reconcile';
export { SymbolOriginResolver } from './core/resolver';
export { addClassMethodEdges, addDecoratorEdges, addInheritanceEdges } from './core/structural';
export { condenseGraph, orderCondensation, topologicalOrder } from './core/toposort';
export { consoleLogger } from './utils/log';
