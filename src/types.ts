import type { DirectedGraph } from 'graphology';

export type ComponentKind = 'class' | 'function' | 'method';

export type OriginKind = ComponentKind | 'variable' | 'module';

export interface Component {
  id: string;
  kind: ComponentKind;
  filePath: string;
  relativePath: string;
  startLine: number;
  endLine: number;
  headerEndLine: number;
  signature: string;
  hasDocstring: boolean;
  docstring: string;
  sourceCode: string;
  dependsOn: Set<string>;
  usedBy: Set<string>;
}

export interface SerializedComponent {
  id: string;
  kind: ComponentKind;
  filePath: string;
  relativePath: string;
  startLine: number;
  endLine: number;
  headerEndLine: number;
  signature: string;
  hasDocstring: boolean;
  docstring: string;
  dependsOn: string[];
  usedBy: string[];
}

export interface ModuleEntry {
  dottedPath: string;
  filePath: string;
  relativePath: string;
  isPackage: boolean;
}

export interface ImportEdge {
  importingFile: string;
  alias: string;
  sourceModule: string | null;
  originalName: string;
  level: number;
  isWildcard: boolean;
  /** `import a.b` style statements, as opposed to `from a import b`. */
  isModuleImport: boolean;
}

export interface ResolvedOrigin {
  filePath: string;
  /** Name of the defining symbol itself, e.g. `greet`. */
  symbolPath: string;
  /** Path inside the defining file, e.g. `Base.greet`. */
  qualifiedPath: string;
  kind: OriginKind;
}

/** Raw call-graph facts: call-site key to callee identifiers. */
export type CallGraphFacts = Record<string, string[]>;

export type DependencyGraph = DirectedGraph<DependencyNodeAttributes, DependencyEdgeAttributes>;

export type DependencyNodeAttributes = {
  kind: ComponentKind;
  relativePath: string;
};

export type DependencyEdgeAttributes = {
  relation: 'depends_on';
};

export interface CondensationGroup {
  key: string;
  members: string[];
}

export interface Condensation {
  groups: CondensationGroup[];
  groupOf: Map<string, string>;
}

export interface ImportanceResult {
  scores: Record<string, number>;
  iterations: number;
  converged: boolean;
}

export interface PagerankOptions {
  alpha: number;
  maxIterations: number;
  tolerance: number;
}

export interface CallGraphToolOptions {
  pythonExecutable: string;
  outputPath: string;
  timeoutMs?: number;
}

export interface AnalyzeOptions {
  rootDir: string;
  /** Files to analyze; discovered under `rootDir` when omitted. */
  files?: string[];
  ignore?: string[];
  callGraph?: CallGraphFacts;
  callGraphTool?: CallGraphToolOptions;
  maxWorkers?: number;
  maxDepth?: number;
  pagerank?: Partial<PagerankOptions>;
  verbose?: boolean;
  logger?: Logger;
}

export interface AnalysisResult {
  rootDir: string;
  rootPackage: string;
  components: Map<string, Component>;
  graph: DependencyGraph;
  order: string[];
  condensation: Condensation;
  importance: ImportanceResult;
  /** Files skipped because they could not be read or parsed. */
  failedFiles: string[];
}

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
