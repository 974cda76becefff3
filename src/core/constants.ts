import { PagerankOptions } from '../types';

export const DEFAULT_IGNORES = [
  '**/.git/**',
  '**/node_modules/**',
  '**/__pycache__/**',
  '**/venv/**',
  '**/.venv/**',
  '**/test/**',
  '**/tests/**',
  '**/test_*.py',
  '**/*_test.py',
];

export const DEFAULT_MAX_WORKERS = 4;
export const DEFAULT_MAX_RESOLVE_DEPTH = 64;

export const DEFAULT_PAGERANK: PagerankOptions = {
  alpha: 0.85,
  maxIterations: 100,
  tolerance: 1e-6,
};

export const PYTHON_EXTENSION = '.py';
export const PACKAGE_INIT_FILE = '__init__.py';
export const PACKAGE_INIT_MODULE = '__init__';
export const CONSTRUCTOR_NAME = '__init__';

export const BUILTIN_CALLEE_PREFIX = '<builtin>';

export const DEFAULT_PYTHON_EXECUTABLE = 'python3';
export const CALLGRAPH_MODULE = 'pycg';
export const DEFAULT_CALLGRAPH_TIMEOUT_MS = 10 * 60 * 1000;

export const ENV_PYTHON_EXECUTABLE = 'PYDEPGRAPH_PYTHON';
export const ENV_CALLGRAPH_OUTPUT = 'PYDEPGRAPH_CALLGRAPH_OUTPUT';
