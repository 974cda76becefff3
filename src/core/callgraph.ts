import { execFile } from 'child_process';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';

import { z } from 'zod';

import { CallGraphFacts, CallGraphToolOptions, Component, Logger } from '../types';
import { consoleLogger, logVerbose } from '../utils/log';
import { toAbsolutePath } from '../utils/path';
import {
  CALLGRAPH_MODULE,
  DEFAULT_CALLGRAPH_TIMEOUT_MS,
  DEFAULT_PYTHON_EXECUTABLE,
  ENV_CALLGRAPH_OUTPUT,
  ENV_PYTHON_EXECUTABLE,
  PYTHON_EXTENSION,
} from './constants';
import { CallGraphError } from './errors';

const execFileAsync = promisify(execFile);

const callGraphFactsSchema = z.record(z.array(z.string()));

const MAX_STDIO_BUFFER = 64 * 1024 * 1024;

export interface RunCallGraphOptions extends CallGraphToolOptions {
  /** Directory handed to the tool as `--package`. */
  packageRoot: string;
  files: string[];
  verbose?: boolean;
  logger?: Logger;
}

/** Tool settings from the environment, falling back to defaults. */
export function loadCallGraphToolConfig(env: NodeJS.ProcessEnv = process.env): CallGraphToolOptions {
  const pythonExecutable = env[ENV_PYTHON_EXECUTABLE]?.trim() || DEFAULT_PYTHON_EXECUTABLE;
  const outputPath = env[ENV_CALLGRAPH_OUTPUT]?.trim() || path.join(os.tmpdir(), 'pydepgraph-callgraph.json');
  return { pythonExecutable, outputPath };
}

/** Validates the tool's JSON output: an object mapping call sites to callee lists. */
export function parseCallGraphFacts(raw: string): CallGraphFacts {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CallGraphError(`call graph output is not valid JSON: ${detail}`, 'invalid-output');
  }

  const parsed = callGraphFactsSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new CallGraphError(`call graph output has an unexpected shape${where}`, 'invalid-output');
  }
  return parsed.data;
}

/**
 * Key under which call-graph tools report calls made from inside
 * `component`: the file path without extension, then the qualified name,
 * e.g. `pkg/mod.Class.method`.
 */
export function callSiteKey(component: Component): string {
  const fileKey = component.relativePath.endsWith(PYTHON_EXTENSION)
    ? component.relativePath.slice(0, -PYTHON_EXTENSION.length)
    : component.relativePath;
  const moduleDepth = fileKey.split('/').filter(Boolean).length;
  const qualified = component.id.split('.').slice(moduleDepth).join('.');
  return qualified ? `${fileKey}.${qualified}` : fileKey;
}

interface ProcessFailure {
  code?: unknown;
  stderr?: unknown;
}

// child_process errors can come from another realm; read them by shape.
function asProcessFailure(error: unknown): ProcessFailure | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  return {
    code: 'code' in error ? error.code : undefined,
    stderr: 'stderr' in error ? error.stderr : undefined,
  };
}

function stderrText(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  return '';
}

/** Maps a failed `execFile` call onto the call-graph failure reasons. */
export function toCallGraphError(error: unknown, executable: string): CallGraphError {
  const failure = asProcessFailure(error);
  if (!failure) {
    return new CallGraphError(`call graph tool failed: ${String(error)}`, 'exit-code');
  }

  if (failure.code === 'ENOENT') {
    return new CallGraphError(`call graph executable not found: ${executable}`, 'missing-executable');
  }

  const stderr = stderrText(failure.stderr);
  const exitCode = typeof failure.code === 'number' ? failure.code : null;
  const summary = stderr.trim().split('\n').slice(-1)[0] ?? '';
  return new CallGraphError(
    `call graph tool exited with ${exitCode ?? 'a signal'}${summary ? `: ${summary}` : ''}`,
    'exit-code',
    { exitCode, stderr },
  );
}

/**
 * Runs the external call-graph tool over `files` and returns its facts.
 * Any failure is fatal to the caller: a missing executable, a non-zero exit
 * or output that does not validate all raise {@link CallGraphError}.
 */
export async function runCallGraphTool(options: RunCallGraphOptions): Promise<CallGraphFacts> {
  const logger = options.logger ?? consoleLogger;
  const verbose = options.verbose ?? false;
  const packageRoot = path.resolve(options.packageRoot);
  const files = options.files.map((file) => toAbsolutePath(packageRoot, file));
  const outputPath = path.resolve(options.outputPath);

  const env = { ...process.env };
  delete env.PYTHONPATH;

  const args = ['-m', CALLGRAPH_MODULE, ...files, '--package', packageRoot, '--output', outputPath];
  logVerbose(verbose, `[callgraph] running ${options.pythonExecutable} on ${files.length} files`, logger);

  try {
    await execFileAsync(options.pythonExecutable, args, {
      cwd: packageRoot,
      env,
      timeout: options.timeoutMs ?? DEFAULT_CALLGRAPH_TIMEOUT_MS,
      maxBuffer: MAX_STDIO_BUFFER,
    });
  } catch (error) {
    throw toCallGraphError(error, options.pythonExecutable);
  }

  let raw: string;
  try {
    raw = await fs.readFile(outputPath, 'utf8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CallGraphError(`call graph output could not be read: ${detail}`, 'invalid-output');
  }

  const facts = parseCallGraphFacts(raw);
  logVerbose(verbose, `[callgraph] ${Object.keys(facts).length} call sites reported`, logger);
  return facts;
}
