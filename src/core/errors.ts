export class PythonParseError extends Error {
  readonly filePath: string;
  readonly line: number | undefined;

  constructor(message: string, filePath: string, line?: number) {
    super(message);
    this.name = 'PythonParseError';
    this.filePath = filePath;
    this.line = line;
  }
}

export type CallGraphFailureReason = 'missing-executable' | 'exit-code' | 'invalid-output';

export class CallGraphError extends Error {
  readonly reason: CallGraphFailureReason;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, reason: CallGraphFailureReason, options: { exitCode?: number | null; stderr?: string } = {}) {
    super(message);
    this.name = 'CallGraphError';
    this.reason = reason;
    this.exitCode = options.exitCode ?? null;
    this.stderr = options.stderr ?? '';
  }
}

/** Raised when a graph handed to the sorter as a condensation still has a cycle. */
export class CondensationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CondensationError';
  }
}
