import * as fs from 'fs';

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

import { PythonParseError } from './errors';

export type SyntaxNode = Parser.SyntaxNode;

export interface ParsedPythonFile {
  filePath: string;
  source: string;
  root: SyntaxNode;
}

// Sources are fed to tree-sitter in chunks so long files never exceed the
// binding's input buffer.
const PARSE_CHUNK_SIZE = 16 * 1024;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

let cachedParser: Parser | null = null;

function parserInstance(): Parser {
  if (cachedParser) {
    return cachedParser;
  }
  const parser = new Parser();
  parser.setLanguage(Python);
  cachedParser = parser;
  return parser;
}

// The grammar still accepts these Python 2 forms; Python 3 rejects them.
const LEGACY_STATEMENTS = new Set(['print_statement', 'exec_statement']);

function firstErrorLine(tree: Parser.Tree): number | null {
  const cursor = tree.walk();
  for (;;) {
    if (cursor.nodeType === 'ERROR' || cursor.nodeIsMissing || LEGACY_STATEMENTS.has(cursor.nodeType)) {
      return cursor.startPosition.row + 1;
    }
    if (cursor.gotoFirstChild()) {
      continue;
    }
    while (!cursor.gotoNextSibling()) {
      if (!cursor.gotoParent()) {
        return null;
      }
    }
  }
}

export function decodePythonSource(buffer: Uint8Array, filePath: string): string {
  try {
    return utf8Decoder.decode(buffer);
  } catch {
    throw new PythonParseError(`${filePath} is not valid UTF-8`, filePath);
  }
}

export function parsePythonSource(source: string, filePath: string): ParsedPythonFile {
  const tree = parserInstance().parse((index: number) => source.slice(index, index + PARSE_CHUNK_SIZE));
  const errorLine = firstErrorLine(tree);
  if (errorLine !== null) {
    throw new PythonParseError(`syntax error in ${filePath} at line ${errorLine}`, filePath, errorLine);
  }
  return { filePath, source, root: tree.rootNode };
}

export function readPythonFile(filePath: string): ParsedPythonFile {
  return parsePythonSource(decodePythonSource(fs.readFileSync(filePath), filePath), filePath);
}

/**
 * Parsed trees keyed by absolute path. Entries are never replaced once
 * inserted; a file that failed to load is remembered as `null`.
 */
export class SyntaxTreeCache {
  private readonly entries = new Map<string, ParsedPythonFile | null>();

  constructor(private readonly onFailure?: (filePath: string, error: unknown) => void) {}

  has(filePath: string): boolean {
    return this.entries.has(filePath);
  }

  insert(parsed: ParsedPythonFile): void {
    if (!this.entries.has(parsed.filePath)) {
      this.entries.set(parsed.filePath, parsed);
    }
  }

  markFailed(filePath: string): void {
    if (!this.entries.has(filePath)) {
      this.entries.set(filePath, null);
    }
  }

  get(filePath: string): ParsedPythonFile | null {
    const cached = this.entries.get(filePath);
    if (cached !== undefined) {
      return cached;
    }

    let parsed: ParsedPythonFile | null = null;
    if (fs.existsSync(filePath)) {
      try {
        parsed = readPythonFile(filePath);
      } catch (error) {
        this.onFailure?.(filePath, error);
      }
    }
    this.entries.set(filePath, parsed);
    return parsed;
  }
}
