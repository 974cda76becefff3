import fs from 'fs';
import os from 'os';
import path from 'path';

import { Logger } from '../types';

export function writeFile(p: string, content: string): void {
  fs.mkdirSync(path.dirname(p), { recursive: true });
  fs.writeFileSync(p, content, 'utf8');
}

/** Joins source lines with newlines and a trailing newline. */
export function py(...lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

/**
 * Writes `files` into a fresh repository directory named `rootName` inside
 * the OS temp directory and returns its absolute path.
 */
export function makeTempRepo(files: Record<string, string>, rootName = 'repo_root'): string {
  const parent = fs.mkdtempSync(path.join(os.tmpdir(), 'pydepgraph-'));
  const root = path.join(parent, rootName);
  fs.mkdirSync(root, { recursive: true });
  for (const [relPath, content] of Object.entries(files)) {
    writeFile(path.join(root, relPath), content);
  }
  return root;
}

export function repoFiles(root: string, files: Record<string, string>): string[] {
  return Object.keys(files)
    .filter((relPath) => relPath.endsWith('.py'))
    .map((relPath) => path.join(root, relPath));
}

export interface CapturedLogger extends Logger {
  messages: Array<{ level: 'debug' | 'warn' | 'error'; message: string }>;
}

export function captureLogger(): CapturedLogger {
  const messages: CapturedLogger['messages'] = [];
  return {
    messages,
    debug(message) {
      messages.push({ level: 'debug', message });
    },
    warn(message) {
      messages.push({ level: 'warn', message });
    },
    error(message) {
      messages.push({ level: 'error', message });
    },
  };
}
