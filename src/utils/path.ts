import * as path from 'path';

export function normalizeRepoPath(value: string): string {
  return value.split(path.sep).join('/');
}

export function toAbsolutePath(rootDir: string, filePath: string): string {
  return path.isAbsolute(filePath) ? path.normalize(filePath) : path.resolve(rootDir, filePath);
}

export function relativeRepoPath(rootDir: string, absPath: string): string {
  return normalizeRepoPath(path.relative(rootDir, absPath));
}
