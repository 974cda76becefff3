import { glob } from 'glob';

import { DEFAULT_IGNORES } from './constants';

/**
 * Candidate Python sources under `rootDir`, absolute and sorted. Test
 * directories, virtualenvs and caches are left out.
 */
export async function discoverPythonFiles(rootDir: string, ignore: string[] = []): Promise<string[]> {
  const files = await glob('**/*.py', {
    cwd: rootDir,
    absolute: true,
    nodir: true,
    ignore: [...DEFAULT_IGNORES, ...ignore],
  });
  return files.sort((a, b) => a.localeCompare(b));
}
