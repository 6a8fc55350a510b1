/**
 * Temporary web roots on disk for integration tests
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export interface TestWebRoot {
  dir: string;
  cleanup: () => Promise<void>;
}

/**
 * Create a temp directory holding the given tree-relative files
 */
export async function createTestWebRoot(files: string[], prefix = 'view-index-'): Promise<TestWebRoot> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));

  for (const file of files) {
    const target = path.join(dir, ...file.split('/').filter(Boolean));
    if (file.endsWith('/')) {
      await fs.mkdir(target, { recursive: true });
    } else {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, '<html/>');
    }
  }

  return {
    dir,
    cleanup: () => fs.rm(dir, { recursive: true, force: true }),
  };
}
