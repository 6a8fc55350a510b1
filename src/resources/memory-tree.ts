/**
 * In-memory resource tree built from a list of paths
 */

import { PATH_SEPARATOR } from '../base/utils/path-utils.js';
import type { ResourceTree } from '../views/types.js';

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function ensureLeadingSeparator(value: string): string {
  return value.startsWith(PATH_SEPARATOR) ? value : PATH_SEPARATOR + value;
}

/**
 * Create a resource tree holding the given resources
 *
 * Paths ending with `/` add an (empty) directory. Every parent directory
 * of a path exists implicitly.
 *
 * @example
 * createMemoryResourceTree(['/views/home.xhtml', '/views/admin/list.xhtml'])
 */
export function createMemoryResourceTree(paths: Iterable<string>): ResourceTree {
  const directories = new Map<string, Set<string>>([[PATH_SEPARATOR, new Set()]]);

  for (const rawPath of paths) {
    const resourcePath = ensureLeadingSeparator(rawPath);
    if (resourcePath === PATH_SEPARATOR) {
      continue;
    }

    const segments = resourcePath.split(PATH_SEPARATOR).filter(Boolean);
    const isDirectoryPath = resourcePath.endsWith(PATH_SEPARATOR);
    let parent = PATH_SEPARATOR;

    segments.forEach((segment, index) => {
      const last = index === segments.length - 1;
      const child = last && !isDirectoryPath
        ? parent + segment
        : parent + segment + PATH_SEPARATOR;

      const siblings = directories.get(parent) ?? new Set<string>();
      siblings.add(child);
      directories.set(parent, siblings);

      if (child.endsWith(PATH_SEPARATOR) && !directories.has(child)) {
        directories.set(child, new Set());
      }
      parent = child;
    });
  }

  return {
    async listChildren(treePath: string): Promise<string[] | undefined> {
      const key = treePath.endsWith(PATH_SEPARATOR) ? treePath : treePath + PATH_SEPARATOR;
      const children = directories.get(ensureLeadingSeparator(key));
      return children ? [...children].sort(byName) : undefined;
    },
  };
}
