/**
 * File-system backed resource tree
 *
 * Maps tree paths (`/`, `/views/`, `/views/home.xhtml`) onto a base directory
 * on disk.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { errorMessage } from '../base/utils/errors.js';
import { logger } from '../base/utils/logger.js';
import { PATH_SEPARATOR } from '../base/utils/path-utils.js';
import type { ResourceTree } from '../views/types.js';

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Resolve a tree path to a location under `baseDir`, or null when it escapes it
 */
export function resolveTreePath(baseDir: string, treePath: string): string | null {
  const base = path.resolve(baseDir);
  const resolved = path.resolve(base, ...treePath.split(PATH_SEPARATOR).filter(Boolean));
  if (resolved !== base && !resolved.startsWith(base + path.sep)) {
    return null;
  }
  return resolved;
}

type EntryKind = 'file' | 'directory';

/**
 * Whether `realTarget` is the tree directory being listed or one of its ancestors
 */
async function isAncestorLink(baseDir: string, treePath: string, realTarget: string): Promise<boolean> {
  const segments = treePath.split(PATH_SEPARATOR).filter(Boolean);

  for (let i = 0; i <= segments.length; i++) {
    const ancestor = resolveTreePath(baseDir, segments.slice(0, i).join(PATH_SEPARATOR));
    if (ancestor !== null && (await fs.realpath(ancestor)) === realTarget) {
      return true;
    }
  }

  return false;
}

/**
 * Kind of a symbolic link's target; undefined for broken links, links to
 * anything else, and directory links that lead back up the tree
 */
async function linkKind(
  baseDir: string,
  treePath: string,
  linkPath: string
): Promise<EntryKind | undefined> {
  try {
    const stats = await fs.stat(linkPath);
    if (stats.isFile()) {
      return 'file';
    }
    if (stats.isDirectory()) {
      const cycle = await isAncestorLink(baseDir, treePath, await fs.realpath(linkPath));
      return cycle ? undefined : 'directory';
    }
  } catch (error) {
    logger.debug('scanner', 'Skipped unreadable link', { linkPath, error: errorMessage(error) });
  }
  return undefined;
}

/**
 * Create a resource tree over a directory on disk
 *
 * Listings are sorted by name. Symbolic links are followed; broken links,
 * links to anything other than a file or directory, and directory links
 * back to the listed directory or one of its ancestors are left out, as are
 * sockets, FIFOs and devices.
 */
export function createFsResourceTree(baseDir: string): ResourceTree {
  return {
    async listChildren(treePath: string): Promise<string[] | undefined> {
      const dirPath = resolveTreePath(baseDir, treePath);
      if (dirPath === null) {
        return undefined;
      }

      const prefix = treePath.endsWith(PATH_SEPARATOR) ? treePath : treePath + PATH_SEPARATOR;

      try {
        const entries = await fs.readdir(dirPath, { withFileTypes: true });
        const children: string[] = [];

        for (const entry of entries) {
          let kind: EntryKind | undefined;
          if (entry.isDirectory()) {
            kind = 'directory';
          } else if (entry.isFile()) {
            kind = 'file';
          } else if (entry.isSymbolicLink()) {
            kind = await linkKind(baseDir, treePath, path.join(dirPath, entry.name));
          }

          if (kind === 'directory') {
            children.push(prefix + entry.name + PATH_SEPARATOR);
          } else if (kind === 'file') {
            children.push(prefix + entry.name);
          }
        }

        return children.sort(byName);
      } catch (error) {
        logger.debug('scanner', 'Cannot list directory', {
          treePath,
          dirPath,
          error: errorMessage(error),
        });
        return undefined;
      }
    },
  };
}
