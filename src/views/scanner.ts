/**
 * Resource Scanner - walk a root directory and collect views
 *
 * The walk keeps an explicit stack of listing iterators rather than
 * recursing, so deep trees do not grow the call stack. Resources are visited
 * in the same order a depth-first recursive walk over the listings would use.
 */

import {
  getExtension,
  isDirectory,
  startsWithOneOf,
  stripExtension,
  stripPrefixPath,
} from '../base/utils/path-utils.js';
import { isVerboseDebugEnabled } from '../base/utils/debug.js';
import { logger } from '../base/utils/logger.js';
import type { ResourceTree } from './types.js';

export const TREE_ROOT = '/';

/**
 * Directories under the tree root that never contain views
 */
export const RESERVED_DIRECTORIES = ['/WEB-INF/', '/META-INF/'] as const;

/**
 * A root other than the tree root was asked for explicitly, so all of its
 * subdirectories may be scanned. Under the tree root the reserved
 * directories are skipped.
 */
export function canScanDirectory(rootPath: string, directory: string): boolean {
  if (rootPath !== TREE_ROOT) {
    return true;
  }

  return !startsWithOneOf(directory, ...RESERVED_DIRECTORIES);
}

export function canScanResource(resource: string, extensionToScan?: string): boolean {
  if (extensionToScan === undefined) {
    return true;
  }

  return resource.endsWith(extensionToScan);
}

/**
 * Scan views under one root and collect them in a flat map
 *
 * @param resources - tree used to list each directory entered
 * @param rootPath - directory the scan started from, e.g. `/WEB-INF/faces-views/`
 * @param resourcePaths - listing of `rootPath`; files and directories
 * @param collectedViews - receives simplified key to resource path, e.g.
 *   `foo` -> `/WEB-INF/faces-views/foo.xhtml`
 * @param extensionToScan - only resources ending with this (e.g. `.xhtml`) are taken
 * @param collectedExtensions - receives `*.ext` for every accepted resource, when given
 */
export async function scanViews(
  resources: ResourceTree,
  rootPath: string,
  resourcePaths: Iterable<string> | undefined,
  collectedViews: Map<string, string>,
  extensionToScan?: string,
  collectedExtensions?: Set<string>
): Promise<void> {
  if (!resourcePaths) {
    return;
  }

  const pending: Iterator<string>[] = [resourcePaths[Symbol.iterator]()];

  while (pending.length > 0) {
    const next = pending[pending.length - 1].next();
    if (next.done) {
      pending.pop();
      continue;
    }

    const resourcePath = next.value;

    if (isDirectory(resourcePath)) {
      if (!canScanDirectory(rootPath, resourcePath)) {
        if (isVerboseDebugEnabled('scanner')) {
          logger.debug('scanner', 'Skipped reserved directory', { rootPath, directory: resourcePath });
        }
        continue;
      }

      const children = await resources.listChildren(resourcePath);
      if (children && children.length > 0) {
        pending.push(children[Symbol.iterator]());
      }
      continue;
    }

    if (!canScanResource(resourcePath, extensionToScan)) {
      continue;
    }

    // /WEB-INF/faces-views/foo.xhtml becomes foo.xhtml for root /WEB-INF/faces-views/
    const resource = stripPrefixPath(rootPath, resourcePath);

    // The tree root already serves foo.xhtml itself, so only foo is added there
    if (rootPath !== TREE_ROOT) {
      collectedViews.set(resource, resourcePath);
    }
    collectedViews.set(stripExtension(resource), resourcePath);

    if (collectedExtensions) {
      collectedExtensions.add('*' + getExtension(resourcePath));
    }

    if (isVerboseDebugEnabled('scanner')) {
      logger.debug('scanner', 'Collected view', { key: stripExtension(resource), resourcePath });
    }
  }

  logger.debug('scanner', 'Finished root', { rootPath, extensionToScan, views: collectedViews.size });
}
