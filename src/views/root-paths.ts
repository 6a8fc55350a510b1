/**
 * Root Path Registry - which directories of the resource tree hold views
 */

import { SCAN_PATHS_PARAM } from '../base/config/types.js';
import { loadViewsSettings } from '../base/config/loader.js';
import { ViewsConfigError } from '../base/utils/errors.js';
import { logger } from '../base/utils/logger.js';
import { PATH_SEPARATOR } from '../base/utils/path-utils.js';
import type { ParsedRootPath, ViewsContext } from './types.js';

/**
 * Directory scanned by convention, so views placed there need no configuration
 */
export const WEB_INF_VIEWS = '/WEB-INF/faces-views/';

/**
 * Delimiter between a root directory and its extension filter
 */
export const EXTENSION_DELIMITER = '*';

function invalidRootPath(rootPath: string, reason: string): ViewsConfigError {
  return new ViewsConfigError(`Root path "${rootPath}" ${reason}`, SCAN_PATHS_PARAM, rootPath);
}

/**
 * Split `/templates/*.xhtml` into `{ path: '/templates/', extension: '.xhtml' }`
 *
 * @throws ViewsConfigError when the delimiter occurs more than once, or the
 *   directory part is not an absolute tree path (as in `*.xhtml`)
 */
export function parseRootPath(rootPath: string): ParsedRootPath {
  const index = rootPath.indexOf(EXTENSION_DELIMITER);
  if (index !== -1 && rootPath.indexOf(EXTENSION_DELIMITER, index + 1) !== -1) {
    throw invalidRootPath(rootPath, `contains more than one "${EXTENSION_DELIMITER}"`);
  }

  const path = index === -1 ? rootPath : rootPath.slice(0, index);
  if (!path.startsWith(PATH_SEPARATOR)) {
    throw invalidRootPath(rootPath, `must start with "${PATH_SEPARATOR}"`);
  }

  const extension = index === -1 ? '' : rootPath.slice(index + 1);
  return extension ? { path, extension } : { path };
}

/**
 * Configured root paths plus {@link WEB_INF_VIEWS}, resolved once per context
 *
 * Iteration order is configuration order, then the default root.
 *
 * @throws ViewsConfigError for a malformed configured root
 */
export function getRootPaths(context: ViewsContext): ReadonlySet<string> {
  if (context.state.rootPaths) {
    return context.state.rootPaths;
  }

  const { scanPaths } = loadViewsSettings(context.initParameters);
  const rootPaths = new Set<string>();

  for (const rootPath of scanPaths) {
    const parsed = parseRootPath(rootPath);
    if (!parsed.path.endsWith(PATH_SEPARATOR)) {
      logger.warn('config', 'Root path does not end with a separator', {
        rootPath,
        hint: `Keys will keep a leading "${PATH_SEPARATOR}"`,
      });
    }
    rootPaths.add(rootPath);
  }
  rootPaths.add(WEB_INF_VIEWS);

  const resolved: ReadonlySet<string> = rootPaths;
  context.state.rootPaths = resolved;

  logger.debug('config', 'Resolved root paths', { rootPaths: [...resolved] });

  return resolved;
}
