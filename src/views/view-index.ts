/**
 * View Index - scans every root once and serves lookups from the result
 */

import { loadViewsSettings } from '../base/config/loader.js';
import { logger } from '../base/utils/logger.js';
import { stripPrefixPath } from '../base/utils/path-utils.js';
import { getRootPaths, parseRootPath, WEB_INF_VIEWS } from './root-paths.js';
import { scanViews } from './scanner.js';
import { ViewIndexSnapshot } from './view-snapshot.js';
import type { ViewIndex, ViewsContext } from './types.js';

/**
 * Run the scanner over every root path of the context
 *
 * Later roots overwrite keys collected from earlier ones.
 */
export async function scanViewsFromRootPaths(
  context: ViewsContext,
  collectedViews: Map<string, string>,
  collectedExtensions?: Set<string>
): Promise<void> {
  for (const rootPath of getRootPaths(context)) {
    const { path, extension } = parseRootPath(rootPath);
    const listing = await context.resources.listChildren(path);

    await scanViews(context.resources, path, listing, collectedViews, extension, collectedExtensions);
  }
}

/**
 * Scan all roots into a fresh map, without touching the cached index
 */
export async function scanAllViews(context: ViewsContext): Promise<Map<string, string>> {
  const collectedViews = new Map<string, string>();
  await scanViewsFromRootPaths(context, collectedViews);
  return collectedViews;
}

/**
 * Scan all roots and cache the result in the context
 *
 * An empty result is not cached: views may not exist yet, and a later call
 * gets to scan again.
 *
 * @returns the views found, or an empty map
 */
export async function scanAndStoreViews(
  context: ViewsContext,
  collectedExtensions?: Set<string>
): Promise<ViewIndex> {
  const collectedViews = new Map<string, string>();
  await scanViewsFromRootPaths(context, collectedViews, collectedExtensions);

  if (collectedViews.size === 0) {
    logger.debug('index', 'No views found, index not stored');
    return new ViewIndexSnapshot();
  }

  const views = new ViewIndexSnapshot(collectedViews);
  context.state.views = views;

  logger.debug('index', 'Stored view index', { keys: views.size });

  return views;
}

/**
 * Scan and store unless an index is already cached
 */
export async function tryScanAndStoreViews(context: ViewsContext): Promise<ViewIndex> {
  return context.state.views ?? scanAndStoreViews(context);
}

/**
 * The cached index, or an empty one before a successful scan
 */
export function getViews(context: ViewsContext): ViewIndex {
  return context.state.views ?? new ViewIndexSnapshot();
}

/**
 * Resolve a lookup key to its resource path; unknown keys pass through
 */
export function getMappedPath(context: ViewsContext, path: string): string {
  return context.state.views?.get(path) ?? path;
}

/**
 * Strip {@link WEB_INF_VIEWS} from the resource, if it starts with it
 */
export function stripViewsPrefix(resource: string): string {
  return stripPrefixPath(WEB_INF_VIEWS, resource);
}

/**
 * Whether scanned views are always rendered without extension
 *
 * Without the setting, it depends on whether the request URI used one.
 */
export function isScannedViewsAlwaysExtensionless(context: ViewsContext): boolean {
  if (context.state.scannedViewsAlwaysExtensionless === undefined) {
    context.state.scannedViewsAlwaysExtensionless =
      loadViewsSettings(context.initParameters).alwaysExtensionless;
  }

  return context.state.scannedViewsAlwaysExtensionless;
}
