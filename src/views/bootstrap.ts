/**
 * Startup entry point for the view index
 */

import { loadViewsSettings } from '../base/config/loader.js';
import { errorMessage, ViewsConfigError } from '../base/utils/errors.js';
import { logger } from '../base/utils/logger.js';
import { getRootPaths } from './root-paths.js';
import { mapViewDispatcher } from './route-registrar.js';
import { getViews, scanAndStoreViews } from './view-index.js';
import type { ViewsContext, ViewsInitResult } from './types.js';

/**
 * Scan and store the views, then map the dispatcher to their extensions
 *
 * Does nothing when scanning is switched off. An index that is already
 * cached is kept and nothing is scanned or mapped again.
 *
 * @throws ViewsConfigError when a configured root path is malformed
 */
export async function initializeViews(context: ViewsContext): Promise<ViewsInitResult> {
  const settings = loadViewsSettings(context.initParameters);
  if (!settings.scanEnabled) {
    logger.debug('index', 'View scanning is disabled');
    return { scanned: false, views: getViews(context), extensions: new Set() };
  }

  if (context.state.views) {
    return { scanned: false, views: context.state.views, extensions: new Set() };
  }

  try {
    getRootPaths(context);
  } catch (error) {
    if (error instanceof ViewsConfigError) {
      logger.error('config', 'Invalid view configuration', {
        parameter: error.parameter,
        value: error.value,
        error: errorMessage(error),
      });
    }
    throw error;
  }

  const extensions = new Set<string>();
  const views = await scanAndStoreViews(context, extensions);

  if (views.size > 0) {
    mapViewDispatcher(context, extensions);
  }

  logger.debug('index', 'Scanned views', {
    keys: views.size,
    extensions,
    roots: [...getRootPaths(context)],
  });

  return { scanned: true, views, extensions };
}
