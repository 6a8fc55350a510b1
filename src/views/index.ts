/**
 * View Index System
 *
 * Public API for discovering views under configured roots and resolving
 * lookup keys to them.
 */

// Core types
export type {
  ResourceTree,
  ViewDispatcher,
  ViewIndex,
  ParsedRootPath,
  ViewsState,
  ViewsContext,
  ViewsInitResult,
} from './types.js';

// Context
export { createViewsContext, type ViewsContextOptions } from './context.js';

// Root paths
export { WEB_INF_VIEWS, EXTENSION_DELIMITER, getRootPaths, parseRootPath } from './root-paths.js';

// Scanning
export { TREE_ROOT, RESERVED_DIRECTORIES, scanViews, canScanDirectory, canScanResource } from './scanner.js';

// Index
export {
  scanViewsFromRootPaths,
  scanAllViews,
  scanAndStoreViews,
  tryScanAndStoreViews,
  getViews,
  getMappedPath,
  stripViewsPrefix,
  isScannedViewsAlwaysExtensionless,
} from './view-index.js';

// Snapshot
export { ViewIndexSnapshot } from './view-snapshot.js';

// Routes
export { mapViewDispatcher } from './route-registrar.js';

// Startup
export { initializeViews } from './bootstrap.js';
