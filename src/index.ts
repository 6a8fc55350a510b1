/**
 * view-index - discover template views in a resource tree and resolve
 * extensionless lookup keys to them.
 */

// Views
export * from './views/index.js';

// Resource trees
export { createFsResourceTree, createMemoryResourceTree, resolveTreePath } from './resources/index.js';

// Configuration
export * from './base/config/index.js';

// Utilities
export {
  isDirectory,
  stripPrefixPath,
  stripExtension,
  getExtension,
  startsWithOneOf,
} from './base/utils/path-utils.js';
export { csvToList } from './base/utils/csv.js';
export { ViewsConfigError } from './base/utils/errors.js';
export { logger, type LogLevel, type LogContext } from './base/utils/logger.js';
