/**
 * Route Registrar - map discovered extensions to the view dispatcher
 */

import { logger } from '../base/utils/logger.js';
import type { ViewsContext } from './types.js';

/**
 * Map the dispatcher to every extension it does not serve yet
 *
 * @param extensions - patterns such as `*.xhtml`, typically collected while scanning
 * @returns the patterns that were added
 */
export function mapViewDispatcher(context: ViewsContext, extensions: Iterable<string>): string[] {
  const dispatcher = context.dispatcher;
  if (!dispatcher) {
    logger.debug('routes', 'No dispatcher registered, skipping extension mappings');
    return [];
  }

  const mappings = new Set(dispatcher.getMappings());
  const added: string[] = [];

  for (const extension of extensions) {
    if (!mappings.has(extension)) {
      dispatcher.addMapping(extension);
      mappings.add(extension);
      added.push(extension);
    }
  }

  if (added.length > 0) {
    logger.debug('routes', 'Mapped dispatcher', { added });
  }

  return added;
}
