import type { InitParameterSource } from '../base/config/types.js';
import { createRecordParameterSource } from '../base/config/loader.js';
import type { ResourceTree, ViewDispatcher, ViewsContext } from './types.js';

export interface ViewsContextOptions {
  resources: ResourceTree;
  initParameters?: InitParameterSource;
  dispatcher?: ViewDispatcher;
}

/**
 * Create the application context every view-index entry point works on
 *
 * State starts empty and is filled lazily by the registry and the index.
 */
export function createViewsContext(options: ViewsContextOptions): ViewsContext {
  return {
    resources: options.resources,
    initParameters: options.initParameters ?? createRecordParameterSource({}),
    dispatcher: options.dispatcher,
    state: {},
  };
}
