/**
 * Shared test utilities for view-index tests
 */

import { createRecordParameterSource } from '../base/config/loader.js';
import { createMemoryResourceTree } from '../resources/memory-tree.js';
import { createViewsContext } from './context.js';
import type { ResourceTree, ViewDispatcher, ViewsContext } from './types.js';

/**
 * Resource tree whose content can be replaced between scans, counting listings
 */
export class SwappableResourceTree implements ResourceTree {
  listings = 0;
  private tree: ResourceTree;

  constructor(paths: string[] = []) {
    this.tree = createMemoryResourceTree(paths);
  }

  setPaths(paths: string[]): void {
    this.tree = createMemoryResourceTree(paths);
  }

  listChildren(path: string): Promise<string[] | undefined> {
    this.listings++;
    return this.tree.listChildren(path);
  }
}

/**
 * In-process dispatcher keeping its mappings in an array
 */
export class FakeDispatcher implements ViewDispatcher {
  readonly added: string[] = [];

  constructor(readonly mappings: string[] = []) {}

  getMappings(): Iterable<string> {
    return this.mappings;
  }

  addMapping(pattern: string): void {
    this.mappings.push(pattern);
    this.added.push(pattern);
  }
}

export interface TestContextOptions {
  paths?: string[];
  parameters?: Record<string, string | undefined>;
  dispatcher?: ViewDispatcher;
}

export interface TestContext {
  context: ViewsContext;
  tree: SwappableResourceTree;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const tree = new SwappableResourceTree(options.paths);
  const context = createViewsContext({
    resources: tree,
    initParameters: createRecordParameterSource(options.parameters ?? {}),
    dispatcher: options.dispatcher,
  });
  return { context, tree };
}
