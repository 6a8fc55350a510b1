/**
 * View Index Types
 *
 * Collaborators the scanner talks to, and the shapes it produces.
 */

import type { InitParameterSource } from '../base/config/types.js';

/**
 * Listing primitive of a hierarchical resource tree
 *
 * Returned paths are absolute within the tree. Directories end with `/`.
 * `undefined` means the path does not exist or cannot be listed.
 */
export interface ResourceTree {
  listChildren(path: string): Promise<string[] | undefined>;
}

/**
 * Request dispatcher that views are served through
 */
export interface ViewDispatcher {
  /** URL patterns currently mapped to the dispatcher, e.g. `*.xhtml` */
  getMappings(): Iterable<string>;
  addMapping(pattern: string): void;
}

/**
 * Lookup key (with or without extension) to resource path
 */
export type ViewIndex = ReadonlyMap<string, string>;

/**
 * A root path split into its directory and optional extension filter
 */
export interface ParsedRootPath {
  path: string;
  /** e.g. `.xhtml`; absent when every resource is scanned */
  extension?: string;
}

/**
 * Application-lifetime state, each field initialized at most once
 */
export interface ViewsState {
  rootPaths?: ReadonlySet<string>;
  scannedViewsAlwaysExtensionless?: boolean;
  views?: ViewIndex;
}

export interface ViewsContext {
  readonly resources: ResourceTree;
  readonly initParameters: InitParameterSource;
  readonly dispatcher?: ViewDispatcher;
  readonly state: ViewsState;
}

/**
 * Outcome of startup initialization
 */
export interface ViewsInitResult {
  scanned: boolean;
  views: ViewIndex;
  extensions: ReadonlySet<string>;
}
