/**
 * Configuration Types - init parameters of the view-index feature
 *
 * Parameters are looked up by name from the hosting environment. The CLI and
 * tests supply them from environment variables or plain records.
 */

// =============================================================================
// Parameter Names
// =============================================================================

/**
 * Comma separated list of extra root directories to scan. Each entry may carry
 * a `*.ext` suffix restricting that root to one extension.
 */
export const SCAN_PATHS_PARAM = 'view-index.scan-paths';

/**
 * Switches scanning at startup on or off. Enabled unless set to `false`.
 */
export const SCAN_ENABLED_PARAM = 'view-index.scan-enabled';

/**
 * When `true`, scanned views are always rendered extensionless. Otherwise it
 * depends on whether the request URI itself used an extension.
 */
export const EXTENSIONLESS_ALWAYS_PARAM = 'view-index.extensionless-always';

export const VIEWS_PARAMS = [SCAN_PATHS_PARAM, SCAN_ENABLED_PARAM, EXTENSIONLESS_ALWAYS_PARAM] as const;

export type ViewsParamName = (typeof VIEWS_PARAMS)[number];

// =============================================================================
// Sources
// =============================================================================

/**
 * Named string parameters of the hosting application
 */
export interface InitParameterSource {
  getInitParameter(name: string): string | undefined;
}
