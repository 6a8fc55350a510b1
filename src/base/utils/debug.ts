/**
 * Debug configuration module
 * Controls debug output for the view-index components
 *
 * Debug Levels:
 * - VIEW_INDEX_DEBUG=0 or unset: No debug output (default)
 * - VIEW_INDEX_DEBUG=1: Standard debug output (roots, scan summaries, registrations)
 * - VIEW_INDEX_DEBUG=2: Verbose debug output (every accepted resource and skipped directory)
 */

export type DebugLevel = 0 | 1 | 2;

export interface DebugConfig {
  level: DebugLevel;
  enabled: boolean; // level >= 1
  verbose: boolean; // level >= 2
  components: {
    scanner: DebugLevel;
    index: DebugLevel;
    routes: DebugLevel;
    config: DebugLevel;
  };
}

export type DebugComponent = keyof DebugConfig['components'];

let cachedConfig: DebugConfig | null = null;

/**
 * Parse debug level from environment variable
 */
function parseDebugLevel(value: string | undefined): DebugLevel {
  if (!value) return 0;
  const level = parseInt(value, 10);
  if (level === 2) return 2;
  if (level === 1) return 1;
  return 0;
}

/**
 * Get debug configuration based on environment variables
 *
 * - VIEW_INDEX_DEBUG=0|1|2: Global debug level
 * - VIEW_INDEX_DEBUG_<COMPONENT>=1|2: Component-specific debug level
 */
export function getDebugConfig(): DebugConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const globalLevel = parseDebugLevel(process.env.VIEW_INDEX_DEBUG);

  cachedConfig = {
    level: globalLevel,
    enabled: globalLevel >= 1,
    verbose: globalLevel >= 2,
    components: {
      scanner: parseDebugLevel(process.env.VIEW_INDEX_DEBUG_SCANNER) || globalLevel,
      index: parseDebugLevel(process.env.VIEW_INDEX_DEBUG_INDEX) || globalLevel,
      routes: parseDebugLevel(process.env.VIEW_INDEX_DEBUG_ROUTES) || globalLevel,
      config: parseDebugLevel(process.env.VIEW_INDEX_DEBUG_CONFIG) || globalLevel,
    },
  };

  return cachedConfig;
}

/**
 * Check if debug is enabled for a specific component (level >= 1)
 */
export function isDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 1;
}

/**
 * Check if verbose debug is enabled for a specific component (level >= 2)
 */
export function isVerboseDebugEnabled(component: DebugComponent): boolean {
  return getDebugConfig().components[component] >= 2;
}

/**
 * Drop the cached config so the environment is read again
 */
export function resetDebugConfig(): void {
  cachedConfig = null;
}
