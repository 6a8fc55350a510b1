/**
 * Resource path helpers
 *
 * Paths here are resource-tree paths, always `/`-separated, where a trailing
 * separator marks a directory. None of these functions touch the file system.
 */

export const PATH_SEPARATOR = '/';

/**
 * Whether the path denotes a directory in a resource listing
 */
export function isDirectory(resourcePath: string): boolean {
  return resourcePath.endsWith(PATH_SEPARATOR);
}

/**
 * Strip `prefix` from the start of `resourcePath`
 *
 * @returns the remainder, or `resourcePath` as-is if it does not start with `prefix`
 */
export function stripPrefixPath(prefix: string, resourcePath: string): string {
  return resourcePath.startsWith(prefix) ? resourcePath.slice(prefix.length) : resourcePath;
}

/**
 * Index of the extension dot in the last path segment, or -1
 */
function extensionIndex(resourcePath: string): number {
  const lastDot = resourcePath.lastIndexOf('.');
  const lastSeparator = resourcePath.lastIndexOf(PATH_SEPARATOR);
  return lastDot > lastSeparator ? lastDot : -1;
}

/**
 * Remove the trailing extension, e.g. `/views/foo.xhtml` -> `/views/foo`
 */
export function stripExtension(resourcePath: string): string {
  const index = extensionIndex(resourcePath);
  return index === -1 ? resourcePath : resourcePath.slice(0, index);
}

/**
 * Extension of the last path segment including the dot, e.g. `.xhtml`, or ''
 */
export function getExtension(resourcePath: string): string {
  const index = extensionIndex(resourcePath);
  return index === -1 ? '' : resourcePath.slice(index);
}

export function startsWithOneOf(value: string, ...prefixes: string[]): boolean {
  return prefixes.some((prefix) => value.startsWith(prefix));
}
