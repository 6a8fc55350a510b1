/**
 * Split a comma separated value into trimmed, non-blank entries
 */
export function csvToList(value: string | undefined | null): string[] {
  if (!value) {
    return [];
  }

  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
