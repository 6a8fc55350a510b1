/**
 * Raised for configuration that cannot be interpreted, such as a root path
 * carrying more than one `*` extension delimiter.
 */
export class ViewsConfigError extends Error {
  constructor(
    message: string,
    readonly parameter?: string,
    readonly value?: string
  ) {
    super(message);
    this.name = 'ViewsConfigError';
  }
}

/**
 * Extract a printable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
