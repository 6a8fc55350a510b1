/**
 * Configuration Validator
 *
 * Zod schema for the raw init parameters read from the hosting
 * environment. Every parameter is optional and degrades to its default.
 */

import { z } from 'zod';
import { logger } from './logger.js';
import { csvToList } from './csv.js';

/**
 * Boolean init parameter: only the literal `true` (any case) is true
 */
const trueFlag = z
  .string()
  .optional()
  .transform((value) => value?.trim().toLowerCase() === 'true');

/**
 * Boolean init parameter that is on unless explicitly set to `false`
 */
const enabledFlag = z
  .string()
  .optional()
  .transform((value) => value?.trim().toLowerCase() !== 'false');

/**
 * Raw view-index init parameters
 */
export const ViewsSettingsSchema = z.object({
  scanPaths: z
    .string()
    .optional()
    .transform(csvToList)
    .describe('Extra root directories to scan, comma separated'),
  scanEnabled: enabledFlag.describe('Master switch for view scanning at startup'),
  alwaysExtensionless: trueFlag.describe('Treat scanned views as extensionless for link rendering'),
});

export type ViewsSettings = z.infer<typeof ViewsSettingsSchema>;

/**
 * Validation result
 */
export interface ValidationResult<T> {
  valid: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Validate configuration data against a Zod schema
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @param context - Context for error messages (e.g., parameter source)
 * @returns Validation result with parsed data or errors
 */
export function validateConfig<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  context: string
): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { valid: true, data: result.data };
  }

  const errors = result.error.issues.map((issue: z.ZodIssue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });

  logger.error('config', `Invalid configuration in ${context}`, { errors });

  return { valid: false, errors };
}

/**
 * Validate raw view-index init parameters
 */
export function validateViewsSettings(
  data: unknown,
  context: string
): ValidationResult<ViewsSettings> {
  return validateConfig(ViewsSettingsSchema, data, context);
}
