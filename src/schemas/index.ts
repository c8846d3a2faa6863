/**
 * Zod Schemas
 *
 * Configuration and document-shape schemas.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { LogLevelSchema } from './base-schemas';

/**
 * Mapper Configuration Schema
 */
export const MetroConfigSchema = z.object({
  logLevel: LogLevelSchema.optional().default(DEFAULT_CONFIG.LOG_LEVEL),
  requireName: z.boolean().optional().default(DEFAULT_CONFIG.REQUIRE_NAME),
  nativeDepth: z.number().int().positive().optional().default(DEFAULT_CONFIG.NATIVE_DEPTH),
  embedObjectStats: z.boolean().optional().default(DEFAULT_CONFIG.EMBED_OBJECT_STATS),
  sidecarExtension: z.string()
    .min(1, 'Sidecar extension cannot be empty')
    .regex(/^\.[A-Za-z0-9_.-]+$/, 'Sidecar extension must start with a dot')
    .optional()
    .default(DEFAULT_CONFIG.SIDECAR_EXTENSION),
});

/**
 * Any JSON object of unknown origin (foreign extras, stored documents)
 */
export const ForeignDocumentSchema = z.record(z.string(), z.unknown());

/**
 * Type exports for TypeScript inference
 */
export type MetroConfig = z.infer<typeof MetroConfigSchema>;

// Re-export base schemas
export {
  AssetFormatSchema,
  AccessLevelSchema,
  UseCaseSchema,
  ProjectPhaseSchema,
  LicenseSchema,
  LogLevelSchema,
} from './base-schemas';
