/**
 * Base Schemas
 *
 * Enumerations shared by the record, the applier and the configuration.
 * Identifiers come from the registry tables.
 */

import { z } from 'zod';
import { ACCESS_LEVELS, ASSET_FORMATS, LICENSES, PROJECT_PHASES, USE_CASES } from '../constants/schema';

/**
 * Asset file formats
 */
export const AssetFormatSchema = z.enum(ASSET_FORMATS);

/**
 * Access levels
 */
export const AccessLevelSchema = z.enum(ACCESS_LEVELS);

export const UseCaseSchema = z.enum(USE_CASES);

export const ProjectPhaseSchema = z.enum(PROJECT_PHASES);

export const LicenseSchema = z.enum(LICENSES);

/**
 * Logger levels accepted by the configuration
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
