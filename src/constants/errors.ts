/**
 * Error Constants for the metadata mapper
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  CONFIG_VALIDATION_ERROR: 'METRO_CONFIG_VALIDATION_ERROR',
  VALIDATION_ERROR: 'METRO_VALIDATION_ERROR',
  PATH_RESOLUTION_ERROR: 'METRO_PATH_RESOLUTION_ERROR',
  FILE_SYSTEM_ERROR: 'METRO_FILE_SYSTEM_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  CONFIG_VALIDATION_ERROR: 'Configuration validation failed',
  VALIDATION_ERROR: 'Fix validation errors before continuing',
  NO_SIDECAR_PATH: 'No source file saved. Save the file first or specify an export path.',
  SIDECAR_WRITE_FAILED: 'Failed to write file',
  GLTF_READ_FAILED: 'Failed to read glTF file',
  GLTF_WRITE_FAILED: 'Failed to write glTF file',
} as const;
