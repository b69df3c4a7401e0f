/**
 * Standard paths and constants used throughout vendor-patch
 */

// Re-export from schema for convenience
export { DEFAULT_MANIFEST_PATH } from './schema/manifest-schema.js'

/**
 * Default folder for storing generated patch files, relative to the project root
 */
export const DEFAULT_PATCHES_DIR = 'patches'

/**
 * Conventional Composer install root
 */
export const VENDOR_DIR = 'vendor'

/**
 * The only answer that continues after the edit session
 */
export const CONFIRM_ANSWER = 'y'

export const BACKUP_SUFFIX = '.bak'
export const TEMP_SUFFIX = '.tmp'

/**
 * composer.json is rewritten with the same indentation Composer itself uses
 */
export const MANIFEST_INDENT = 4

/**
 * Environment variables read by the CLI
 */
export const ENV_PATCHES_DIR = 'VENDOR_PATCH_DIR'
export const ENV_DEBUG = 'VENDOR_PATCH_DEBUG'
