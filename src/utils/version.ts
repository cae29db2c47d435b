/**
 * Centralized version and branding for the scanner
 */

// UPDATE THIS for each release
export const VERSION = '1.0.0'

export const PRODUCT_NAME = 'eyes'

/** Prefix for scanner status lines, e.g. "[eyes] Finished scan" */
export const STATUS_PREFIX = `[${PRODUCT_NAME}]`
