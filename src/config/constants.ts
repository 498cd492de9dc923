/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.lintmux.ini';
export const DEFAULT_IGNORE_PATTERNS = ['**/node_modules/**', '**/.git/**'];
export const DEFAULT_MAX_RESULTS = 50;

// Placeholder substituted with the analysis target in tool arguments
export const TARGET_PLACEHOLDER = '{target}';
