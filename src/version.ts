/**
 * Package version string.
 */
export const VERSION = '0.1.0';
