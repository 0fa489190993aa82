/**
 * Global configuration module.
 */

export { configure, getConfig, resetConfig, getDefaultConfig } from './config';
export type { EntropiaConfig } from './config';
