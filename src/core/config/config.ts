import { type LogModeName, setLogMode } from '../../logger';
import type { HuffmanQueue } from '../../codes/huffman';

/**
 * Library-wide defaults read by the analysis layer.
 *
 * Core builders and codecs never consult this; they take every setting
 * as an explicit argument.
 */
export interface EntropiaConfig {
  /** Priority queue used by `analyzeText` for Huffman merging (default: 'heap') */
  huffmanQueue: HuffmanQueue;

  /** Share of the alphabet removed by `analyzeRemoval` when no fraction is given (default: 0.2) */
  removalFraction: number;

  /** Logger verbosity (default: 'warn') */
  logMode: LogModeName;
}

const DEFAULT_CONFIG: EntropiaConfig = {
  huffmanQueue: 'heap',
  removalFraction: 0.2,
  logMode: 'warn',
};

/** Current global configuration */
let currentConfig: EntropiaConfig = { ...DEFAULT_CONFIG };

/**
 * Configure library defaults.
 *
 * @example
 * ```ts
 * import { configure } from 'entropia';
 *
 * // Use the quadratic reference queue and verbose logging
 * configure({ huffmanQueue: 'naive', logMode: 'debug' });
 * ```
 */
export function configure(options: Partial<EntropiaConfig>): void {
  currentConfig = { ...currentConfig, ...options };
  if (options.logMode !== undefined) {
    setLogMode(options.logMode);
  }
}

/**
 * Get current configuration.
 */
export function getConfig(): Readonly<EntropiaConfig> {
  return currentConfig;
}

/**
 * Reset configuration to defaults.
 */
export function resetConfig(): void {
  currentConfig = { ...DEFAULT_CONFIG };
  setLogMode(DEFAULT_CONFIG.logMode);
}

/**
 * Get default configuration.
 */
export function getDefaultConfig(): Readonly<EntropiaConfig> {
  return DEFAULT_CONFIG;
}
