import { LogEngine, LogMode } from '@wgtechlabs/log-engine';

// Local time only; the analysis layer is the only caller.
LogEngine.configure({
  mode: LogMode.WARN,
  format: {
    includeIsoTimestamp: false,
    includeLocalTime: true,
  },
});

/** Human-readable log level names accepted by `configure({ logMode })`. */
export const LOG_MODES = {
  debug: LogMode.DEBUG,
  info: LogMode.INFO,
  warn: LogMode.WARN,
  error: LogMode.ERROR,
  silent: LogMode.SILENT,
  off: LogMode.OFF,
} as const;

export type LogModeName = keyof typeof LOG_MODES;

/**
 * Change the active log level at runtime.
 */
export function setLogMode(level: LogModeName): void {
  LogEngine.configure({ mode: LOG_MODES[level] });
}

export const logger = LogEngine;
