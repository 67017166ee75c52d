/**
 * Prefixed console logging
 *
 * Verbose `log` output is off unless debugging is switched on through
 * settings; warnings and errors always print.
 */

let debugEnabled = false;

export function setSwipeTabsDebug(value: boolean): void {
  debugEnabled = value;
}

export function isSwipeTabsDebug(): boolean {
  return debugEnabled;
}

export interface Logger {
  log(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
}

export function createLogger(prefix: string): Logger {
  const tag = `[${prefix}]`;

  return {
    log(message, data) {
      if (!debugEnabled) return;
      if (data) {
        console.log(`${tag} ${message}`, data);
      } else {
        console.log(`${tag} ${message}`);
      }
    },
    warn(message, data) {
      if (data) {
        console.warn(`${tag} ${message}`, data);
      } else {
        console.warn(`${tag} ${message}`);
      }
    },
    error(message, error) {
      console.error(`${tag} ${message}`, error);
    },
  };
}
