/**
 * Console logging with a component prefix, the way every Mnemo package logs.
 * Debug lines are only printed when MNEMO_DEBUG=1.
 */

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function debugEnabled(): boolean {
  const flag = process.env.MNEMO_DEBUG;
  return flag === '1' || flag === 'true';
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => {
      if (debugEnabled()) console.debug(prefix, ...args);
    },
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}

/** Shorten a snippet for log lines: whitespace collapsed, ellipsis past max. */
export function preview(text: string, max = 40): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  return clean.length > max ? `${clean.slice(0, max - 3)}...` : clean;
}
