// src/log.ts
export type Logger = {
  info: (msg: string, ...extra: unknown[]) => void;
  warn: (msg: string, ...extra: unknown[]) => void;
  error: (msg: string, ...extra: unknown[]) => void;
};

/** Console logger that prefixes every line with `[tag]`. */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (msg, ...extra) => console.log(`${prefix} ${msg}`, ...extra),
    warn: (msg, ...extra) => console.warn(`${prefix} ${msg}`, ...extra),
    error: (msg, ...extra) => console.error(`${prefix} ${msg}`, ...extra),
  };
}
