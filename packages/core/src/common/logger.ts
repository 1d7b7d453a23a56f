/**
 * Minimal logging contract. Components default to `console` and prefix each
 * line with a bracketed tag such as `[ingest]`.
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}
