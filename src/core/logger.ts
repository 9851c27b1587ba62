export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Prefix every line with `[scope]`, the way the rest of the console output in
 * the editor is tagged.
 */
export function scopedLogger(scope: string, sink: Logger = console): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (...args: unknown[]) => sink.debug(tag, ...args),
    info: (...args: unknown[]) => sink.info(tag, ...args),
    warn: (...args: unknown[]) => sink.warn(tag, ...args),
    error: (...args: unknown[]) => sink.error(tag, ...args),
  };
}

/** Sink for tests and embedders that want the core to stay quiet. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
