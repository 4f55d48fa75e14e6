export interface Logger {
  info(message: string): void;
  warn?(message: string): void;
  error?(message: string): void;
  debug?(message: string): void;
}

export type SubsystemLogger = Required<Logger>;

export function normalizeLogger(logger?: Logger): SubsystemLogger {
  const fallback = console;
  const target = logger ?? fallback;
  return {
    info: target.info.bind(target),
    warn: target.warn ? target.warn.bind(target) : fallback.warn.bind(fallback),
    error: target.error ? target.error.bind(target) : fallback.error.bind(fallback),
    debug: target.debug
      ? target.debug.bind(target)
      : (fallback.debug ?? fallback.log).bind(fallback)
  };
}

export function createSubsystemLogger(subsystem: string, logger?: Logger): SubsystemLogger {
  const base = normalizeLogger(logger);
  const tag = `[${subsystem}]`;
  return {
    info: (message) => base.info(`${tag} ${message}`),
    warn: (message) => base.warn(`${tag} ${message}`),
    error: (message) => base.error(`${tag} ${message}`),
    debug: (message) => base.debug(`${tag} ${message}`)
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined
};
