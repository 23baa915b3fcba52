export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

/**
 * Injected diagnostics sink. The service never configures global logging itself;
 * whoever builds a component decides where its events go.
 */
export interface Diagnostics {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
  child(scope: string): Diagnostics;
}

export interface DiagnosticsOptions {
  verbose?: boolean;
  now?: () => Date;
}

function formatLine(level: LogLevel, scope: string, message: string, now: () => Date): string {
  return `${now().toISOString()} [${level}] ${scope}: ${message}`;
}

/**
 * Console-backed sink. Lines read `2024-01-01T00:00:00.000Z [INFO] seatstream: message`.
 */
export function createDiagnostics(scope: string, options: DiagnosticsOptions = {}): Diagnostics {
  const verbose = options.verbose ?? false;
  const now = options.now ?? (() => new Date());

  const write = (
    level: LogLevel,
    sink: (...args: unknown[]) => void,
    message: string,
    details?: Record<string, unknown>
  ) => {
    const line = formatLine(level, scope, message, now);
    if (details && Object.keys(details).length > 0) sink(line, details);
    else sink(line);
  };

  return {
    debug: (message, details) => {
      if (verbose) write('DEBUG', console.debug, message, details);
    },
    info: (message, details) => write('INFO', console.info, message, details),
    warn: (message, details) => write('WARNING', console.warn, message, details),
    error: (message, details) => write('ERROR', console.error, message, details),
    child: (sub) => createDiagnostics(`${scope}:${sub}`, options),
  };
}

/** Sink that discards everything. */
export const silentDiagnostics: Diagnostics = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentDiagnostics,
};
