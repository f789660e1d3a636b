export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

// stdout belongs to the stdio transport, so every line goes through console.error.
export function createLogger(name: string, level: LogLevel = 'INFO'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (lineLevel: LogLevel, message: string, error?: unknown) => {
    if (LOG_LEVELS.indexOf(lineLevel) < threshold) return;
    const line = `${new Date().toISOString()} - ${name} - ${lineLevel} - ${message}`;
    if (error === undefined) {
      console.error(line);
    } else {
      console.error(line, error);
    }
  };

  return {
    debug: (message) => write('DEBUG', message),
    info: (message) => write('INFO', message),
    warn: (message) => write('WARNING', message),
    error: (message, error) => write('ERROR', message, error)
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
