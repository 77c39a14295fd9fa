/**
 * Leveled logging to stderr. Stdout carries the JSON envelopes only.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function createLogger(level: LogLevel = 'info', sink: LogSink = stderrSink): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (lineLevel: LogLevel, message: string): void => {
    if (LEVEL_ORDER[lineLevel] < threshold) return;
    sink(`${new Date().toISOString()} - ${lineLevel.toUpperCase()} - ${message}`);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

export const silentLogger: Logger = createLogger('error', () => {});
