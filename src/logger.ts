import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (text: string) => void;
  info: (text: string) => void;
  success: (text: string) => void;
  warn: (text: string) => void;
  error: (text: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogSink = Pick<Console, 'log' | 'error'>;

export function createLogger(level: LogLevel = 'info', sink: LogSink = console): Logger {
  const enabled = (at: LogLevel) => levelRank[at] >= levelRank[level];

  return {
    debug: (text) => { if (enabled('debug')) sink.log(chalk.gray(text)); },
    info: (text) => { if (enabled('info')) sink.log(chalk.blue(text)); },
    success: (text) => { if (enabled('info')) sink.log(chalk.green(text)); },
    warn: (text) => { if (enabled('warn')) sink.log(chalk.yellow(text)); },
    error: (text) => { if (enabled('error')) sink.error(chalk.red(text)); },
  };
}

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  success: noop,
  warn: noop,
  error: noop,
};
