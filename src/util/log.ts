// file: src/util/log.ts
import chalk from 'chalk';
import { Env, type LogLevel } from '../config/env';

if (Env.noColor) chalk.level = 0;

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export type Logger = {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
};

function errorText(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Logger per moduł. Wszystko idzie na stderr, stdout CLI zostaje
 * zarezerwowany dla wyników (JSON).
 */
export function createLogger(scope: string, level: LogLevel = Env.logLevel): Logger {
  const enabled = (l: LogLevel) => RANK[l] >= RANK[level];
  const tag = chalk.gray(`[${scope}]`);

  return {
    debug(msg) {
      if (enabled('debug')) console.error(`${tag} ${chalk.gray(msg)}`);
    },
    info(msg) {
      if (enabled('info')) console.error(`${tag} ${chalk.cyan(msg)}`);
    },
    warn(msg) {
      if (enabled('warn')) console.error(`${tag} ${chalk.yellow(`⚠️  ${msg}`)}`);
    },
    error(msg, err) {
      if (!enabled('error')) return;
      console.error(`${tag} ${chalk.red(`💥 ${msg}`)}${err === undefined ? '' : chalk.red(`: ${errorText(err)}`)}`);
      if (enabled('debug') && err instanceof Error && err.stack) console.error(chalk.gray(err.stack));
    },
  };
}
