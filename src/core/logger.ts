import pino, { type LevelWithSilent, type Logger } from 'pino';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface LoggerOptions {
  name?: string;
  /** Pretty-print to the terminal instead of writing the log file */
  verbose?: boolean;
  /** Takes precedence over LEDGERSCHED_LOG_LEVEL */
  level?: LevelWithSilent;
  logDir?: string;
}

/** `$LEDGERSCHED_HOME/logs`, falling back to `~/.ledgersched/logs` */
export function defaultLogDir(env: NodeJS.ProcessEnv = process.env): string {
  return join(env.LEDGERSCHED_HOME || join(homedir(), '.ledgersched'), 'logs');
}

/**
 * Map a user-supplied level name onto a pino level. Unknown or empty
 * values fall back.
 */
export function resolveLogLevel(value: string | undefined, fallback: LevelWithSilent = 'debug'): LevelWithSilent {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? fallback;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const name = options.name ?? 'ledgersched';
  const level = options.level ?? resolveLogLevel(process.env.LEDGERSCHED_LOG_LEVEL);

  if (options.verbose) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, ignore: 'pid,hostname' },
      },
    });
  }

  const logDir = options.logDir ?? defaultLogDir();
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  return pino({
    name,
    level,
    transport: {
      target: 'pino/file',
      options: { destination: join(logDir, `${name}.log`), mkdir: true },
    },
  });
}

let _logger: Logger | null = null;

export function getLogger(): Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: Logger): void {
  _logger = logger;
}

/** Child of the process logger tagged with a component name */
export function componentLogger(component: string): Logger {
  return getLogger().child({ component });
}
