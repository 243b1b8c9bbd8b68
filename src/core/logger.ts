import pino, { type Logger, type LevelWithSilent } from 'pino';
import { NAME } from '../version.js';

export type { Logger };

export function createLogger(
  name: string = NAME,
  verbose: boolean = false,
  level: LevelWithSilent = 'warn',
): Logger {
  if (verbose) {
    return pino({
      name,
      level: 'debug',
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  // stdout belongs to the CLI summary, so logs go to stderr
  return pino({ name, level }, pino.destination({ dest: 2, sync: true }));
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
