import pino from 'pino';
import type { LogConfig } from './config.js';
import { resolveProjectPath } from './paths.js';

// stdout carries command output, so pretty logs always go to stderr
function getTransport(config: LogConfig): pino.TransportSingleOptions | pino.TransportMultiOptions {
  if (config.target === 'file') {
    return {
      targets: [
        {
          target: 'pino/file',
          options: {
            destination: resolveProjectPath(config.filePath),
            mkdir: true,
          },
          level: config.level,
        },
        // Warnings and errors still reach the terminal, without stacks
        {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname,time,stack,err,error',
            messageFormat: '{if msg}{msg}{end}{if error.message}{if msg}: {end}{error.message}{end}',
            destination: 2,
          },
          level: 'warn',
        },
      ],
    };
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: true,
      destination: 2,
    },
  };
}

export function createLogger(config: LogConfig): pino.Logger {
  return pino({
    level: config.level,
    transport: getTransport(config),
    // Error objects are logged under `error`; pino only serializes `err` by default
    serializers: { error: pino.stdSerializers.err },
  });
}

let _logger: pino.Logger | null = null;

/**
 * Install the process-wide logger. Call once from the entry point.
 */
export function initLogger(config: LogConfig): void {
  _logger = createLogger(config);
}

/**
 * Library callers that never run initLogger() get warnings and errors on stderr.
 */
export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger({ level: 'warn', target: 'stdout', filePath: '' });
  }
  return _logger;
}

// Resolves the current logger on every access, so modules can import it
// before initLogger() runs
export const logger: pino.Logger = new Proxy(pino({ enabled: false }), {
  get(_target, prop) {
    const current = getLogger();
    const value = Reflect.get(current, prop);
    return typeof value === 'function' ? value.bind(current) : value;
  },
});

export default logger;
