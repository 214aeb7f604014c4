import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
}

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { name = 'diskpulse', level = 'info', pretty = false } = options;

  const transport = pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined;

  return pino({
    name,
    level,
    transport,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  });
}

let defaultLogger: pino.Logger | null = null;
const componentLoggers = new Map<string, pino.Logger>();
// Every child handed out, including those taken from a default logger since replaced.
const issuedChildren = new Set<pino.Logger>();

/**
 * The shared logger, or a child of it bound to `{ component }`.
 * Children are cached so that {@link setLogLevel} can reach them.
 */
export function getLogger(component?: string): pino.Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({ pretty: process.env.NODE_ENV !== 'production' });
  }
  if (!component) return defaultLogger;

  let child = componentLoggers.get(component);
  if (!child) {
    child = defaultLogger.child({ component });
    componentLoggers.set(component, child);
    issuedChildren.add(child);
  }
  return child;
}

/**
 * Replace the shared logger. Later `getLogger(component)` calls return children of `logger`;
 * children taken earlier keep writing through the logger they came from.
 */
export function setDefaultLogger(logger: pino.Logger): void {
  defaultLogger = logger;
  componentLoggers.clear();
}

// pino children copy the parent's level when created; later changes must be applied to each.
export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
  for (const child of issuedChildren) {
    child.level = level;
  }
}
