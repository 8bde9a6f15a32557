import pino, { type Logger } from 'pino';
import { loadConfig, type LogLevel } from './config';

export type LoggerOptions = {
  level?: LogLevel;
  logFile?: string;
};

export function buildLogger(options: LoggerOptions = {}): Logger {
  const config = loadConfig();
  const level = options.level ?? config.LOG_LEVEL;
  const logFile = options.logFile ?? config.AUDIT_LOG_FILE;

  // sync destinations so the last lines are written before process.exit
  const destination = logFile
    ? pino.destination({ dest: logFile, mkdir: true, sync: true })
    : pino.destination({ fd: 2, sync: true });

  return pino({ level }, destination);
}

export const logger = buildLogger();

export function createLogger(correlationId: string, parent: Logger = logger): Logger {
  return parent.child({ correlationId });
}
