// src/services/logger.ts — structured logging for the gateway
import { Logger, type ILogObj } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function resolveLogLevel(raw: string | undefined): number {
  const key = raw?.trim().toLowerCase();
  if (key && Object.hasOwn(LEVELS, key)) return LEVELS[key];
  return LEVELS.info;
}

// LOG_STREAM=stderr keeps stdout free for the stdio MCP transport.
const toStderr = process.env.LOG_STREAM === 'stderr';

export const logger: Logger<ILogObj> = new Logger<ILogObj>({
  name: 'travel-gateway',
  minLevel: resolveLogLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  type: toStderr ? 'hidden' : 'pretty',
});

if (toStderr) {
  logger.attachTransport((logObj) => {
    process.stderr.write(`${JSON.stringify(logObj)}\n`);
  });
}
