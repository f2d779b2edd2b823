// Structured logging; modules take a child logger tagged with their component.
// Output goes to stderr: stdout belongs to the MCP stdio transport.

import pino, { type Logger } from 'pino';

export type { Logger };

const STDERR = 2;

const level = process.env.LOG_LEVEL ?? 'info';

export const logger: Logger = process.env.LOG_PRETTY === '1'
  ? pino({
      name: 'playcaller',
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: STDERR,
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
          singleLine: true,
        },
      },
    })
  : pino({ name: 'playcaller', level }, pino.destination(STDERR));

export function createLogger(component: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ component, ...bindings });
}
