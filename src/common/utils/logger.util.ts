import { Logger } from '@nestjs/common';

export type LogLevel = 'log' | 'warn' | 'error' | 'debug';

/**
 * Writes a domain event as `<message> | <json payload>`. Metadata entries that
 * are undefined are left out of the payload.
 */
export function logStructured(
  logger: Logger,
  level: LogLevel,
  action: string,
  message: string,
  metadata: Record<string, unknown> = {},
): void {
  const defined = Object.entries(metadata).filter(([, value]) => value !== undefined);
  const payload = JSON.stringify({
    action,
    ...Object.fromEntries(defined),
    timestamp: new Date().toISOString(),
  });

  logger[level](`${message} | ${payload}`);
}
