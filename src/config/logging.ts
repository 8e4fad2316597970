import { INestApplicationContext } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { loggerLevels } from './configuration';
import type { LogLevelName } from './env.validation';

/**
 * Switches the Nest logger to the configured LOG_LEVEL. The level is read
 * through ConfigService, after ConfigModule has loaded `.env`, so contexts are
 * created with `bufferLogs: true` and call this right after.
 */
export function applyLogLevel(app: INestApplicationContext): LogLevelName {
  const level = app.get(ConfigService).getOrThrow<LogLevelName>('logLevel');
  app.useLogger(loggerLevels(level));
  return level;
}
