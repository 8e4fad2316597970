import { Logger } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { applyLogLevel } from './logging';

describe('applyLogLevel', () => {
  afterEach(() => {
    Logger.overrideLogger(['error', 'warn', 'log']);
  });

  async function contextWith(logLevel: string) {
    return Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          ignoreEnvFile: true,
          load: [() => ({ logLevel })],
        }),
      ],
    }).compile();
  }

  it('enables debug output when the loaded config asks for it', async () => {
    const app = await contextWith('debug');

    expect(applyLogLevel(app)).toBe('debug');
    expect(Logger.isLevelEnabled('debug')).toBe(true);
    expect(Logger.isLevelEnabled('verbose')).toBe(false);
    await app.close();
  });

  it('silences log lines under a warn threshold', async () => {
    const app = await contextWith('warn');

    applyLogLevel(app);
    expect(Logger.isLevelEnabled('warn')).toBe(true);
    expect(Logger.isLevelEnabled('log')).toBe(false);
    await app.close();
  });
});
