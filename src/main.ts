import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import {
  INestApplicationContext,
  Logger as NestLogger,
} from '@nestjs/common';
import { Logger as PinoLogger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { TetraChannelClient } from './channel/tetra-channel.client';
import { registeredPlayers } from './server/server.decoder';

/**
 * 설정/로깅/클라이언트를 묶은 standalone 컨텍스트를 만든다.
 * HTTP 서버는 띄우지 않는다.
 */
export const createApplicationContext =
  async (): Promise<INestApplicationContext> => {
    const app = await NestFactory.createApplicationContext(AppModule, {
      bufferLogs: true,
    });
    app.useLogger(app.get(PinoLogger));
    app.enableShutdownHooks();
    return app;
  };

async function bootstrap() {
  const bootstrapLogger = new NestLogger('Bootstrap');
  let app: INestApplicationContext | undefined;

  try {
    app = await createApplicationContext();
    const logger = app.get(PinoLogger);
    const client = app.get(TetraChannelClient);

    const result = await client.getServerStats();
    if (!result.success) {
      logger.warn(
        { kind: result.error.kind, message: result.error.message },
        'Failed to fetch server statistics',
      );
      process.exitCode = 1;
    } else {
      logger.log({
        message: 'Server statistics',
        registeredPlayers: registeredPlayers(result.data),
        rankedCount: result.data.rankedCount,
        gamesPlayed: result.data.gamesPlayed,
        cachedUntil: result.cache?.cachedUntil.toISOString() ?? null,
      });
    }
  } catch (error) {
    const stack = error instanceof Error ? error.stack : undefined;
    const message =
      error instanceof Error ? error.message : JSON.stringify(error);

    bootstrapLogger.error(`Failed to bootstrap application: ${message}`, stack);
    process.exitCode = 1;
  } finally {
    if (app) {
      await app.close();
    }
  }
}

if (require.main === module) {
  void bootstrap();
}
