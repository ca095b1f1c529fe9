import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { TetraChannelConfig } from '../config/configuration';
import { DEFAULT_RANK_STANDING_POLICY } from '../league/rank-standing.decoder';
import { FetchTransport } from './fetch.transport';
import { TetraChannelClient } from './tetra-channel.client';
import {
  DEFAULT_TETRA_CHANNEL_BASE_URL,
  DEFAULT_TETRA_CHANNEL_USER_AGENT,
  TETRA_CHANNEL_OPTIONS,
  TETRA_CHANNEL_TRANSPORT,
} from './tetra-channel.constants';
import type {
  TetraChannelClientOptions,
  TetraTransport,
} from './tetra-channel.interfaces';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: TETRA_CHANNEL_OPTIONS,
      inject: [ConfigService],
      useFactory: (config: ConfigService): TetraChannelClientOptions => {
        const channelConfig = config.get<TetraChannelConfig>('tetraChannel');

        return {
          userAgent:
            channelConfig?.userAgent ?? DEFAULT_TETRA_CHANNEL_USER_AGENT,
          sessionId: channelConfig?.sessionId ?? null,
          rankPolicy: {
            ...DEFAULT_RANK_STANDING_POLICY,
            precedence:
              channelConfig?.rankPrecedence ??
              DEFAULT_RANK_STANDING_POLICY.precedence,
          },
        };
      },
    },
    {
      provide: TETRA_CHANNEL_TRANSPORT,
      inject: [ConfigService],
      useFactory: (config: ConfigService): TetraTransport =>
        new FetchTransport({
          baseUrl: config.get<string>(
            'tetraChannel.baseUrl',
            DEFAULT_TETRA_CHANNEL_BASE_URL,
          ),
        }),
    },
    TetraChannelClient,
  ],
  exports: [TetraChannelClient],
})
export class TetraChannelModule {}
