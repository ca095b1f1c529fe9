import { DEFAULT_RANK_STANDING_POLICY } from '../league/rank-standing.decoder';
import { FetchTransport } from './fetch.transport';
import { TetraChannelClient } from './tetra-channel.client';
import {
  DEFAULT_TETRA_CHANNEL_BASE_URL,
  DEFAULT_TETRA_CHANNEL_USER_AGENT,
} from './tetra-channel.constants';
import type {
  TetraChannelClientOptions,
  TetraTransport,
} from './tetra-channel.interfaces';

export type CreateTetraChannelClientOptions =
  Partial<TetraChannelClientOptions> & {
    baseUrl?: string;
    transport?: TetraTransport;
    fetchImpl?: typeof fetch;
  };

/**
 * Nest 컨테이너 없이 클라이언트를 만든다.
 * transport를 넘기지 않으면 fetch 기반 전송 계층을 쓴다.
 */
export const createTetraChannelClient = (
  options: CreateTetraChannelClientOptions = {},
): TetraChannelClient => {
  const transport =
    options.transport ??
    new FetchTransport({
      baseUrl: options.baseUrl ?? DEFAULT_TETRA_CHANNEL_BASE_URL,
      fetchImpl: options.fetchImpl,
    });

  return new TetraChannelClient(
    {
      userAgent: options.userAgent ?? DEFAULT_TETRA_CHANNEL_USER_AGENT,
      sessionId: options.sessionId ?? null,
      rankPolicy: options.rankPolicy ?? DEFAULT_RANK_STANDING_POLICY,
    },
    transport,
  );
};
