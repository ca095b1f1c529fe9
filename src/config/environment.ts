import typia, { tags } from 'typia';

export interface Environment {
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
  logPretty: boolean;
  tetraChannelBaseUrl: string & tags.MinLength<1>;
  tetraChannelSessionId: string;
  tetraChannelUserAgent: string & tags.MinLength<1>;
  tetraChannelRankPrecedence: 'tier' | 'placement';
}

const parseBoolean = (value: string | undefined, defaultValue: boolean) => {
  if (typeof value === 'undefined') {
    return defaultValue;
  }

  return ['true', '1', 'yes', 'on'].includes(value.toLowerCase());
};

const parseTrimmed = (value: string | undefined, defaultValue: string) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : defaultValue;
};

export const loadEnvironment = (): Environment => {
  const nodeEnv = (process.env.NODE_ENV ?? 'development').toLowerCase();

  const raw = {
    nodeEnv,
    logLevel: (process.env.LOG_LEVEL ?? 'info').toLowerCase(),
    logPretty: parseBoolean(process.env.LOG_PRETTY, nodeEnv !== 'production'),
    tetraChannelBaseUrl: parseTrimmed(
      process.env.TETRA_CHANNEL_BASE_URL,
      'https://ch.tetr.io/api/',
    ),
    tetraChannelSessionId: process.env.TETRA_CHANNEL_SESSION_ID?.trim() ?? '',
    tetraChannelUserAgent: parseTrimmed(
      process.env.TETRA_CHANNEL_USER_AGENT,
      'tetra-channel-client',
    ),
    tetraChannelRankPrecedence: (
      process.env.TETRA_CHANNEL_RANK_PRECEDENCE ?? 'tier'
    ).toLowerCase(),
  };

  return assertEnvironment(raw);
};

// Compiled by the typia transform (tspc for builds, the Vite plugin for tests).
const assertEnvironment = (value: unknown): Environment =>
  typia.assert<Environment>(value);
