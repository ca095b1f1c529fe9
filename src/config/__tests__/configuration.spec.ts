import { TypeGuardError } from 'typia';
import { afterEach, describe, expect, it, vi } from 'vitest';

import configuration from '../configuration';
import { loadEnvironment } from '../environment';

// stubEnv로 원래 값을 기록해 두고 지워야 unstubAllEnvs가 복원한다.
const clearEnv = (...names: string[]) => {
  names.forEach((name) => {
    vi.stubEnv(name, '');
    delete process.env[name];
  });
};

describe('configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.stubEnv('NODE_ENV', 'test');
    vi.stubEnv('LOG_LEVEL', 'silent');
    vi.stubEnv('LOG_PRETTY', 'false');
    vi.stubEnv('TETRA_CHANNEL_BASE_URL', 'http://tetra-channel.test/api/');
  });

  it('환경 변수가 없으면 기본값을 사용한다', () => {
    vi.stubEnv('NODE_ENV', 'production');
    clearEnv(
      'LOG_LEVEL',
      'LOG_PRETTY',
      'TETRA_CHANNEL_BASE_URL',
      'TETRA_CHANNEL_SESSION_ID',
      'TETRA_CHANNEL_USER_AGENT',
      'TETRA_CHANNEL_RANK_PRECEDENCE',
    );

    expect(configuration()).toEqual({
      app: { env: 'production' },
      logger: { level: 'info', pretty: false },
      tetraChannel: {
        baseUrl: 'https://ch.tetr.io/api/',
        sessionId: null,
        userAgent: 'tetra-channel-client',
        rankPrecedence: 'tier',
      },
    });
  });

  it('세션 ID와 User-Agent 앞뒤 공백을 제거한다', () => {
    vi.stubEnv('TETRA_CHANNEL_SESSION_ID', '  session-test  ');
    vi.stubEnv('TETRA_CHANNEL_USER_AGENT', ' my-bot/1.0 ');
    vi.stubEnv('TETRA_CHANNEL_RANK_PRECEDENCE', 'PLACEMENT');

    const config = configuration();

    expect(config.tetraChannel.sessionId).toBe('session-test');
    expect(config.tetraChannel.userAgent).toBe('my-bot/1.0');
    expect(config.tetraChannel.rankPrecedence).toBe('placement');
  });

  it('공백뿐인 세션 ID는 null로 취급한다', () => {
    vi.stubEnv('TETRA_CHANNEL_SESSION_ID', '   ');

    expect(configuration().tetraChannel.sessionId).toBeNull();
  });

  it('허용되지 않은 랭크 우선순위는 필드 경로와 함께 거부한다', () => {
    vi.stubEnv('TETRA_CHANNEL_RANK_PRECEDENCE', 'sometimes');

    expect(() => loadEnvironment()).toThrow(TypeGuardError);
    expect(() => loadEnvironment()).toThrow(/tetraChannelRankPrecedence/);
  });

  it('알 수 없는 LOG_LEVEL은 거부한다', () => {
    vi.stubEnv('LOG_LEVEL', 'verbose');

    expect(() => configuration()).toThrow(/logLevel/);
  });

  it('LOG_PRETTY 문자열을 불리언으로 해석한다', () => {
    vi.stubEnv('LOG_PRETTY', 'YES');
    expect(loadEnvironment().logPretty).toBe(true);

    vi.stubEnv('LOG_PRETTY', 'off');
    expect(loadEnvironment().logPretty).toBe(false);
  });
});
