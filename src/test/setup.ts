import { afterAll, beforeAll, vi } from 'vitest';

beforeAll(() => {
  vi.stubEnv('NODE_ENV', 'test');
  vi.stubEnv('LOG_LEVEL', 'silent');
  vi.stubEnv('LOG_PRETTY', 'false');
  vi.stubEnv('TETRA_CHANNEL_BASE_URL', 'http://tetra-channel.test/api/');
});

afterAll(() => {
  vi.unstubAllEnvs();
});
