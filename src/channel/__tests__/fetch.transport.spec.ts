import { describe, expect, it, vi } from 'vitest';
import { FetchTransport } from '../fetch.transport';

describe('FetchTransport', () => {
  it('base URL에 슬래시를 붙이고 쿼리를 인코딩한다', () => {
    const transport = new FetchTransport({
      baseUrl: 'http://tetra-channel.test/api',
    });

    expect(
      transport
        .buildUrl({
          path: 'users/by/league',
          query: { after: '25000:0:0', country: 'KR' },
        })
        .toString(),
    ).toBe(
      'http://tetra-channel.test/api/users/by/league?after=25000%3A0%3A0&country=KR',
    );
  });

  it('fetch 응답을 상태 코드와 바이트로 돌려준다', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      new Response('{"success":true}', { status: 429 }),
    );
    const transport = new FetchTransport({
      baseUrl: 'http://tetra-channel.test/api/',
      fetchImpl,
    });

    const response = await transport.send({
      method: 'GET',
      path: 'general/stats',
      query: {},
      headers: { Accept: 'application/json' },
    });

    expect(response.status).toBe(429);
    expect(new TextDecoder().decode(response.body)).toBe('{"success":true}');
    expect(fetchImpl).toHaveBeenCalledWith(
      new URL('http://tetra-channel.test/api/general/stats'),
      { method: 'GET', headers: { Accept: 'application/json' } },
    );
  });
});
