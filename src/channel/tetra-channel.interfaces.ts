import type { RankStandingPolicy } from '../league/league.types';

export type QueryValues = Readonly<Record<string, string>>;

export interface TransportRequest {
  method: 'GET';
  /** base URL 기준 상대 경로 (`users/osk`) */
  path: string;
  query: QueryValues;
  headers: Readonly<Record<string, string>>;
}

export interface TransportResponse {
  status: number;
  body: Uint8Array;
}

/**
 * HTTP 전송 계층. 연결 풀, TLS, 리다이렉트, 타임아웃은 구현체 책임이다.
 * 응답을 받지 못한 경우에만 reject 한다.
 */
export interface TetraTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface TetraChannelClientOptions {
  userAgent: string;
  /** 설정하면 모든 요청에 X-Session-ID 헤더로 붙는다. */
  sessionId?: string | null;
  rankPolicy?: RankStandingPolicy;
}

export interface FetchTransportOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
}
