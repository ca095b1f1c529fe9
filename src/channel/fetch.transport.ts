import type {
  FetchTransportOptions,
  TetraTransport,
  TransportRequest,
  TransportResponse,
} from './tetra-channel.interfaces';

export class FetchTransport implements TetraTransport {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions) {
    this.baseUrl = options.baseUrl.endsWith('/')
      ? options.baseUrl
      : `${options.baseUrl}/`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  buildUrl(request: Pick<TransportRequest, 'path' | 'query'>): URL {
    const url = new URL(request.path, this.baseUrl);
    Object.entries(request.query).forEach(([key, value]) => {
      url.searchParams.set(key, value);
    });
    return url;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.fetchImpl(this.buildUrl(request), {
      method: request.method,
      headers: request.headers,
    });
    const body = new Uint8Array(await response.arrayBuffer());

    return { status: response.status, body };
  }
}
