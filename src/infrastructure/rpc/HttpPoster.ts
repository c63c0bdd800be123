export type PostResult = {
  status: number;
  body: string;
};

/**
 * Byte-level HTTP seam. Swap it to add TLS settings, proxies or compression,
 * or to run the client against an in-process server.
 */
export interface HttpPoster {
  post(url: string, body: string, headers: Record<string, string>): Promise<PostResult>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type FetchPosterOptions = {
  timeoutMs?: number;
  fetch?: FetchLike;
};

export class FetchPoster implements HttpPoster {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  public constructor(options: FetchPosterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  public async post(url: string, body: string, headers: Record<string, string>): Promise<PostResult> {
    const resp = await this.fetchImpl(url, {
      method: 'POST',
      headers,
      body,
      signal: AbortSignal.timeout(this.timeoutMs)
    });

    return {
      status: resp.status,
      body: await resp.text()
    };
  }
}
