import axios from 'axios';

export interface HttpResponse {
  status: number;
  statusText: string;
  data: string;
}

export interface RequestOptions {
  timeoutMs?: number;
}

/**
 * Minimal GET-only client. Non-2xx responses resolve; only transport
 * failures (DNS, timeouts, resets) reject.
 */
export interface HttpClient {
  get(url: string, options?: RequestOptions): Promise<HttpResponse>;
}

/**
 * Standard headers for HTTP requests.
 * A full desktop-browser header set gets past the challenge layer in front of
 * both the listings and the ratings site.
 */
export function getHeaders(): Record<string, string> {
  return {
    'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Accept-Encoding': 'gzip, deflate, br',
    'Connection': 'keep-alive',
    'Upgrade-Insecure-Requests': '1',
    'Sec-Fetch-Dest': 'document',
    'Sec-Fetch-Mode': 'navigate',
    'Sec-Fetch-Site': 'none',
    'Sec-Fetch-User': '?1',
    'Cache-Control': 'max-age=0'
  };
}

/**
 * Create an axios-backed client. The returned value holds no per-request
 * state and can be shared between concurrent searches.
 */
export function createHttpClient(defaultTimeoutMs = 15000): HttpClient {
  const instance = axios.create({
    headers: getHeaders(),
    responseType: 'text',
    // Keep the body as the raw string; callers parse HTML themselves
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true
  });

  return {
    async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
      const response = await instance.get<unknown>(url, {
        timeout: options.timeoutMs ?? defaultTimeoutMs
      });
      return {
        status: response.status,
        statusText: response.statusText,
        data: typeof response.data === 'string' ? response.data : ''
      };
    }
  };
}
