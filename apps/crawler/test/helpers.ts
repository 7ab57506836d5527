import * as fs from 'fs';
import * as path from 'path';
import type { HttpClient, HttpResponse, RequestOptions } from '../src/http';

export type FakeReply = HttpResponse | Error;

/**
 * In-process HttpClient. Each request is answered by the handler;
 * an Error reply rejects like a transport failure.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: Array<{ url: string; timeoutMs?: number }> = [];

  constructor(private readonly handler: (url: string, index: number) => FakeReply) {}

  static sequence(replies: FakeReply[]): FakeHttpClient {
    return new FakeHttpClient((_, index) => replies[index] ?? new Error(`Unexpected request #${index + 1}`));
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const reply = this.handler(url, this.requests.length);
    this.requests.push({ url, timeoutMs: options.timeoutMs });
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export function ok(data: string): HttpResponse {
  return { status: 200, statusText: 'OK', data };
}

export function readFixture(name: string): string {
  return fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf8');
}
