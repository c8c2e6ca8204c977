/**
 * Shared types for HTTP-backed clients and sources.
 */

export interface HttpResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

/**
 * Minimal GET transport. The default is node-fetch; tests pass a fake.
 */
export type HttpGet = (url: string, headers?: Record<string, string>) => Promise<HttpResponse>;
