// src/core/http/types.ts

export type HostClass = 'read' | 'write';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Ordered header lines. A name may repeat; every entry is sent.
 */
export type HeaderList = ReadonlyArray<readonly [string, string]>;

export interface RequestOptions {
  headers?: HeaderList | Readonly<Record<string, string>>;
}

/**
 * One logical call against `/1/indexes`. Builders produce it; the
 * dispatcher treats `path` and `body` as opaque.
 */
export interface RequestSpec {
  readonly method: HttpMethod;
  readonly path: string;
  readonly body?: string;
  readonly headers: HeaderList;
}

export interface DispatchRequest {
  readonly hostClass: HostClass;
  readonly spec: RequestSpec;
}

export interface TransportRequest {
  url: string;
  method: HttpMethod;
  headers: HeaderList;
  body?: string;
  connectTimeoutMs: number;
  receiveTimeoutMs: number;
}

export interface TransportResponse {
  status: number;
  body: string;
}

export interface TimeoutConfig {
  connectTimeoutMs: number; // base, scaled by attempt + 1
  receiveTimeoutMs: number;
}
