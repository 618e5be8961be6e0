// src/core/http/HttpTransport.ts

import axios, { AxiosInstance } from 'axios';
import * as https from 'https';
import type { HeaderList, TransportRequest, TransportResponse } from './types';
import { NetworkError, NetworkTimeoutError } from '../../utils/errors';

/**
 * Performs exactly one HTTP exchange. Resolves with any status the server
 * answered with and rejects with a NetworkError when no answer arrived.
 */
export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
  close?(): void;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ESOCKETTIMEDOUT']);

/**
 * Fold ordered header lines into the record axios takes. Names are matched
 * case-insensitively and keep their first spelling; a repeated name becomes
 * an array, which Node sends as one line per value.
 */
export function foldHeaderLines(lines: HeaderList): Record<string, string | string[]> {
  const folded: Record<string, string | string[]> = {};
  const spelling = new Map<string, string>();

  for (const [name, value] of lines) {
    const key = spelling.get(name.toLowerCase());
    if (key === undefined) {
      spelling.set(name.toLowerCase(), name);
      folded[name] = value;
      continue;
    }
    const existing = folded[key];
    folded[key] = Array.isArray(existing) ? [...existing, value] : [existing, value];
  }

  return folded;
}

function hasHeader(lines: HeaderList, name: string): boolean {
  return lines.some(([line]) => line.toLowerCase() === name.toLowerCase());
}

export class AxiosTransport implements HttpTransport {
  private axiosInstance: AxiosInstance;
  // One keep-alive agent per connect timeout; at most one per attempt number
  private agents: Map<number, https.Agent> = new Map();

  constructor() {
    this.axiosInstance = axios.create({
      responseType: 'text',
      validateStatus: () => true,
      maxRedirects: 0,
    });
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const lines: HeaderList =
      request.body === undefined || hasHeader(request.headers, 'Content-Type')
        ? request.headers
        : [['Content-Type', 'application/json'], ...request.headers];
    const headers = foldHeaderLines(lines);

    try {
      const response = await this.axiosInstance.request<string>({
        url: request.url,
        method: request.method,
        headers,
        data: request.body,
        timeout: request.receiveTimeoutMs,
        httpsAgent: this.agentFor(request.connectTimeoutMs),
      });

      return {
        status: response.status,
        body: typeof response.data === 'string' ? response.data : String(response.data ?? ''),
      };
    } catch (error: unknown) {
      throw this.transformError(error, request.url);
    }
  }

  close(): void {
    for (const agent of this.agents.values()) {
      agent.destroy();
    }
    this.agents.clear();
  }

  /**
   * The agent's socket timeout bounds the connect phase; once connected the
   * request timeout set by axios takes over.
   */
  private agentFor(connectTimeoutMs: number): https.Agent {
    let agent = this.agents.get(connectTimeoutMs);
    if (!agent) {
      agent = new https.Agent({
        keepAlive: true,
        timeout: connectTimeoutMs,
        minVersion: 'TLSv1.2',
        maxVersion: 'TLSv1.2',
      });
      this.agents.set(connectTimeoutMs, agent);
    }
    return agent;
  }

  private transformError(error: unknown, url: string): Error {
    if (axios.isAxiosError(error)) {
      const code = error.code ?? 'UNKNOWN';
      if (TIMEOUT_CODES.has(code)) {
        return new NetworkTimeoutError('Request timeout', { url, code });
      }
      return new NetworkError(error.message || 'Network error', { url, code });
    }
    if (error instanceof Error) {
      return new NetworkError(error.message, { url, cause: error.name });
    }
    return new NetworkError('Network error', { url });
  }
}
