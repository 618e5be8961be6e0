// src/core/http/Dispatcher.ts

import type {
  HostClass,
  RequestSpec,
  TimeoutConfig,
  TransportRequest,
  TransportResponse,
} from './types';
import type { HttpTransport } from './HttpTransport';
import type { CredentialsProvider } from '../../config/CredentialsProvider';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { MAX_ATTEMPTS, DEFAULT_PROVIDER, resolveHost, buildUrl } from './HostResolver';
import {
  HostsExhaustedError,
  HttpError,
  NetworkError,
  ResponseDecodeError,
} from '../../utils/errors';
import { failure, isJsonObject, success } from '../../utils/result';
import type { JsonObject, Result } from '../../utils/result';
import { generateCorrelationId, withDispatchSpan } from '../../observability/tracing';

export const DEFAULT_TIMEOUTS: TimeoutConfig = {
  connectTimeoutMs: 3000,
  receiveTimeoutMs: 30000,
};

export interface DispatcherOptions {
  provider?: string;
  timeouts?: Partial<TimeoutConfig>;
}

/**
 * Timeouts grow linearly with the attempt number.
 */
export function timeoutsFor(attempt: number, base: TimeoutConfig = DEFAULT_TIMEOUTS): TimeoutConfig {
  return {
    connectTimeoutMs: base.connectTimeoutMs * (attempt + 1),
    receiveTimeoutMs: base.receiveTimeoutMs * (attempt + 1),
  };
}

export class Dispatcher {
  private provider: string;
  private timeouts: TimeoutConfig;

  constructor(
    private transport: HttpTransport,
    private credentials: CredentialsProvider,
    private logger: Logger,
    private metrics: MetricsCollector,
    options: DispatcherOptions = {}
  ) {
    this.provider = options.provider ?? DEFAULT_PROVIDER;
    this.timeouts = {
      connectTimeoutMs: options.timeouts?.connectTimeoutMs ?? DEFAULT_TIMEOUTS.connectTimeoutMs,
      receiveTimeoutMs: options.timeouts?.receiveTimeoutMs ?? DEFAULT_TIMEOUTS.receiveTimeoutMs,
    };
  }

  /**
   * Send one logical request. Transport failures fail over to the next host;
   * any HTTP answer, successful or not, ends the call.
   */
  async dispatch(hostClass: HostClass, spec: RequestSpec): Promise<Result<JsonObject>> {
    return withDispatchSpan(spec.method, hostClass, spec.path, async (span) => {
      const requestId = generateCorrelationId();

      for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
        const { applicationId, apiKey } = this.credentials.current();
        const host = resolveHost(applicationId, hostClass, attempt, this.provider);
        const request: TransportRequest = {
          url: buildUrl(host, spec.path),
          method: spec.method,
          // Caller lines come first and are never replaced
          headers: [
            ...spec.headers,
            ['X-Algolia-API-Key', apiKey],
            ['X-Algolia-Application-Id', applicationId],
          ],
          body: spec.body,
          ...timeoutsFor(attempt, this.timeouts),
        };

        this.logger.debug('HTTP request', {
          requestId,
          attempt,
          hostClass,
          method: spec.method,
          url: request.url,
          headerKeys: spec.headers.map(([name]) => name),
        });

        const startTime = Date.now();
        const outcome = await this.sendOnce(request);

        if (outcome instanceof NetworkError) {
          this.metrics.incrementCounter('http_requests_total', {
            host_class: hostClass,
            method: spec.method,
            status: 'transport_error',
          });

          if (attempt + 1 < MAX_ATTEMPTS) {
            this.metrics.incrementCounter('dispatch_retries_total', {
              host_class: hostClass,
              attempt: attempt + 1,
            });
            this.logger.warn('Transport failure, failing over', {
              requestId,
              attempt: attempt + 1,
              host,
              code: outcome.code,
              error: outcome.message,
            });
          }
          continue;
        }

        this.metrics.incrementCounter('http_requests_total', {
          host_class: hostClass,
          method: spec.method,
          status: outcome.status,
        });
        this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          host_class: hostClass,
          status: outcome.status,
        });
        span?.setAttribute('search.attempts', attempt + 1);

        return this.classify(outcome, { requestId, host, path: spec.path });
      }

      this.metrics.incrementCounter('hosts_exhausted_total', { host_class: hostClass });
      this.logger.error('Unable to reach any host', {
        requestId,
        hostClass,
        path: spec.path,
        attempts: MAX_ATTEMPTS,
      });
      return failure(new HostsExhaustedError(undefined, { hostClass, path: spec.path }));
    });
  }

  private async sendOnce(request: TransportRequest): Promise<TransportResponse | NetworkError> {
    try {
      return await this.transport.send(request);
    } catch (error: unknown) {
      if (error instanceof NetworkError) {
        return error;
      }
      throw error;
    }
  }

  private classify(
    response: TransportResponse,
    context: { requestId: string; host: string; path: string }
  ): Result<JsonObject> {
    const { status, body } = response;

    if (status < 200 || status > 299) {
      this.logger.debug('HTTP error response', { ...context, status, body });
      return failure(new HttpError(status, body, { host: context.host, path: context.path }));
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(body);
    } catch (error: unknown) {
      this.logger.error('Malformed JSON in successful response', {
        ...context,
        status,
        error: error instanceof Error ? error.message : String(error),
      });
      return failure(new ResponseDecodeError(body, { status, path: context.path }));
    }

    if (!isJsonObject(decoded)) {
      this.logger.error('Successful response is not a JSON object', { ...context, status });
      return failure(new ResponseDecodeError(body, { status, path: context.path }));
    }

    return success(decoded);
  }
}
