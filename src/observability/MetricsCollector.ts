// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

export type MetricLabels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private initializeMetrics(): void {
    // Dispatch metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'search_http_requests_total',
        help: 'HTTP attempts by outcome',
        labelNames: ['host_class', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'search_http_request_duration_seconds',
        help: 'HTTP attempt duration',
        labelNames: ['host_class', 'status'],
        buckets: [0.05, 0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'dispatch_retries_total',
      new Counter({
        name: 'search_dispatch_retries_total',
        help: 'Failovers to another host after a transport failure',
        labelNames: ['host_class', 'attempt'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'hosts_exhausted_total',
      new Counter({
        name: 'search_hosts_exhausted_total',
        help: 'Logical calls that failed on every host',
        labelNames: ['host_class'],
        registers: [this.registry],
      })
    );

    // Task metrics
    this.counters.set(
      'task_polls_total',
      new Counter({
        name: 'search_task_polls_total',
        help: 'Task status polls by reported status',
        labelNames: ['status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'task_wait_duration',
      new Histogram({
        name: 'search_task_wait_duration_seconds',
        help: 'Time spent waiting for a task to be published',
        labelNames: ['outcome'],
        buckets: [0.5, 1, 2, 5, 10, 30, 60],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: MetricLabels): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: MetricLabels): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    const server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          this.logger?.error('Failed to render metrics', {
            error: error instanceof Error ? error.message : String(error),
          });
          res.statusCode = 500;
          res.end();
        });
    });

    server.on('error', (error: Error) => {
      this.logger?.error('MetricsCollector server error', { error: error.message, port });
    });

    server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });

    this.server = server;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  }
}
