// src/sdk.ts

import type { DispatchRequest, RequestOptions } from './core/http/types';
import type { HttpTransport } from './core/http/HttpTransport';
import type { CredentialsProvider } from './config/CredentialsProvider';
import type { JsonObject, Result } from './utils/result';
import type { TaskID } from './core/task/types';
import type { MultiQuery, MultiQueryStrategy, SearchParams } from './core/requests/RequestBuilder';
import type { InitConfig } from './config/ConfigValidator';
import { AxiosTransport } from './core/http/HttpTransport';
import { Dispatcher } from './core/http/Dispatcher';
import { TaskPoller } from './core/task/TaskPoller';
import { EnvCredentialsProvider } from './config/CredentialsProvider';
import { validateConfig } from './config/ConfigValidator';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { assignObjectIds, buildBatch, injectIndex, readId, OBJECT_ID } from './core/batch/BatchBuilder';
import { InvalidObjectIdError, ValidationError } from './utils/errors';
import { failure } from './utils/result';
import * as requests from './core/requests/RequestBuilder';

export interface ClientDeps {
  transport?: HttpTransport;
  credentials?: CredentialsProvider;
  sleep?: (ms: number) => Promise<void>;
}

export interface CoreDeps {
  logger: Logger;
  metrics: MetricsCollector;
  transport: HttpTransport;
  dispatcher: Dispatcher;
  poller: TaskPoller;
}

export interface IdAttributeOptions {
  idAttribute?: string;
}

export interface SaveObjectOptions extends IdAttributeOptions {
  objectID?: string;
}

export interface PartialUpdateOptions {
  upsert?: boolean;
}

export interface PartialUpdateObjectsOptions extends PartialUpdateOptions, IdAttributeOptions {}

export class SearchClient {
  private core: CoreDeps;

  private constructor(config: InitConfig, deps: ClientDeps) {
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const transport = deps.transport ?? new AxiosTransport();
    const credentials = deps.credentials ?? new EnvCredentialsProvider(config.credentials);
    const dispatcher = new Dispatcher(transport, credentials, logger, metrics, {
      provider: config.hosts?.provider,
      timeouts: config.transport,
    });
    const poller = new TaskPoller(dispatcher, logger, metrics, {
      pollIntervalMs: config.task?.pollIntervalMs,
      sleep: deps.sleep,
    });

    this.core = { logger, metrics, transport, dispatcher, poller };
  }

  /**
   * Create a client
   *
   * Credentials are not checked here; they are read on every attempt, so a
   * missing application id or API key surfaces as a ConfigurationError on the
   * first call, before any network activity.
   *
   * @throws {InvalidConfigError} If the configuration does not validate
   *
   * @example
   * ```typescript
   * const client = SearchClient.create({
   *   credentials: { applicationId: 'APP_ID', apiKey: 'ADMIN_KEY' },
   *   logging: { level: 'info' },
   * });
   *
   * const saved = await client.wait(await client.addObjects('products', items));
   * if (!saved.ok) console.error(saved.error.code);
   * ```
   */
  static create(config: InitConfig = {}, deps: ClientDeps = {}): SearchClient {
    const validatedConfig = validateConfig(config);
    const client = new SearchClient(validatedConfig, deps);
    client.core.logger.debug('Search client created', {
      provider: validatedConfig.hosts?.provider,
    });
    return client;
  }

  // Search

  /**
   * Run several queries in one round trip
   *
   * @throws {ValidationError} If a query has no indexName
   */
  async multipleQueries(
    queries: readonly MultiQuery[],
    options: { strategy?: MultiQueryStrategy } = {}
  ): Promise<Result<JsonObject>> {
    return this.send(requests.multipleQueriesRequest(queries, options.strategy));
  }

  async search(
    indexName: string,
    query: string,
    params?: SearchParams,
    options?: RequestOptions
  ): Promise<Result<JsonObject>> {
    return this.send(requests.searchRequest(indexName, query, params, options));
  }

  /**
   * Search through the values of a facet attribute declared searchable in
   * `attributesForFaceting`. Hits are sorted by decreasing count.
   */
  async searchForFacetValues(
    indexName: string,
    facet: string,
    text: string,
    query?: JsonObject
  ): Promise<Result<JsonObject>> {
    return this.send(requests.searchForFacetValuesRequest(indexName, facet, text, query));
  }

  // Objects

  async getObject(indexName: string, objectID: string): Promise<Result<JsonObject>> {
    return this.send(requests.getObjectRequest(indexName, objectID), indexName);
  }

  /**
   * Add an object, letting the service assign its objectID unless
   * `idAttribute` names the attribute to use instead.
   */
  async addObject(
    indexName: string,
    object: JsonObject,
    options: IdAttributeOptions = {}
  ): Promise<Result<JsonObject>> {
    if (options.idAttribute !== undefined) {
      return this.saveObject(indexName, object, { idAttribute: options.idAttribute });
    }
    return this.send(requests.addObjectRequest(indexName, object), indexName);
  }

  async addObjects(
    indexName: string,
    objects: readonly JsonObject[],
    options: IdAttributeOptions = {}
  ): Promise<Result<JsonObject>> {
    if (options.idAttribute !== undefined) {
      return this.saveObjects(indexName, objects, { idAttribute: options.idAttribute });
    }
    return this.sendBatch(indexName, buildBatch(objects, 'addObject'));
  }

  /**
   * Replace an object. The objectID comes from `options.objectID`, else from
   * `options.idAttribute`, else from the object's own `objectID`.
   *
   * @throws {ValidationError} If no identifier can be found
   */
  async saveObject(
    indexName: string,
    object: JsonObject,
    options: SaveObjectOptions = {}
  ): Promise<Result<JsonObject>> {
    const idAttribute = options.idAttribute ?? OBJECT_ID;
    const objectID = options.objectID ?? readId(object, idAttribute);

    if (objectID === undefined) {
      throw new ValidationError(`Object does not have an attribute ${idAttribute}`, {
        idAttribute,
      });
    }

    return this.send(requests.saveObjectRequest(indexName, object, objectID), indexName);
  }

  async saveObjects(
    indexName: string,
    objects: readonly JsonObject[],
    options: IdAttributeOptions = {}
  ): Promise<Result<JsonObject>> {
    const withIds = assignObjectIds(objects, options.idAttribute);
    return this.sendBatch(indexName, buildBatch(withIds, 'updateObject'));
  }

  /**
   * Update some attributes of an object. With `upsert: false` a missing
   * object is not created.
   */
  async partialUpdateObject(
    indexName: string,
    object: JsonObject,
    objectID: string,
    options: PartialUpdateOptions = {}
  ): Promise<Result<JsonObject>> {
    const upsert = options.upsert ?? true;
    return this.send(
      requests.partialUpdateObjectRequest(indexName, object, objectID, upsert),
      indexName
    );
  }

  async partialUpdateObjects(
    indexName: string,
    objects: readonly JsonObject[],
    options: PartialUpdateObjectsOptions = {}
  ): Promise<Result<JsonObject>> {
    const action = options.upsert === false ? 'partialUpdateObjectNoCreate' : 'partialUpdateObject';
    const withIds = assignObjectIds(objects, options.idAttribute);
    return this.sendBatch(indexName, buildBatch(withIds, action));
  }

  async deleteObject(indexName: string, objectID: string): Promise<Result<JsonObject>> {
    if (objectID === '') {
      return failure(new InvalidObjectIdError());
    }
    return this.send(requests.deleteObjectRequest(indexName, objectID), indexName);
  }

  async deleteObjects(
    indexName: string,
    objectIDs: readonly string[]
  ): Promise<Result<JsonObject>> {
    const objects = objectIDs.map((objectID): JsonObject => ({ objectID }));
    return this.sendBatch(indexName, buildBatch(objects, 'deleteObject'));
  }

  // Indexes

  async listIndexes(): Promise<Result<JsonObject>> {
    return this.send(requests.listIndexesRequest());
  }

  async deleteIndex(indexName: string): Promise<Result<JsonObject>> {
    return this.send(requests.deleteIndexRequest(indexName), indexName);
  }

  async clearIndex(indexName: string): Promise<Result<JsonObject>> {
    return this.send(requests.clearIndexRequest(indexName), indexName);
  }

  async setSettings(indexName: string, settings: JsonObject): Promise<Result<JsonObject>> {
    return this.send(requests.setSettingsRequest(indexName, settings), indexName);
  }

  async getSettings(indexName: string): Promise<Result<JsonObject>> {
    return this.send(requests.getSettingsRequest(indexName), indexName);
  }

  /**
   * Rename an index. The result carries the source index name, which owns
   * the task.
   */
  async moveIndex(sourceIndex: string, destinationIndex: string): Promise<Result<JsonObject>> {
    return this.send(
      requests.indexOperationRequest('move', sourceIndex, destinationIndex),
      sourceIndex
    );
  }

  async copyIndex(sourceIndex: string, destinationIndex: string): Promise<Result<JsonObject>> {
    return this.send(
      requests.indexOperationRequest('copy', sourceIndex, destinationIndex),
      sourceIndex
    );
  }

  // Tasks

  /**
   * Block until the task is published. Polls forever while the service
   * answers `notPublished`.
   */
  async waitTask(indexName: string, taskID: TaskID, pollIntervalMs?: number): Promise<Result<void>> {
    return this.core.poller.waitTask(indexName, taskID, pollIntervalMs);
  }

  /**
   * Wait on the task of a write result, then return that result
   *
   * @example
   * ```typescript
   * const result = await client.wait(await client.clearIndex('products'));
   * ```
   */
  async wait(result: Result<JsonObject>, pollIntervalMs?: number): Promise<Result<JsonObject>> {
    return this.core.poller.wait(result, pollIntervalMs);
  }

  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  async close(): Promise<void> {
    this.core.transport.close?.();
    await this.core.metrics.close();
  }

  private async sendBatch(
    indexName: string,
    batch: ReturnType<typeof buildBatch>
  ): Promise<Result<JsonObject>> {
    return this.send(requests.batchRequest(indexName, batch), indexName);
  }

  private async send(request: DispatchRequest, indexName?: string): Promise<Result<JsonObject>> {
    const result = await this.core.dispatcher.dispatch(request.hostClass, request.spec);
    return indexName === undefined ? result : injectIndex(result, indexName);
  }
}
