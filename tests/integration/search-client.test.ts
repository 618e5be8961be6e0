/**
 * Search Client Integration Tests
 *
 * Drives the public client through the axios transport against nock
 * interceptors standing in for the service hosts.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import nock from 'nock';
import { SearchClient } from '../../src/sdk';
import type { InitConfig } from '../../src/config/ConfigValidator';
import { EnvCredentialsProvider } from '../../src/config/CredentialsProvider';
import {
  HostsExhaustedError,
  HttpError,
  InvalidConfigError,
  InvalidObjectIdError,
  MissingApplicationIdError,
  ValidationError,
} from '../../src/utils/errors';

const WRITE_HOST = 'https://testapp.algolia.net';
const READ_HOST = 'https://testapp-dsn.algolia.net';
const clusterHost = (n: number): string => `https://testapp-${n}.algolianet.com`;

describe('SearchClient Integration', () => {
  let client: SearchClient;
  const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);

  const config: InitConfig = {
    credentials: { applicationId: 'testapp', apiKey: 'test-secret' },
    logging: { level: 'error' },
    metrics: { enabled: true },
  };

  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  beforeEach(() => {
    sleep.mockClear();
    client = SearchClient.create(config, { sleep });
  });

  afterEach(async () => {
    await client.close();
    nock.cleanAll();
  });

  describe('Writes and tasks', () => {
    it('should send a batch to the master host and wait for its task', async () => {
      const scope = nock(WRITE_HOST)
        .post('/1/indexes/products/batch', {
          requests: [
            { action: 'addObject', body: { name: 'Trail shoe' } },
            { action: 'addObject', objectID: 'sku-2', body: { objectID: 'sku-2', name: 'Sock' } },
          ],
        })
        .matchHeader('x-algolia-api-key', 'test-secret')
        .matchHeader('x-algolia-application-id', 'testapp')
        .reply(200, { taskID: 42, objectIDs: ['sku-1', 'sku-2'] })
        .get('/1/indexes/products/task/42')
        .reply(200, { status: 'notPublished' })
        .get('/1/indexes/products/task/42')
        .reply(200, { status: 'published' });

      const written = await client.addObjects('products', [
        { name: 'Trail shoe' },
        { objectID: 'sku-2', name: 'Sock' },
      ]);
      const result = await client.wait(written, 10);

      expect(result).toEqual({
        ok: true,
        data: { taskID: 42, objectIDs: ['sku-1', 'sku-2'], indexName: 'products' },
      });
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(10);
      expect(scope.isDone()).toBe(true);
    });

    it('should save an object under the identifier read from idAttribute', async () => {
      const scope = nock(WRITE_HOST)
        .put('/1/indexes/products/A-1', { sku: 'A-1', name: 'Trail shoe' })
        .reply(200, { objectID: 'A-1', taskID: 5 });

      const result = await client.saveObject(
        'products',
        { sku: 'A-1', name: 'Trail shoe' },
        { idAttribute: 'sku' }
      );

      expect(result).toEqual({
        ok: true,
        data: { objectID: 'A-1', taskID: 5, indexName: 'products' },
      });
      expect(scope.isDone()).toBe(true);
    });

    it('should reject an object without an identifier before sending anything', async () => {
      await expect(client.saveObject('products', { name: 'Trail shoe' })).rejects.toThrow(
        ValidationError
      );
      await expect(client.saveObject('products', { name: 'Trail shoe' })).rejects.toThrow(
        'Object does not have an attribute objectID'
      );
    });

    it('should batch partial updates that never create objects', async () => {
      const scope = nock(WRITE_HOST)
        .post('/1/indexes/products/batch', {
          requests: [
            {
              action: 'partialUpdateObjectNoCreate',
              objectID: 'A-1',
              body: { sku: 'A-1', price: 80, objectID: 'A-1' },
            },
          ],
        })
        .reply(200, { taskID: 6 });

      const result = await client.partialUpdateObjects('products', [{ sku: 'A-1', price: 80 }], {
        upsert: false,
        idAttribute: 'sku',
      });

      expect(result.ok).toBe(true);
      expect(scope.isDone()).toBe(true);
    });

    it('should batch deletions by identifier', async () => {
      const scope = nock(WRITE_HOST)
        .post('/1/indexes/products/batch', {
          requests: [
            { action: 'deleteObject', objectID: 'A-1', body: { objectID: 'A-1' } },
            { action: 'deleteObject', objectID: 'A-2', body: { objectID: 'A-2' } },
          ],
        })
        .reply(200, { taskID: 7 });

      const result = await client.deleteObjects('products', ['A-1', 'A-2']);

      expect(result).toEqual({ ok: true, data: { taskID: 7, indexName: 'products' } });
      expect(scope.isDone()).toBe(true);
    });

    it('should refuse to delete an empty identifier without a request', async () => {
      const noMatch = vi.fn();
      nock.emitter.on('no match', noMatch);

      const result = await client.deleteObject('products', '');

      nock.emitter.removeListener('no match', noMatch);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(InvalidObjectIdError);
      }
      expect(noMatch).not.toHaveBeenCalled();
    });

    it('should tag a move with the source index', async () => {
      const scope = nock(WRITE_HOST)
        .post('/1/indexes/products_tmp/operation', {
          operation: 'move',
          destination: 'products',
        })
        .reply(200, { taskID: 8, updatedAt: '2026-01-01T00:00:00Z' });

      const result = await client.moveIndex('products_tmp', 'products');

      expect(result).toEqual({
        ok: true,
        data: { taskID: 8, updatedAt: '2026-01-01T00:00:00Z', indexName: 'products_tmp' },
      });
      expect(scope.isDone()).toBe(true);
    });

    it('should end the wait with the failed poll', async () => {
      nock(WRITE_HOST)
        .get('/1/indexes/products/task/9')
        .reply(404, { message: 'Task does not exist' });

      const result = await client.waitTask('products', 9);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(HttpError);
        expect(result.error).toMatchObject({ status: 404 });
      }
      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe('Reads', () => {
    it('should search the DSN replica with encoded parameters', async () => {
      const scope = nock(READ_HOST)
        .get('/1/indexes/products')
        .query({ query: 'trail shoe', hitsPerPage: '5', attributesToRetrieve: 'name,price' })
        .reply(200, { hits: [], nbHits: 0 });

      const result = await client.search('products', 'trail shoe', {
        hitsPerPage: 5,
        attributesToRetrieve: ['name', 'price'],
      });

      expect(result).toEqual({ ok: true, data: { hits: [], nbHits: 0 } });
      expect(scope.isDone()).toBe(true);
    });

    it('should post multiple queries to the shared queries endpoint', async () => {
      const scope = nock(READ_HOST)
        .post('/1/indexes/*/queries', {
          requests: [
            { indexName: 'products', params: 'query=shoe' },
            { indexName: 'brands', params: 'query=shoe&hitsPerPage=2' },
          ],
        })
        .query({ strategy: 'stopIfEnoughMatches' })
        .reply(200, { results: [] });

      const result = await client.multipleQueries(
        [
          { indexName: 'products', query: 'shoe' },
          { indexName: 'brands', query: 'shoe', hitsPerPage: 2 },
        ],
        { strategy: 'stopIfEnoughMatches' }
      );

      expect(result).toEqual({ ok: true, data: { results: [] } });
      expect(scope.isDone()).toBe(true);
    });

    it('should list indexes on the bare indexes path', async () => {
      nock(READ_HOST).get('/1/indexes').reply(200, { items: [], nbPages: 1 });

      const result = await client.listIndexes();

      expect(result).toEqual({ ok: true, data: { items: [], nbPages: 1 } });
    });
  });

  describe('Failover', () => {
    it('should move to the first cluster host when the replica is unreachable', async () => {
      nock(READ_HOST)
        .get('/1/indexes/products/A-1')
        .replyWithError({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED' });
      const cluster = nock(clusterHost(1))
        .get('/1/indexes/products/A-1')
        .reply(200, { objectID: 'A-1', name: 'Trail shoe' });

      const result = await client.getObject('products', 'A-1');

      expect(result).toEqual({
        ok: true,
        data: { objectID: 'A-1', name: 'Trail shoe', indexName: 'products' },
      });
      expect(cluster.isDone()).toBe(true);
    });

    it('should return an HTTP error without trying another host', async () => {
      nock(READ_HOST)
        .get('/1/indexes/missing/settings')
        .reply(404, { message: 'Index does not exist' });
      const cluster = nock(clusterHost(1)).get('/1/indexes/missing/settings').reply(200, {});

      const result = await client.getSettings('missing');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(HttpError);
        expect(result.error).toMatchObject({
          status: 404,
          body: '{"message":"Index does not exist"}',
        });
      }
      expect(cluster.isDone()).toBe(false);
    });

    it('should give up after the master host and three cluster hosts', async () => {
      const hosts = [WRITE_HOST, clusterHost(1), clusterHost(2), clusterHost(3)];
      const scopes = hosts.map((host) =>
        nock(host)
          .post('/1/indexes/products/clear')
          .replyWithError({ code: 'ECONNRESET', message: 'socket hang up' })
      );

      const result = await client.clearIndex('products');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(HostsExhaustedError);
      }
      expect(scopes.every((scope) => scope.isDone())).toBe(true);
      expect(await client.getMetrics()).toContain(
        'search_hosts_exhausted_total{host_class="write"} 1'
      );
    });
  });

  describe('Configuration', () => {
    it('should reject an invalid configuration', () => {
      expect(() => SearchClient.create({ task: { pollIntervalMs: -1 } })).toThrow(
        InvalidConfigError
      );
    });

    it('should raise a configuration error on the first call without credentials', async () => {
      const unconfigured = SearchClient.create(
        { logging: { level: 'error' } },
        { credentials: new EnvCredentialsProvider({}, {}) }
      );

      await expect(unconfigured.listIndexes()).rejects.toThrow(MissingApplicationIdError);
      await unconfigured.close();
    });
  });
});
