// src/core/requests/RequestBuilder.ts
//
// Pure functions turning operation arguments into a host class and request
// spec. Path segments from caller input are percent-encoded here; the
// dispatcher never touches them.

import type { DispatchRequest, HeaderList, HttpMethod, RequestOptions } from '../http/types';
import type { BatchRequest } from '../batch/types';
import type { TaskID } from '../task/types';
import type { JsonObject } from '../../utils/result';
import { ValidationError } from '../../utils/errors';

export type QueryParamValue = string | number | boolean | Array<string | number | boolean>;

export type SearchParams = Record<string, QueryParamValue>;

export interface MultiQuery {
  indexName: string;
  [param: string]: QueryParamValue;
}

export type MultiQueryStrategy = 'none' | 'stopIfEnoughMatches';

function isHeaderList(headers: HeaderList | Readonly<Record<string, string>>): headers is HeaderList {
  return Array.isArray(headers);
}

function headerList(headers: RequestOptions['headers']): HeaderList {
  if (headers === undefined) return [];
  return isHeaderList(headers) ? [...headers] : Object.entries(headers);
}

function spec(
  hostClass: DispatchRequest['hostClass'],
  method: HttpMethod,
  path: string,
  body?: unknown,
  options?: RequestOptions
): DispatchRequest {
  return {
    hostClass,
    spec: {
      method,
      path,
      body: body === undefined ? undefined : JSON.stringify(body),
      headers: headerList(options?.headers),
    },
  };
}

function segment(value: string | number): string {
  return encodeURIComponent(String(value));
}

function encodeQuery(params: Record<string, QueryParamValue>): string {
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    query.append(key, Array.isArray(value) ? value.join(',') : String(value));
  }
  return query.toString();
}

export function multipleQueriesRequest(
  queries: readonly MultiQuery[],
  strategy: MultiQueryStrategy = 'none'
): DispatchRequest {
  const requests = queries.map((query) => {
    const { indexName, ...params } = query;
    if (typeof indexName !== 'string' || !indexName) {
      throw new ValidationError('Missing indexName for one of the multiple queries');
    }
    return { indexName, params: encodeQuery(params) };
  });

  return spec('read', 'POST', `*/queries?strategy=${strategy}`, { requests });
}

export function searchRequest(
  indexName: string,
  query: string,
  params: SearchParams = {},
  options?: RequestOptions
): DispatchRequest {
  // `query` always leads and replaces any query passed in params
  const merged: SearchParams = { query };
  for (const [key, value] of Object.entries(params)) {
    if (key !== 'query') merged[key] = value;
  }
  const path = `${segment(indexName)}?${encodeQuery(merged)}`;
  return spec('read', 'GET', path, undefined, options);
}

export function searchForFacetValuesRequest(
  indexName: string,
  facet: string,
  text: string,
  query: JsonObject = {}
): DispatchRequest {
  const path = `${segment(indexName)}/facets/${segment(facet)}/query`;
  return spec('read', 'POST', path, { ...query, facetQuery: text });
}

export function getObjectRequest(indexName: string, objectID: string): DispatchRequest {
  return spec('read', 'GET', `${segment(indexName)}/${segment(objectID)}`);
}

export function addObjectRequest(indexName: string, object: JsonObject): DispatchRequest {
  return spec('write', 'POST', segment(indexName), object);
}

export function saveObjectRequest(
  indexName: string,
  object: JsonObject,
  objectID: string
): DispatchRequest {
  return spec('write', 'PUT', `${segment(indexName)}/${segment(objectID)}`, object);
}

export function partialUpdateObjectRequest(
  indexName: string,
  object: JsonObject,
  objectID: string,
  upsert: boolean = true
): DispatchRequest {
  const params = upsert ? '' : '?createIfNotExists=false';
  return spec('write', 'POST', `${segment(indexName)}/${segment(objectID)}/partial${params}`, object);
}

export function deleteObjectRequest(indexName: string, objectID: string): DispatchRequest {
  return spec('write', 'DELETE', `${segment(indexName)}/${segment(objectID)}`);
}

export function batchRequest(indexName: string, batch: BatchRequest): DispatchRequest {
  return spec('write', 'POST', `${segment(indexName)}/batch`, batch);
}

export function listIndexesRequest(): DispatchRequest {
  return spec('read', 'GET', '');
}

export function deleteIndexRequest(indexName: string): DispatchRequest {
  return spec('write', 'DELETE', segment(indexName));
}

export function clearIndexRequest(indexName: string): DispatchRequest {
  return spec('write', 'POST', `${segment(indexName)}/clear`);
}

export function setSettingsRequest(indexName: string, settings: JsonObject): DispatchRequest {
  return spec('write', 'PUT', `${segment(indexName)}/settings`, settings);
}

export function getSettingsRequest(indexName: string): DispatchRequest {
  return spec('read', 'GET', `${segment(indexName)}/settings`);
}

export function indexOperationRequest(
  operation: 'move' | 'copy',
  sourceIndex: string,
  destinationIndex: string
): DispatchRequest {
  return spec('write', 'POST', `${segment(sourceIndex)}/operation`, {
    operation,
    destination: destinationIndex,
  });
}

export function taskStatusRequest(indexName: string, taskID: TaskID): DispatchRequest {
  return spec('write', 'GET', `${segment(indexName)}/task/${segment(taskID)}`);
}
