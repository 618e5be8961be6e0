// src/index.ts

export { SearchClient } from './sdk';
export type {
  ClientDeps,
  IdAttributeOptions,
  SaveObjectOptions,
  PartialUpdateOptions,
  PartialUpdateObjectsOptions,
} from './sdk';
export type { InitConfig } from './config/ConfigValidator';
export { validateConfig, validateConfigSafe, configJsonSchema } from './config/ConfigValidator';
export { EnvCredentialsProvider, StaticCredentialsProvider } from './config/CredentialsProvider';
export type { Credentials, CredentialsProvider } from './config/CredentialsProvider';
export type { HeaderList, HostClass, HttpMethod, RequestOptions, RequestSpec } from './core/http/types';
export type { HttpTransport } from './core/http/HttpTransport';
export { resolveHost, MAX_ATTEMPTS } from './core/http/HostResolver';
export { buildBatch, injectIndex } from './core/batch/BatchBuilder';
export type { BatchAction, BatchOperation, BatchRequest } from './core/batch/types';
export type { TaskHandle, TaskID } from './core/task/types';
export type { MultiQuery, MultiQueryStrategy, SearchParams } from './core/requests/RequestBuilder';
export type { Result, Success, Failure, JsonObject, JsonValue } from './utils/result';

// Export error classes for error handling
export {
  SDKError,
  ConfigurationError,
  MissingApplicationIdError,
  MissingApiKeyError,
  InvalidConfigError,
  ValidationError,
  NetworkError,
  NetworkTimeoutError,
  HttpError,
  HostsExhaustedError,
  ResponseDecodeError,
  InvalidObjectIdError,
  TaskStatusError,
} from './utils/errors';
export type { DispatchError } from './utils/errors';
