// src/core/batch/types.ts

import type { JsonObject } from '../../utils/result';

export type BatchAction =
  | 'addObject'
  | 'updateObject'
  | 'partialUpdateObject'
  | 'partialUpdateObjectNoCreate'
  | 'deleteObject';

export interface BatchOperation {
  action: BatchAction;
  objectID?: string;
  body: JsonObject;
}

export interface BatchRequest {
  requests: BatchOperation[];
}
