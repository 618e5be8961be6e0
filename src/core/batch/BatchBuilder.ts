// src/core/batch/BatchBuilder.ts

import type { BatchAction, BatchOperation, BatchRequest } from './types';
import type { JsonObject, Result } from '../../utils/result';
import { ValidationError } from '../../utils/errors';

export const OBJECT_ID = 'objectID';

/**
 * Read an identifier from an attribute. Scalars (strings, finite numbers,
 * booleans) are sent in their string form. Missing, `null`, object and array
 * values count as absent, since they have no identifier form.
 */
export function readId(object: JsonObject, attribute: string = OBJECT_ID): string | undefined {
  const value = object[attribute];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'boolean') return String(value);
  return undefined;
}

/**
 * Wrap objects into batch operations, keeping their order. The service
 * assigns an identifier to operations sent without one.
 */
export function buildBatch(objects: readonly JsonObject[], action: BatchAction): BatchRequest {
  const requests = objects.map((object): BatchOperation => {
    const objectID = readId(object);
    return objectID === undefined
      ? { action, body: object }
      : { action, objectID, body: object };
  });

  return { requests };
}

/**
 * Copy `idAttribute` into `objectID` on every object.
 *
 * @throws {ValidationError} when an object has no value for the attribute
 */
export function assignObjectIds(
  objects: readonly JsonObject[],
  idAttribute: string = OBJECT_ID
): JsonObject[] {
  if (idAttribute === OBJECT_ID) {
    return [...objects];
  }

  return objects.map((object) => {
    const id = readId(object, idAttribute);
    if (id === undefined) {
      throw new ValidationError(`id attribute \`${idAttribute}\` doesn't exist`, { idAttribute });
    }
    return { ...object, [OBJECT_ID]: id };
  });
}

/**
 * Tag a successful write response with the index it targeted, so the result
 * can be handed straight to `wait`.
 */
export function injectIndex(result: Result<JsonObject>, indexName: string): Result<JsonObject> {
  if (!result.ok) {
    return result;
  }
  return { ok: true, data: { ...result.data, indexName } };
}
