import { EJSON, type EJSONOptions } from 'bson';

export { EJSON, type EJSONOptions, Int32 } from 'bson';

/**
 * Relaxed extended JSON keeps Int32 values as plain numbers, which is what log readers expect.
 * @internal
 */
export const LOG_EJSON_OPTIONS: EJSONOptions = Object.freeze({ relaxed: true });

/** @internal */
export function toExtendedJSON(value: unknown): string {
  return EJSON.stringify(value, LOG_EJSON_OPTIONS);
}
