import { TypeDescriptor } from './TypeDescriptor';
import { JsonValue } from './types';

/**
 * Converts between typed values and JSON-compatible structures.
 *
 * Both directions throw SerializationError when the value does not have the
 * shape `type` describes (wrong primitive kind, missing required field, ...).
 */
export interface Serializer {
    dump(value: unknown, type: TypeDescriptor): JsonValue;

    load(json: JsonValue, type: TypeDescriptor): unknown;
}
