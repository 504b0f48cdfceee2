/**
 * HTTP verbs a route can be declared with.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Any value JSON can carry.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type QueryPrimitive = string | number | boolean;

/**
 * A single query-string entry. Arrays are sent as repeated keys.
 */
export type QueryValue = QueryPrimitive | QueryPrimitive[];

export type QueryParams = Record<string, QueryValue>;

export function isQueryPrimitive(value: unknown): value is QueryPrimitive {
    return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

export function isQueryValue(value: unknown): value is QueryValue {
    if (Array.isArray(value)) {
        return value.every(isQueryPrimitive);
    }
    return isQueryPrimitive(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
        return true;
    }
    if (typeof value === 'number') {
        return Number.isFinite(value);
    }
    if (Array.isArray(value)) {
        return value.every(isJsonValue);
    }
    if (isRecord(value)) {
        return Object.values(value).every(isJsonValue);
    }
    return false;
}
