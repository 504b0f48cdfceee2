import { SerializationError } from './errors';
import { RouteDescriptor } from './RouteDescriptor';
import { Serializer } from './Serializer';
import { isQueryValue, QueryParams } from './types';
import { expandUrlTemplate } from './UrlTemplate';

/**
 * Parameter name -> value for one call.
 */
export type BoundArguments = ReadonlyMap<string, unknown>;

/**
 * Bind positional call arguments to the route's parameter names.
 *
 * An `undefined` argument falls back to the parameter's default. Missing
 * required arguments and surplus arguments throw TypeError, as a call with
 * the wrong arity would.
 */
export function bindArguments(route: RouteDescriptor, args: readonly unknown[]): BoundArguments {
    if (args.length > route.params.length) {
        throw new TypeError(
            `${route.name} takes ${route.params.length} argument(s) but ${args.length} were given`,
        );
    }

    const bound = new Map<string, unknown>();
    route.params.forEach((param, index) => {
        let value = args[index];
        if (value === undefined && 'defaultValue' in param) {
            value = param.defaultValue;
        }
        if (value === undefined && !param.optional) {
            throw new TypeError(`${route.name} is missing required argument '${param.name}'`);
        }
        bound.set(param.name, value);
    });
    return bound;
}

export function buildUrl(route: RouteDescriptor, bound: BoundArguments): string {
    return expandUrlTemplate(route.segments, bound);
}

/**
 * Dump every parameter the route does not consume into query-string entries.
 * Absent (`undefined`/`null`) values are left out.
 */
export function buildQuery(route: RouteDescriptor, bound: BoundArguments, serializer: Serializer): QueryParams {
    const query: QueryParams = {};
    for (const param of route.queryParams) {
        const value = bound.get(param.name);
        if (value === undefined || value === null) {
            continue;
        }
        const dumped = serializer.dump(value, param.type);
        if (dumped === null) {
            continue;
        }
        if (!isQueryValue(dumped)) {
            throw new SerializationError(
                `Query parameter '${param.name}' of ${route.name} must serialize to a string, number, boolean or an array of those`,
                param.name,
            );
        }
        query[param.name] = dumped;
    }
    return query;
}

export function extractBody(route: RouteDescriptor, bound: BoundArguments): unknown {
    return route.bodyParam === undefined ? undefined : bound.get(route.bodyParam);
}
