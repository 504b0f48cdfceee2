import { bindArguments, buildQuery, buildUrl, extractBody } from '../ArgumentBinder';
import { SerializationError } from '../errors';
import { compileRoute, ParamSpec } from '../RouteDescriptor';
import { Serializer } from '../Serializer';
import { describeType, TypeDescriptor } from '../TypeDescriptor';
import { isJsonValue, JsonValue } from '../types';

/**
 * Passes JSON values through and records what it was asked to dump.
 */
class PassThroughSerializer implements Serializer {
    dumped: Array<[unknown, string]> = [];

    dump(value: unknown, type: TypeDescriptor): JsonValue {
        this.dumped.push([value, describeType(type)]);
        if (value instanceof Date) {
            return value.toISOString();
        }
        if (!isJsonValue(value)) {
            throw new SerializationError('not JSON');
        }
        return value;
    }

    load(json: JsonValue): unknown {
        return json;
    }
}

function param(name: string, type: TypeDescriptor = String, extra: Partial<ParamSpec> = {}): ParamSpec {
    return { name, type, optional: false, ...extra };
}

const searchRoute = compileRoute({
    name: 'OrderClient.searchOrders',
    urlTemplate: 'shops/{shopId}/orders',
    method: 'POST',
    params: [
        param('shopId', Number),
        param('body', Object),
        param('status', String, { optional: true }),
        param('limit', Number, { optional: true, defaultValue: 20 }),
        param('tags', Array, { optional: true }),
    ],
    bodyParam: 'body',
});

describe('bindArguments', () => {
    it('should bind positional arguments by name and apply defaults', () => {
        const bound = bindArguments(searchRoute, [3, { total: 5 }]);

        expect([...bound.entries()]).toEqual([
            ['shopId', 3],
            ['body', { total: 5 }],
            ['status', undefined],
            ['limit', 20],
            ['tags', undefined],
        ]);
    });

    it('should prefer an explicit argument over the default', () => {
        const bound = bindArguments(searchRoute, [3, {}, 'open', 50]);

        expect(bound.get('limit')).toBe(50);
    });

    it('should treat undefined as missing and fall back to the default', () => {
        const bound = bindArguments(searchRoute, [3, {}, undefined, undefined]);

        expect(bound.get('limit')).toBe(20);
    });

    it('should reject a missing required argument', () => {
        expect(() => bindArguments(searchRoute, [3])).toThrow(
            new TypeError("OrderClient.searchOrders is missing required argument 'body'"),
        );
    });

    it('should reject surplus arguments', () => {
        expect(() => bindArguments(searchRoute, [3, {}, 'open', 1, [], 'extra'])).toThrow(
            new TypeError('OrderClient.searchOrders takes 5 argument(s) but 6 were given'),
        );
    });
});

describe('buildUrl', () => {
    it('should substitute bound values into the template', () => {
        const bound = bindArguments(searchRoute, [12, {}]);

        expect(buildUrl(searchRoute, bound)).toBe('shops/12/orders');
    });
});

describe('buildQuery', () => {
    it('should dump only the parameters the route does not consume', () => {
        const serializer = new PassThroughSerializer();
        const bound = bindArguments(searchRoute, [12, { secret: true }, 'open', undefined, ['a', 'b']]);

        const query = buildQuery(searchRoute, bound, serializer);

        expect(query).toEqual({ status: 'open', limit: 20, tags: ['a', 'b'] });
        expect(serializer.dumped).toEqual([
            ['open', 'String'],
            [20, 'Number'],
            [['a', 'b'], 'Array'],
        ]);
    });

    it('should leave out absent values', () => {
        const bound = bindArguments(searchRoute, [12, {}, null]);

        expect(buildQuery(searchRoute, bound, new PassThroughSerializer())).toEqual({ limit: 20 });
    });

    it('should send every unconsumed parameter as a query key', () => {
        const route = compileRoute({
            name: 'OrderClient.find',
            urlTemplate: 'orders',
            method: 'GET',
            params: [param('shopId', Number)],
        });

        const query = buildQuery(route, bindArguments(route, [7]), new PassThroughSerializer());

        expect(query).toEqual({ shopId: 7 });
    });

    it('should reject values that do not serialize to query entries', () => {
        const route = compileRoute({
            name: 'OrderClient.filter',
            urlTemplate: 'orders',
            method: 'GET',
            params: [param('filter', Object)],
        });
        const bound = bindArguments(route, [{ status: 'open' }]);

        expect(() => buildQuery(route, bound, new PassThroughSerializer())).toThrow(
            new SerializationError(
                "Query parameter 'filter' of OrderClient.filter must serialize to a string, number, boolean or an array of those",
                'filter',
            ),
        );
    });
});

describe('extractBody', () => {
    it('should return the bound body argument', () => {
        const bound = bindArguments(searchRoute, [1, { total: 9 }]);

        expect(extractBody(searchRoute, bound)).toEqual({ total: 9 });
    });

    it('should return undefined for a route without a body', () => {
        const route = compileRoute({ name: 'C.m', urlTemplate: 'x', method: 'GET', params: [param('body')] });

        expect(extractBody(route, bindArguments(route, ['not a body']))).toBeUndefined();
    });
});
