import 'reflect-metadata';
import { RouteDefinitionError } from './errors';
import { compileRoute, ParamSpec, RouteDescriptor } from './RouteDescriptor';
import { isRouteInvoker } from './RouteInvoker';
import { isTypeDescriptor, TypeDescriptor } from './TypeDescriptor';
import { HttpMethod } from './types';

/**
 * Metadata keys for storing route information on client classes.
 */
export const METADATA_KEYS = {
    ROUTES: 'restwire:routes',
    PARAMS: 'restwire:params',
};

/** Body parameter name @Post, @Put and @Patch use unless told otherwise. */
export const DEFAULT_BODY_PARAM = 'body';

export interface ParamOptions {
    /** Overrides the emitted design type, e.g. `ArrayOf(Tag)` for a `Tag[]` parameter. */
    type?: TypeDescriptor;
    /** Used when the caller passes `undefined`. */
    default?: unknown;
    optional?: boolean;
}

export interface RouteOptions {
    /** Type the response body is loaded as. Without it the raw JSON is returned. */
    result?: TypeDescriptor;
}

export interface BodyRouteOptions extends RouteOptions {
    /** Name of the parameter sent as the JSON body. */
    body?: string;
}

export interface RestOptions extends BodyRouteOptions {
    method: HttpMethod;
}

export type ClientParamDecorator = (
    target: object,
    propertyKey: string | symbol | undefined,
    parameterIndex: number,
) => void;

export type ClientMethodDecorator = (
    target: object,
    propertyKey: string | symbol,
    descriptor: PropertyDescriptor,
) => void;

class ParamMetadata {
    constructor(
        readonly index: number,
        readonly name: string,
        readonly options: ParamOptions,
    ) {}
}

/**
 * @Param names a client method parameter. Every parameter of a routed method
 * needs one: the name is what URL placeholders, the body option and query
 * keys refer to.
 *
 * Usage:
 * ```typescript
 * @Get('pets/{petId}', { result: Pet })
 * getPet(@Param('petId') petId: number): Promise<Pet> {
 *     return routeStub();
 * }
 * ```
 */
export function Param(name: string, options: ParamOptions = {}): ClientParamDecorator {
    return (target: object, propertyKey: string | symbol | undefined, parameterIndex: number) => {
        if (propertyKey === undefined) {
            throw new RouteDefinitionError(`@Param('${name}') can only be used on client methods, not constructors`);
        }
        const existing = readParams(target, propertyKey);
        Reflect.defineMetadata(
            METADATA_KEYS.PARAMS,
            [...existing, new ParamMetadata(parameterIndex, name, options)],
            target,
            propertyKey,
        );
    };
}

/**
 * @Rest declares a client method as an HTTP route.
 *
 * The route is compiled right away, so a bad template or body name fails
 * while the class is being defined. The method body is replaced by a call
 * to `this.invokeRoute(route, args)`.
 *
 * Usage:
 * ```typescript
 * class PetStoreClient extends BaseClient {
 *     @Rest('pets/{petId}/tags', { method: 'PUT', body: 'tags', result: Pet })
 *     replaceTags(@Param('petId') petId: number, @Param('tags') tags: string[]): Promise<Pet> {
 *         return routeStub();
 *     }
 * }
 * ```
 */
export function Rest(urlTemplate: string, options: RestOptions): ClientMethodDecorator {
    return routeDecorator(urlTemplate, options.method, options.result, () => options.body || undefined);
}

/**
 * @Get - no body; every parameter not in the URL goes to the query string.
 */
export function Get(urlTemplate: string, options: RouteOptions = {}): ClientMethodDecorator {
    return routeDecorator(urlTemplate, 'GET', options.result, () => undefined);
}

/**
 * @Delete - no body; every parameter not in the URL goes to the query string.
 */
export function Delete(urlTemplate: string, options: RouteOptions = {}): ClientMethodDecorator {
    return routeDecorator(urlTemplate, 'DELETE', options.result, () => undefined);
}

/**
 * @Post - the parameter named `body` (or `options.body`) is the JSON body.
 */
export function Post(urlTemplate: string, options: BodyRouteOptions = {}): ClientMethodDecorator {
    return routeDecorator(urlTemplate, 'POST', options.result, defaultBody(options));
}

/**
 * @Put - the parameter named `body` (or `options.body`) is the JSON body.
 */
export function Put(urlTemplate: string, options: BodyRouteOptions = {}): ClientMethodDecorator {
    return routeDecorator(urlTemplate, 'PUT', options.result, defaultBody(options));
}

/**
 * @Patch - the parameter named `body` (or `options.body`) is the JSON body.
 */
export function Patch(urlTemplate: string, options: BodyRouteOptions = {}): ClientMethodDecorator {
    return routeDecorator(urlTemplate, 'PATCH', options.result, defaultBody(options));
}

/**
 * Body of a decorated method. The decorator replaces the method, so this
 * only runs when a method was left undecorated.
 */
export function routeStub(): never {
    throw new RouteDefinitionError(
        'Client method has no route; decorate it with @Get, @Post, @Put, @Patch, @Delete or @Rest',
    );
}

/**
 * All routes compiled for a client class, including inherited ones.
 */
export function getRoutes(clientClass: object): RouteDescriptor[] {
    const routes: unknown = Reflect.getMetadata(METADATA_KEYS.ROUTES, clientClass);
    return Array.isArray(routes) ? routes.filter(isRouteDescriptor) : [];
}

function defaultBody(options: BodyRouteOptions): (params: readonly ParamSpec[]) => string | undefined {
    return (params) => {
        if (options.body !== undefined) {
            return options.body || undefined;
        }
        return params.some((param) => param.name === DEFAULT_BODY_PARAM) ? DEFAULT_BODY_PARAM : undefined;
    };
}

function routeDecorator(
    urlTemplate: string,
    method: HttpMethod,
    resultType: TypeDescriptor | undefined,
    resolveBody: (params: readonly ParamSpec[]) => string | undefined,
): ClientMethodDecorator {
    return (target: object, propertyKey: string | symbol, descriptor: PropertyDescriptor) => {
        if (typeof target === 'function') {
            throw new RouteDefinitionError(
                `${target.name}.${String(propertyKey)}: routes must be instance methods, not static ones`,
            );
        }
        const name = `${target.constructor.name}.${String(propertyKey)}`;
        if (typeof descriptor.value !== 'function') {
            throw new RouteDefinitionError(`${name}: route decorators only apply to methods`);
        }

        const params = collectParams(name, target, propertyKey, descriptor.value);
        const route = compileRoute({
            name,
            urlTemplate,
            method,
            params,
            bodyParam: resolveBody(params),
            resultType,
        });
        recordRoute(target.constructor, route);

        descriptor.value = function (this: unknown, ...args: unknown[]): Promise<unknown> {
            if (!isRouteInvoker(this)) {
                return Promise.reject(
                    new RouteDefinitionError(`${name} must be called on a client that extends BaseClient`),
                );
            }
            return this.invokeRoute(route, args);
        };
    };
}

function collectParams(
    name: string,
    target: object,
    propertyKey: string | symbol,
    method: { length: number },
): ParamSpec[] {
    const declared = readParams(target, propertyKey);
    const emitted: unknown = Reflect.getMetadata('design:paramtypes', target, propertyKey);
    const designTypes: unknown[] = Array.isArray(emitted) ? emitted : [];
    const count = Math.max(
        designTypes.length,
        method.length,
        ...declared.map((meta) => meta.index + 1),
    );

    const params: ParamSpec[] = [];
    for (let index = 0; index < count; index++) {
        const matches = declared.filter((meta) => meta.index === index);
        if (matches.length === 0) {
            throw new RouteDefinitionError(`Parameter #${index} of ${name} needs a @Param() name`);
        }
        if (matches.length > 1) {
            throw new RouteDefinitionError(`Parameter #${index} of ${name} has more than one @Param()`);
        }
        params.push(toParamSpec(matches[0], designTypes[index]));
    }
    return params;
}

function toParamSpec(meta: ParamMetadata, designType: unknown): ParamSpec {
    const type = meta.options.type ?? (isTypeDescriptor(designType) ? designType : Object);
    const hasDefault = 'default' in meta.options;
    const spec: ParamSpec = {
        name: meta.name,
        type,
        optional: meta.options.optional ?? hasDefault,
    };
    return hasDefault ? { ...spec, defaultValue: meta.options.default } : spec;
}

function readParams(target: object, propertyKey: string | symbol): ParamMetadata[] {
    const params: unknown = Reflect.getOwnMetadata(METADATA_KEYS.PARAMS, target, propertyKey);
    return Array.isArray(params) ? params.filter(isParamMetadata) : [];
}

function recordRoute(clientClass: object, route: RouteDescriptor): void {
    // inherited routes are copied, never appended to the parent's list
    const routes = [...getRoutes(clientClass), route];
    Reflect.defineMetadata(METADATA_KEYS.ROUTES, routes, clientClass);
}

function isParamMetadata(value: unknown): value is ParamMetadata {
    return value instanceof ParamMetadata;
}

function isRouteDescriptor(value: unknown): value is RouteDescriptor {
    return value instanceof RouteDescriptor;
}
