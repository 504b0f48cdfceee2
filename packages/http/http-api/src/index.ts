/**
 * @restwire/http-api
 *
 * Declaration side of restwire clients: route decorators, route compilation,
 * argument binding, the serializer contract and the error taxonomy.
 *
 * Architecture:
 * ```
 * http-api (declares routes, binds arguments)
 *    ↑
 *    └── http-client (BaseClient: dispatches routes over a Transport)
 * ```
 */

// Route declaration
export {
    Rest,
    Get,
    Post,
    Put,
    Patch,
    Delete,
    Param,
    routeStub,
    getRoutes,
    METADATA_KEYS,
    DEFAULT_BODY_PARAM,
} from './decorators';
export type {
    ParamOptions,
    RouteOptions,
    BodyRouteOptions,
    RestOptions,
    ClientMethodDecorator,
    ClientParamDecorator,
} from './decorators';

// Route compilation and argument binding
export { RouteDescriptor, compileRoute } from './RouteDescriptor';
export type { ParamSpec, RouteDefinition } from './RouteDescriptor';
export { bindArguments, buildUrl, buildQuery, extractBody } from './ArgumentBinder';
export type { BoundArguments } from './ArgumentBinder';
export { parseUrlTemplate, expandUrlTemplate, placeholderNames } from './UrlTemplate';
export type { TemplateSegment } from './UrlTemplate';
export { isRouteInvoker } from './RouteInvoker';
export type { RouteInvoker } from './RouteInvoker';

// Types and serialization
export { ArrayOf, ArrayDescriptor, isTypeDescriptor, describeType } from './TypeDescriptor';
export type { ClassType, TypeDescriptor } from './TypeDescriptor';
export type { Serializer } from './Serializer';
export { isJsonValue, isQueryValue, isQueryPrimitive, isRecord } from './types';
export type { HttpMethod, JsonValue, QueryParams, QueryValue, QueryPrimitive } from './types';

// Errors
export { ApiError, NotFoundError, RouteDefinitionError, SerializationError } from './errors';
