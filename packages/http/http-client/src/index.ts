/**
 * @restwire/http-client
 *
 * Runtime side of restwire clients: BaseClient dispatches the routes declared
 * with @restwire/http-api over a Transport.
 *
 * Usage:
 * ```typescript
 * import { BaseClient, ClientConfig, Get, Param, routeStub } from '@restwire/http-client';
 *
 * class PetStoreClient extends BaseClient {
 *     @Get('pets/{petId}', { result: Pet })
 *     getPet(@Param('petId') petId: number): Promise<Pet> {
 *         return routeStub();
 *     }
 * }
 *
 * const client = new PetStoreClient(new ClientConfig('http://localhost:3000'));
 * const pet = await client.getPet(7);
 * ```
 */

export { BaseClient } from './BaseClient';
export type { RequestOptions, ReadOptions, WriteOptions, RequestQuery } from './BaseClient';
export { ClientConfig } from './ClientConfig';
export { ErrorRouter, describeResponse } from './ErrorRouter';
export type { ErrorHandler, HandlerVerb } from './ErrorRouter';
export { FetchTransport, appendQuery } from './FetchTransport';
export type { FetchTransportOptions } from './FetchTransport';
export { TransportError, ResponseDecodeError } from './Transport';
export type { Transport, TransportRequest, TransportResponse } from './Transport';
export { ClassTransformerSerializer } from './ClassTransformerSerializer';
export { LogApiCall } from './LogApiCall';

// Re-export the declaration API for convenience
export {
    Rest,
    Get,
    Post,
    Put,
    Patch,
    Delete,
    Param,
    ArrayOf,
    routeStub,
    getRoutes,
    ApiError,
    NotFoundError,
    RouteDefinitionError,
    SerializationError,
} from '@restwire/http-api';
