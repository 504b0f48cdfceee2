import {
    ApiError,
    bindArguments,
    buildQuery,
    buildUrl,
    extractBody,
    HttpMethod,
    JsonValue,
    NotFoundError,
    QueryParams,
    QueryValue,
    RouteDescriptor,
    RouteInvoker,
    Serializer,
    TypeDescriptor,
} from '@restwire/http-api';
import { toError } from '@restwire/core-util';
import { ClassTransformerSerializer } from './ClassTransformerSerializer';
import { ClientConfig } from './ClientConfig';
import { describeResponse, ErrorHandler, ErrorRouter, HandlerVerb } from './ErrorRouter';
import { LogApiCall } from './LogApiCall';
import { ResponseDecodeError, Transport, TransportError, TransportRequest, TransportResponse } from './Transport';

export type RequestQuery = Record<string, QueryValue | undefined | null>;

export interface ReadOptions {
    query?: RequestQuery;
    /** Load the response as this type; without it the raw JSON is returned */
    resultType?: TypeDescriptor;
}

export interface WriteOptions extends ReadOptions {
    body?: unknown;
    /** Dump the body as this type; without it the body is sent as plain JSON */
    bodyType?: TypeDescriptor;
}

export interface RequestOptions extends WriteOptions {
    /** Path relative to the base URL */
    url: string;
    method: HttpMethod;
    /** Name used in log lines; defaults to 'METHOD url' */
    label?: string;
}

/**
 * BaseClient - Base class of every declarative REST client.
 *
 * Subclasses declare methods with the route decorators of @restwire/http-api;
 * each call is bound, serialized and sent the way request() sends it.
 *
 * Usage:
 * ```typescript
 * class PetStoreClient extends BaseClient {
 *     @Get('pets/{petId}', { result: Pet })
 *     getPet(@Param('petId') petId: number): Promise<Pet> {
 *         return routeStub();
 *     }
 * }
 *
 * const client = new PetStoreClient(new ClientConfig('http://localhost:3000'));
 * const pet = await client.getPet(7); // GET http://localhost:3000/pets/7
 * ```
 *
 * Failures:
 * - non-2xx responses go through the ErrorRouter (404 → NotFoundError by default)
 * - connection failures become ApiError('RequestException')
 * - 2xx bodies that are not JSON become ApiError('Cannot decode response')
 * - SerializationError from the body or the result propagates as is
 */
export class BaseClient implements RouteInvoker {
    readonly baseUrl: string;
    protected readonly transport: Transport;
    protected readonly serializer: Serializer;
    protected readonly errorHandlers: ErrorRouter;
    private readonly logApiCall: LogApiCall;

    constructor(config: ClientConfig) {
        this.baseUrl = config.baseUrl.replace(/\/+$/, '');
        this.transport = config.transport;
        this.errorHandlers = new ErrorRouter();
        this.errorHandlers.register('', 404, handleNotFound);
        this.serializer = this.createSerializer();
        this.logApiCall = new LogApiCall(config.loggingEnabled);
    }

    /**
     * Override to use another Serializer. Called once, from the constructor.
     */
    protected createSerializer(): Serializer {
        return new ClassTransformerSerializer();
    }

    /**
     * Route failed responses with this status (and verb, unless '') to `handler`.
     * A verb-specific handler wins over the '' one for the same status.
     */
    registerErrorHandler(verb: HandlerVerb, status: number, handler: ErrorHandler): void {
        this.errorHandlers.register(verb, status, handler);
    }

    unregisterErrorHandler(verb: HandlerVerb, status: number): boolean {
        return this.errorHandlers.unregister(verb, status);
    }

    /**
     * Called by decorated methods with their compiled route and call arguments.
     */
    async invokeRoute(route: RouteDescriptor, args: readonly unknown[]): Promise<unknown> {
        return this.logApiCall.execute(
            route.name,
            () => {
                const bound = bindArguments(route, args);
                return this.prepareRequest({
                    url: buildUrl(route, bound),
                    method: route.method,
                    query: buildQuery(route, bound, this.serializer),
                    body: extractBody(route, bound),
                    bodyType: route.bodyType,
                });
            },
            (request) => this.exchange(request, route.resultType),
        );
    }

    async request(options: RequestOptions): Promise<unknown> {
        const label = options.label ?? `${options.method} ${options.url}`;
        return this.logApiCall.execute(
            label,
            () => this.prepareRequest(options),
            (request) => this.exchange(request, options.resultType),
        );
    }

    // Named apart from get/post/... so subclasses keep those names for routes
    requestGet(url: string, options: ReadOptions = {}): Promise<unknown> {
        return this.request({ ...options, url, method: 'GET' });
    }

    requestDelete(url: string, options: ReadOptions = {}): Promise<unknown> {
        return this.request({ ...options, url, method: 'DELETE' });
    }

    requestPost(url: string, options: WriteOptions = {}): Promise<unknown> {
        return this.request({ ...options, url, method: 'POST' });
    }

    requestPut(url: string, options: WriteOptions = {}): Promise<unknown> {
        return this.request({ ...options, url, method: 'PUT' });
    }

    requestPatch(url: string, options: WriteOptions = {}): Promise<unknown> {
        return this.request({ ...options, url, method: 'PATCH' });
    }

    private prepareRequest(options: RequestOptions): TransportRequest {
        return {
            method: options.method,
            url: `${this.baseUrl}/${options.url}`,
            query: compactQuery(options.query),
            body: this.dumpBody(options.body, options.bodyType),
        };
    }

    private dumpBody(body: unknown, bodyType: TypeDescriptor | undefined): JsonValue | undefined {
        if (body === undefined || body === null) {
            return undefined;
        }
        return this.serializer.dump(body, bodyType ?? Object);
    }

    private async exchange(request: TransportRequest, resultType: TypeDescriptor | undefined): Promise<unknown> {
        const response = await this.send(request);
        if (!response.ok) {
            try {
                return await this.errorHandlers.handle(request.method, response);
            } finally {
                await response.discard();
            }
        }
        const json = await this.readJson(response);
        return resultType === undefined ? json : this.serializer.load(json, resultType);
    }

    private async send(request: TransportRequest): Promise<TransportResponse> {
        try {
            return await this.transport.send(request);
        } catch (err: unknown) {
            throw this.translateFailure(request.url, toError(err));
        }
    }

    private async readJson(response: TransportResponse): Promise<JsonValue> {
        try {
            return await response.json();
        } catch (err: unknown) {
            throw this.translateFailure(response.url, toError(err));
        }
    }

    private translateFailure(url: string, error: Error): Error {
        if (error instanceof TransportError) {
            this.logApiCall.logError(`RequestException when connecting with url: ${url}, error: ${error.message}`);
            return new ApiError('RequestException', error);
        }
        if (error instanceof ResponseDecodeError || error instanceof SyntaxError) {
            this.logApiCall.logError(`Cannot decode response for url: ${url}, error: ${error.message}`);
            return new ApiError('Cannot decode response', error);
        }
        return error;
    }
}

function handleNotFound(response: TransportResponse): never {
    throw new NotFoundError(describeResponse(response));
}

function compactQuery(query: RequestQuery | undefined): QueryParams {
    const compact: QueryParams = {};
    if (!query) {
        return compact;
    }
    for (const [key, value] of Object.entries(query)) {
        if (value !== undefined && value !== null) {
            compact[key] = value;
        }
    }
    return compact;
}
