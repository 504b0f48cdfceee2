import { HttpMethod, JsonValue, QueryParams } from '@restwire/http-api';

/**
 * One HTTP exchange as BaseClient hands it to a Transport.
 */
export interface TransportRequest {
    method: HttpMethod;
    /** Full URL, without the query string */
    url: string;
    query: QueryParams;
    /** JSON body; absent means no body is sent */
    body?: JsonValue;
}

export interface TransportResponse {
    readonly ok: boolean;
    readonly status: number;
    readonly statusText: string;
    readonly url: string;
    readonly headers: Readonly<Record<string, string>>;

    /**
     * Parse the body as JSON.
     * @throws ResponseDecodeError when the body is not JSON
     */
    json(): Promise<JsonValue>;

    /**
     * Release a body nobody read, so the connection can be reused.
     * A no-op once json() was called.
     */
    discard(): Promise<void>;
}

/**
 * Executes HTTP requests for a client. Connection pooling, retries and
 * timeouts are the transport's business.
 *
 * Implementations throw TransportError for connection-level failures so the
 * client can tell them apart from every other error.
 */
export interface Transport {
    send(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * TransportError - The request never produced a response (connection
 * refused, DNS failure, timeout, aborted body stream).
 */
export class TransportError extends Error {
    constructor(message: string, cause?: Error) {
        super(message, cause ? { cause } : undefined);
        this.name = 'TransportError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * ResponseDecodeError - A response arrived but its body is not valid JSON.
 */
export class ResponseDecodeError extends Error {
    constructor(message: string, cause?: Error) {
        super(message, cause ? { cause } : undefined);
        this.name = 'ResponseDecodeError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
