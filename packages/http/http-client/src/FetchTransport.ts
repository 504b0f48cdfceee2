import { isJsonValue, JsonValue, QueryParams } from '@restwire/http-api';
import { toError } from '@restwire/core-util';
import { ResponseDecodeError, Transport, TransportError, TransportRequest, TransportResponse } from './Transport';

export interface FetchTransportOptions {
    /** Abort requests that take longer than this many milliseconds */
    timeoutMs?: number;
    /** Sent with every request */
    headers?: Record<string, string>;
}

/**
 * FetchTransport - Transport built on the global fetch() of Node.js.
 *
 * Usage:
 * ```typescript
 * const transport = new FetchTransport({ timeoutMs: 5000, headers: { 'x-api-key': key } });
 * const client = new PetStoreClient(new ClientConfig('https://pets.example.com/v1', transport));
 * ```
 */
export class FetchTransport implements Transport {
    constructor(private readonly options: FetchTransportOptions = {}) {}

    async send(request: TransportRequest): Promise<TransportResponse> {
        const url = appendQuery(request.url, request.query);
        const headers: Record<string, string> = {
            Accept: 'application/json',
            ...this.options.headers,
        };
        const init: RequestInit = { method: request.method, headers };

        if (request.body !== undefined) {
            headers['Content-Type'] = 'application/json';
            init.body = JSON.stringify(request.body);
        }
        if (this.options.timeoutMs !== undefined) {
            init.signal = AbortSignal.timeout(this.options.timeoutMs);
        }

        let response: Response;
        try {
            response = await fetch(url, init);
        } catch (err: unknown) {
            const error = toError(err);
            throw new TransportError(`${request.method} ${url} failed: ${error.message}`, error);
        }
        return new FetchResponse(url, response);
    }
}

class FetchResponse implements TransportResponse {
    readonly ok: boolean;
    readonly status: number;
    readonly statusText: string;
    readonly headers: Readonly<Record<string, string>>;

    constructor(
        readonly url: string,
        private readonly response: Response,
    ) {
        this.ok = response.ok;
        this.status = response.status;
        this.statusText = response.statusText;
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            headers[key] = value;
        });
        this.headers = headers;
    }

    async json(): Promise<JsonValue> {
        let text: string;
        try {
            text = await this.response.text();
        } catch (err: unknown) {
            const error = toError(err);
            throw new TransportError(`Reading the body of ${this.url} failed: ${error.message}`, error);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch (err: unknown) {
            const error = toError(err);
            throw new ResponseDecodeError(`Body of ${this.url} is not valid JSON: ${error.message}`, error);
        }
        if (!isJsonValue(parsed)) {
            throw new ResponseDecodeError(`Body of ${this.url} is not valid JSON`);
        }
        return parsed;
    }

    async discard(): Promise<void> {
        if (this.response.bodyUsed || !this.response.body) {
            return;
        }
        await this.response.body.cancel();
    }
}

export function appendQuery(url: string, query: QueryParams): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
        const values = Array.isArray(value) ? value : [value];
        for (const item of values) {
            search.append(key, String(item));
        }
    }
    const encoded = search.toString();
    if (!encoded) {
        return url;
    }
    return `${url}${url.includes('?') ? '&' : '?'}${encoded}`;
}
