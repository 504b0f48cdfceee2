import { ApiError, HttpMethod } from '@restwire/http-api';
import { TransportResponse } from './Transport';

/**
 * Turns a failed response into a thrown error. Handlers never return a value.
 */
export type ErrorHandler = (response: TransportResponse) => never | Promise<never>;

/** A verb, or '' for "any verb". */
export type HandlerVerb = HttpMethod | '';

/**
 * ErrorRouter - Maps (verb, status code) pairs to error handlers.
 *
 * Lookup order for a failed response:
 * 1. the handler registered for exactly (verb, status)
 * 2. the wildcard handler registered for ('', status)
 * 3. a plain ApiError describing the response
 *
 * Each client owns one router. Registering while requests are in flight on
 * a shared client is up to the caller to coordinate.
 */
export class ErrorRouter {
    private readonly exact = new Map<string, ErrorHandler>();
    private readonly wildcard = new Map<number, ErrorHandler>();

    register(verb: HandlerVerb, status: number, handler: ErrorHandler): void {
        if (verb === '') {
            this.wildcard.set(status, handler);
        } else {
            this.exact.set(exactKey(verb, status), handler);
        }
    }

    /**
     * @returns whether a handler was registered
     */
    unregister(verb: HandlerVerb, status: number): boolean {
        if (verb === '') {
            return this.wildcard.delete(status);
        }
        return this.exact.delete(exactKey(verb, status));
    }

    lookup(verb: HttpMethod, status: number): ErrorHandler | undefined {
        return this.exact.get(exactKey(verb, status)) ?? this.wildcard.get(status);
    }

    async handle(verb: HttpMethod, response: TransportResponse): Promise<never> {
        const handler = this.lookup(verb, response.status);
        if (handler) {
            await handler(response);
        }
        // no handler, or one that returned instead of throwing
        throw new ApiError(describeResponse(response), undefined, response.status);
    }
}

export function describeResponse(response: TransportResponse): string {
    return response.statusText
        ? `HTTP ${response.status}: ${response.statusText}`
        : `HTTP ${response.status}`;
}

function exactKey(verb: HttpMethod, status: number): string {
    return `${verb} ${status}`;
}
