import { ApiError } from '@restwire/http-api';
import { toError } from '@restwire/core-util';
import { TransportRequest } from './Transport';

/**
 * LogApiCall - Logs each client call around its execution.
 *
 * Logging format patterns:
 * - [API-CLIENT-req] PetStoreClient.getPet GET http://host/pets/7 query={...} body={...}
 * - [API-CLIENT-resp-SUCCESS] PetStoreClient.getPet response={...}
 * - [API-CLIENT-resp-OTHER] PetStoreClient.getPet errorType=NotFoundError  (4xx)
 * - [API-CLIENT-resp-FAIL] PetStoreClient.getPet errorType=ApiError error=...  (everything else)
 *
 * Errors are always rethrown unchanged.
 */
export class LogApiCall {
    constructor(private readonly enabled: boolean = true) {}

    /**
     * Runs `prepare` then `call` with the request it built. A failure in
     * either one is logged the same way.
     */
    async execute<T>(
        label: string,
        prepare: () => TransportRequest,
        call: (request: TransportRequest) => Promise<T>,
    ): Promise<T> {
        try {
            const request = prepare();
            if (this.enabled) {
                console.log(
                    `[API-CLIENT-req] ${label} ${request.method} ${request.url} query=${JSON.stringify(request.query)} body=${JSON.stringify(request.body)}`,
                );
            }
            const response = await call(request);
            if (this.enabled) {
                console.log(`[API-CLIENT-resp-SUCCESS] ${label} response=${JSON.stringify(response)}`);
            }
            return response;
        } catch (err: unknown) {
            const error = toError(err);
            if (this.enabled) {
                this.logFailure(label, error);
            }
            throw error;
        }
    }

    /**
     * Detail line for failures the client translates (connection, decoding).
     */
    logError(message: string): void {
        if (this.enabled) {
            console.error(message);
        }
    }

    /**
     * 4xx responses are the caller's mistake (or an expected miss), not a
     * failure of the remote service.
     */
    static isUserError(error: Error): boolean {
        return (
            error instanceof ApiError &&
            error.statusCode !== undefined &&
            error.statusCode >= 400 &&
            error.statusCode < 500
        );
    }

    private logFailure(label: string, error: Error): void {
        const errorType = error.constructor.name;
        if (LogApiCall.isUserError(error)) {
            console.log(`[API-CLIENT-resp-OTHER] ${label} errorType=${errorType}`);
        } else {
            console.error(`[API-CLIENT-resp-FAIL] ${label} errorType=${errorType} error=${error.message}`);
        }
    }
}
