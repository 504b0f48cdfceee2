/**
 * Error classes for restwire clients.
 *
 * - RouteDefinitionError: a client method is declared wrong (raised while the class is defined)
 * - ApiError: any failed API call; NotFoundError narrows it to HTTP 404
 * - SerializationError: a value does not match the type it is dumped or loaded as
 */

/**
 * ApiError - Base error for failed API calls.
 *
 * `statusCode` is set when the failure came from an HTTP response; `cause`
 * keeps the underlying error (transport failure, bad JSON, ...).
 */
export class ApiError extends Error {
    public readonly statusCode?: number;

    constructor(message: string, cause?: Error, statusCode?: number) {
        super(message, cause ? { cause } : undefined);
        this.name = 'ApiError';
        this.statusCode = statusCode;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * NotFoundError - HTTP 404. Registered for every verb by default.
 */
export class NotFoundError extends ApiError {
    constructor(message = 'Not Found', cause?: Error) {
        super(message, cause, 404);
        this.name = 'NotFoundError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * RouteDefinitionError - A client method's route declaration is invalid,
 * e.g. its URL template names a parameter the method does not have.
 */
export class RouteDefinitionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'RouteDefinitionError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * SerializationError - A value does not fit the type it is converted to or from.
 * `path` points at the offending value, `$` being the root.
 */
export class SerializationError extends Error {
    constructor(message: string, public readonly path = '$') {
        super(`${message} (at ${path})`);
        this.name = 'SerializationError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}
