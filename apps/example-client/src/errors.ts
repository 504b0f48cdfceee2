import { ApiError, describeResponse, TransportResponse } from '@restwire/http-client';

/**
 * The API key was missing or rejected (any verb).
 */
export class UnauthorizedError extends ApiError {
    constructor(message = 'Unauthorized') {
        super(message, undefined, 401);
        this.name = 'UnauthorizedError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * DELETE refused because the pet still has open orders.
 */
export class PetInUseError extends ApiError {
    constructor(message: string) {
        super(message, undefined, 409);
        this.name = 'PetInUseError';
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

export function throwUnauthorized(response: TransportResponse): never {
    throw new UnauthorizedError(describeResponse(response));
}

export function throwPetInUse(response: TransportResponse): never {
    throw new PetInUseError(`Pet at ${response.url} still has open orders`);
}
