/**
 * Error normalization for catch blocks.
 *
 * Anything can be thrown in JavaScript. Every catch block in restwire runs the
 * caught value through toError() before it inspects, logs or rethrows it:
 *
 * ```typescript
 * try {
 *     await transport.send(request);
 * } catch (err: unknown) {
 *     const error = toError(err);
 *     console.error(`send failed: ${error.message}`);
 *     throw error;
 * }
 * ```
 *
 * Error instances (and subclasses) are returned untouched so `instanceof`
 * checks keep working after normalization.
 */
export function toError(err: unknown): Error {
    if (err instanceof Error) {
        return err;
    }

    if (err !== null && typeof err === 'object') {
        return fromObject(err);
    }

    if (err === null || err === undefined) {
        return new Error('Null or undefined thrown');
    }
    return new Error(String(err));
}

function fromObject(err: object): Error {
    if ('message' in err) {
        const error = new Error(String(err.message));
        if ('stack' in err && typeof err.stack === 'string') {
            error.stack = err.stack;
        }
        if ('name' in err && typeof err.name === 'string') {
            error.name = err.name;
        }
        return error;
    }

    let serialized: string | undefined;
    try {
        serialized = JSON.stringify(err);
    } catch (stringifyErr: unknown) {
        // circular structures; recursing into toError here could loop
        return new Error('Non-Error object thrown (unable to stringify)', { cause: stringifyErr });
    }
    if (serialized === undefined) {
        return new Error('Non-Error object thrown (unable to stringify)');
    }
    return new Error(`Non-Error object thrown: ${serialized}`);
}
