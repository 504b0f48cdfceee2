import { RouteDescriptor } from './RouteDescriptor';

/**
 * What a decorated method calls on `this`. BaseClient in
 * @restwire/http-client implements it; keeping the interface here lets the
 * decorators stay free of any transport code.
 */
export interface RouteInvoker {
    invokeRoute(route: RouteDescriptor, args: readonly unknown[]): Promise<unknown>;
}

export function isRouteInvoker(value: unknown): value is RouteInvoker {
    return (
        typeof value === 'object' &&
        value !== null &&
        'invokeRoute' in value &&
        typeof value.invokeRoute === 'function'
    );
}
