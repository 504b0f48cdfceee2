import { FetchTransport } from './FetchTransport';
import { Transport } from './Transport';

/**
 * Configuration options for a client.
 */
export class ClientConfig {
    /** Base URL for all requests (e.g., 'https://pets.example.com/v1'); trailing slashes are dropped */
    baseUrl: string;

    /** Executes the HTTP requests. Defaults to a FetchTransport without timeout. */
    transport: Transport;

    /**
     * Whether to log requests and responses through LogApiCall.
     * Default: true
     */
    loggingEnabled: boolean;

    constructor(baseUrl: string, transport: Transport = new FetchTransport(), loggingEnabled: boolean = true) {
        this.baseUrl = baseUrl;
        this.transport = transport;
        this.loggingEnabled = loggingEnabled;
    }
}
