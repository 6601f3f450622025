/**
 * Any failed call to the Resy API: network failure, timeout, or a response we
 * could not use. Always recoverable.
 */
export class RemoteCallError extends Error {
    public readonly operation: string;

    constructor(message: string, operation: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "RemoteCallError";
        this.operation = operation;

        // Ensure proper prototype chain for instanceOf checks
        Object.setPrototypeOf(this, RemoteCallError.prototype);
    }
}

/**
 * Non-2xx response from the Resy API
 */
export class ResyAPIError extends RemoteCallError {
    public readonly status: number;
    public readonly code?: number;
    public readonly rawBody?: string;  // Full response body for logging

    constructor(message: string, operation: string, status: number, code?: number, rawBody?: string) {
        super(message, operation);
        this.name = "ResyAPIError";
        this.status = status;
        this.code = code;
        this.rawBody = rawBody;

        Object.setPrototypeOf(this, ResyAPIError.prototype);
    }
}
