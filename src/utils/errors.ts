/**
 * Failure of an outbound dependency: the completion backend, the private
 * index, or a web search provider.
 */
export class ProviderError extends Error {
    constructor(
        readonly provider: string,
        message: string,
        readonly cause?: unknown,
    ) {
        super(message);
        this.name = 'ProviderError';
    }
}

/** The provider refused the call because it was made too soon. */
export class RateLimitedError extends ProviderError {
    constructor(provider: string, message: string, cause?: unknown) {
        super(provider, message, cause);
        this.name = 'RateLimitedError';
    }
}

export type StoreOperation = 'read' | 'write' | 'clear';

/** The chat history store could not be reached or rejected the statement. */
export class StoreFailure extends Error {
    constructor(
        readonly operation: StoreOperation,
        message: string,
        readonly cause?: unknown,
    ) {
        super(message);
        this.name = 'StoreFailure';
    }
}

/** Raised between graph stages once the caller's signal has fired. */
export class InvocationAbortedError extends Error {
    constructor(readonly stage: string) {
        super(`Invocation aborted before stage "${stage}"`);
        this.name = 'InvocationAbortedError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
