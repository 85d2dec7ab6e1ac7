// transient: retrying may help. permanent: it will not.
export type FailureKind = 'transient' | 'permanent';

/**
 * Failure talking to the generation API.
 */
export class ProviderError extends Error {
    constructor(
        message: string,
        readonly kind: FailureKind,
        readonly status?: number,
    ) {
        super(message);
        this.name = 'ProviderError';
    }
}

/**
 * The provider answered, but not in a shape we can read.
 */
export class ResponseParseError extends ProviderError {
    constructor(message: string, status?: number) {
        super(message, 'permanent', status);
        this.name = 'ResponseParseError';
    }
}

/**
 * The request never produced an HTTP response (DNS, refused, reset, abort).
 */
export class TransportError extends Error {
    constructor(
        message: string,
        readonly timedOut: boolean,
    ) {
        super(message);
        this.name = 'TransportError';
    }
}

export function classifyHttpStatus(status: number): FailureKind {
    if (status === 408 || status === 429 || status >= 500) return 'transient';
    return 'permanent';
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Thrown by the LLM client once it has given up on a request.
 */
export class GenerationFailedError extends Error {
    constructor(
        message: string,
        readonly attempts: number,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'GenerationFailedError';
    }
}
