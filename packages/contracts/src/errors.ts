export class PipelineError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

export class ConfigurationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class ValidationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/**
 * Base class for every failure of a remote generation job.
 */
export class GenerationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export type TransportErrorDetails = {
    status?: number;
    body?: string;
};

/**
 * Connection-level failure, timeout, non-2xx submission status or unreadable body.
 * Fatal at submission and download; swallowed by the poll loop.
 */
export class TransportError extends GenerationError {
    readonly status: number | undefined;
    readonly body: string | undefined;

    constructor(message: string, details: TransportErrorDetails = {}, options?: ErrorOptions) {
        super(message, options);
        this.status = details.status;
        this.body = details.body;
    }
}

export class ServiceRejectedError extends GenerationError {
    readonly body: unknown;

    constructor(message: string, body: unknown, options?: ErrorOptions) {
        super(message, options);
        this.body = body;
    }
}

export class ServiceError extends GenerationError {
    readonly status: number;
    readonly body: string;

    constructor(status: number, body: string, options?: ErrorOptions) {
        super(`Music service returned HTTP ${status} while polling: ${body}`, options);
        this.status = status;
        this.body = body;
    }
}

export class ProtocolError extends GenerationError {
    readonly body: string;

    constructor(message: string, body: string, options?: ErrorOptions) {
        super(message, options);
        this.body = body;
    }
}

export class JobFailedError extends GenerationError {
    readonly handle: string;
    readonly clip: Record<string, unknown>;

    constructor(handle: string, clip: Record<string, unknown>, options?: ErrorOptions) {
        super(`Generation job ${handle} failed: ${JSON.stringify(clip)}`, options);
        this.handle = handle;
        this.clip = clip;
    }
}

export class PollTimeoutError extends GenerationError {
    readonly handle: string;
    readonly elapsedMs: number;
    readonly maxWaitMs: number;

    constructor(handle: string, elapsedMs: number, maxWaitMs: number, options?: ErrorOptions) {
        super(
            `Timed out waiting for generation job ${handle} (waited ${Math.round(elapsedMs / 1000)}s, limit ${Math.round(maxWaitMs / 1000)}s)`,
            options,
        );
        this.handle = handle;
        this.elapsedMs = elapsedMs;
        this.maxWaitMs = maxWaitMs;
    }
}

export class MissingArtifactError extends GenerationError {
    readonly clip: Record<string, unknown>;

    constructor(clip: Record<string, unknown>, options?: ErrorOptions) {
        super(`Clip has no audio_url: ${JSON.stringify(clip)}`, options);
        this.clip = clip;
    }
}
