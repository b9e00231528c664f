/**
 * Pipeline error taxonomy
 *
 * Fatal errors halt the batch controller; per-file errors are recorded in
 * the run ledger and the run moves on to the next candidate.
 */

import type { ProcessResult } from './types';

export enum PipelineErrorCode {
    // Fatal: the run halts
    SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
    DISK_EXHAUSTED = 'DISK_EXHAUSTED',
    SCRATCH_PURGE_FAILED = 'SCRATCH_PURGE_FAILED',

    // Stop requested by the operator
    RUN_CANCELLED = 'RUN_CANCELLED',

    // Per-file: recorded, run continues
    FETCH_FAILED = 'FETCH_FAILED',
    TRANSCRIPTION_FAILED = 'TRANSCRIPTION_FAILED',
    WRITE_FAILED = 'WRITE_FAILED',

    // Startup
    CONFIG_INVALID = 'CONFIG_INVALID',

    // Unexpected failure outside the per-file boundary: the run halts
    INTERNAL = 'INTERNAL',
}

export interface PipelineErrorContext {
    /** Candidate path the error relates to */
    file?: string;
    operation?: string;
    metadata?: Record<string, unknown>;
}

export interface PipelineErrorOptions {
    message: string;
    code: PipelineErrorCode;
    fatal?: boolean;
    context?: PipelineErrorContext;
    cause?: unknown;
}

/**
 * Base class for every error the pipeline raises on purpose
 */
export class PipelineError extends Error {
    readonly code: PipelineErrorCode;
    readonly fatal: boolean;
    readonly context: PipelineErrorContext;

    constructor(options: PipelineErrorOptions) {
        super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = this.constructor.name;
        this.code = options.code;
        this.fatal = options.fatal ?? false;
        this.context = options.context ?? {};

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            fatal: this.fatal,
            context: this.context,
            cause: this.cause instanceof Error ? this.cause.message : this.cause,
        };
    }
}

type ErrorInit = Omit<PipelineErrorOptions, 'code' | 'fatal' | 'message'>;

export class SourceUnavailableError extends PipelineError {
    constructor(message: string, init: ErrorInit = {}) {
        super({ ...init, message, code: PipelineErrorCode.SOURCE_UNAVAILABLE, fatal: true });
    }
}

export class DiskExhaustedError extends PipelineError {
    constructor(message: string, init: ErrorInit = {}) {
        super({ ...init, message, code: PipelineErrorCode.DISK_EXHAUSTED, fatal: true });
    }
}

export class ScratchPurgeError extends PipelineError {
    /** Outcome of the file whose copy could not be removed, when it got that far */
    readonly attempt?: ProcessResult;

    constructor(message: string, init: ErrorInit = {}, attempt?: ProcessResult) {
        super({ ...init, message, code: PipelineErrorCode.SCRATCH_PURGE_FAILED, fatal: true });
        this.attempt = attempt;
    }
}

export class RunCancelledError extends PipelineError {
    constructor(message = 'Run cancelled', init: ErrorInit = {}) {
        super({ ...init, message, code: PipelineErrorCode.RUN_CANCELLED, fatal: false });
    }
}

export class FetchError extends PipelineError {
    constructor(message: string, init: ErrorInit = {}) {
        super({ ...init, message, code: PipelineErrorCode.FETCH_FAILED });
    }
}

export class TranscriptionError extends PipelineError {
    constructor(message: string, init: ErrorInit = {}) {
        super({ ...init, message, code: PipelineErrorCode.TRANSCRIPTION_FAILED });
    }
}

export class WriteError extends PipelineError {
    constructor(message: string, init: ErrorInit = {}) {
        super({ ...init, message, code: PipelineErrorCode.WRITE_FAILED });
    }
}

export class ConfigError extends PipelineError {
    constructor(message: string, init: ErrorInit = {}) {
        super({ ...init, message, code: PipelineErrorCode.CONFIG_INVALID, fatal: true });
    }
}

export function isPipelineError(error: unknown): error is PipelineError {
    return error instanceof PipelineError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

/**
 * Keep pipeline errors as they are; wrap anything else with the given factory
 * so the original is kept as `cause`.
 */
export function toPipelineError(
    error: unknown,
    wrap: (message: string, init: ErrorInit) => PipelineError
): PipelineError {
    if (isPipelineError(error)) return error;
    return wrap(errorMessage(error), { cause: error });
}
