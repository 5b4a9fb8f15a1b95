/**
 * Pipeline error taxonomy.
 *
 * Stage errors are never swallowed: they halt the current run and surface to
 * the scheduler / CLI exit code. None of them is retried inside a stage.
 */

export type PipelineErrorKind = 'SourceUnavailable' | 'NoDataFound' | 'WriteFailure' | 'StaleConfiguration';

export type ErrorContext = Record<string, unknown>;

export interface PipelineErrorOptions {
    context?: ErrorContext;
    cause?: unknown;
}

export abstract class PipelineError extends Error {
    abstract readonly kind: PipelineErrorKind;
    readonly context: ErrorContext;
    readonly timestamp: Date;

    constructor(message: string, options: PipelineErrorOptions = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = this.constructor.name;
        this.context = options.context ?? {};
        this.timestamp = new Date();
    }

    toLogFormat(): string {
        const cause = this.cause === undefined ? '' : ` (cause: ${describeError(this.cause)})`;
        return `[${this.kind}] ${this.message}${cause}`;
    }
}

/** Upstream grid data missing or unreachable for the requested cycle. */
export class SourceUnavailable extends PipelineError {
    readonly kind = 'SourceUnavailable';
}

/** Store query for the requested cycle returned nothing. */
export class NoDataFound extends PipelineError {
    readonly kind = 'NoDataFound';
}

/** Store unreachable or a constraint violated on write. */
export class WriteFailure extends PipelineError {
    readonly kind = 'WriteFailure';
}

/** Request rejected before any I/O: unknown cycle, malformed/future date, missing setup. */
export class StaleConfiguration extends PipelineError {
    readonly kind = 'StaleConfiguration';
}

export const describeError = (err: unknown): string => {
    if (err instanceof PipelineError) return err.toLogFormat();
    if (err instanceof Error) return err.message;
    return String(err);
};

export const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));
