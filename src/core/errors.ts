/**
 * Errors surfaced to callers of the render lifecycle.
 *
 * Cancellation and resize detection are not errors: they travel as
 * `RenderOutcome` values and never reach these classes.
 */

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * An unexpected defect inside a background render (worker crash, thrown
 * exception). Carries the original failure as `cause`.
 */
export class JobFailureError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'JobFailureError';
    }

    static wrap(cause: unknown): JobFailureError {
        if (cause instanceof JobFailureError) {
            return cause;
        }
        const detail = cause instanceof Error ? cause.message : String(cause);
        return new JobFailureError(`Render job failed: ${detail}`, { cause });
    }
}
