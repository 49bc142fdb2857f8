export function formatCliError(cmd: string, reason: string, hint?: string) {
    return [
        `[symphony ${cmd}]`,
        reason.trim(),
        hint ? `Hint: ${hint.trim()}` : ""
    ].filter(Boolean).join(" ");
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

class SymphonyError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
    }
}

export class ConfigError extends SymphonyError {
    readonly hint?: string;

    constructor(message: string, opts: { hint?: string; cause?: unknown } = {}) {
        super(message, opts.cause);
        this.hint = opts.hint;
    }
}

export class PromptError extends SymphonyError { }

export class ProviderError extends SymphonyError {
    readonly provider: string;
    readonly status: number | undefined;
    readonly retryable: boolean;

    constructor(
        message: string,
        opts: { provider: string; status?: number; retryable?: boolean; cause?: unknown }
    ) {
        super(message, opts.cause);
        this.provider = opts.provider;
        this.status = opts.status;
        this.retryable = opts.retryable ?? false;
    }
}

/** A model answered, but not in a shape we can use. */
export class ResponseFormatError extends SymphonyError {
    readonly issues: string[];
    readonly raw: string;

    constructor(message: string, opts: { issues?: string[]; raw?: string; cause?: unknown } = {}) {
        super(message, opts.cause);
        this.issues = opts.issues ?? [];
        this.raw = opts.raw ?? "";
    }
}

export class SchedulerError extends SymphonyError { }

export class VerificationError extends SymphonyError { }

export class SummaryValidationError extends SymphonyError {
    constructor(message: string, cause?: unknown) {
        super(message, cause);
        if (cause instanceof Error && cause.stack && !this.stack?.includes(cause.stack)) {
            this.stack += `\nCaused by: ${cause.stack}`;
        }
    }
}

export function isAbortError(err: unknown): boolean {
    return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}
