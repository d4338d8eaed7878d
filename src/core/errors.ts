/**
 * Core error hierarchy for key-cli.
 *
 * All errors extend AppError and carry a machine-readable code
 * plus optional structured context for debugging.
 *
 * Dependency direction: errors.ts → nothing (leaf module)
 * Used by: every layer in the application
 */

/** Plain-object form of an AppError, used when rendering outcomes. */
export interface AppErrorJSON {
    readonly name: string;
    readonly code: string;
    readonly message: string;
    readonly context?: Record<string, unknown>;
}

/** Base application error with structured metadata. */
export class AppError extends Error {
    public readonly code: string;
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, context?: Record<string, unknown>) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.context = context;

        // Maintains proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    toJSON(): AppErrorJSON {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            ...(this.context ? { context: this.context } : {}),
        };
    }
}

/** Raised when configuration is missing, invalid, or cannot be loaded/saved. */
export class ConfigError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONFIG_ERROR', context);
        this.name = 'ConfigError';
    }
}

/** How an SDK request failed. */
export type ClientErrorKind =
    | 'InvalidRequest'
    | 'CommunicationError'
    | 'InvalidResponsePayload'
    | 'UnexpectedResponse';

/**
 * Failure value returned (not thrown) by a request builder's `send()`.
 * `status` is set whenever the server answered.
 */
export class ClientError extends AppError {
    public readonly kind: ClientErrorKind;
    public readonly status?: number;

    constructor(
        kind: ClientErrorKind,
        message: string,
        options?: { status?: number; context?: Record<string, unknown> },
    ) {
        super(message, 'CLIENT_ERROR', options?.context);
        this.name = 'ClientError';
        this.kind = kind;
        this.status = options?.status;
    }

    override toJSON(): AppErrorJSON & { kind: ClientErrorKind; status?: number } {
        return {
            ...super.toJSON(),
            kind: this.kind,
            ...(this.status !== undefined ? { status: this.status } : {}),
        };
    }
}

/** Raised when an override hook rejects the request it was handed. */
export class OverrideError extends AppError {
    public readonly command: string;
    public readonly reason: string;

    constructor(command: string, reason: string) {
        super(`Override for "${command}" failed: ${reason}`, 'OVERRIDE_ERROR', { command, reason });
        this.name = 'OverrideError';
        this.command = command;
        this.reason = reason;
    }
}

/** Raised when user input or a parsed value fails validation. */
export class ValidationError extends AppError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', context);
        this.name = 'ValidationError';
    }
}
