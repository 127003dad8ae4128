/**
 * Errors that end the process. Each carries the exit code the CLI reports.
 */
export class StatusBarError extends Error {
    constructor(
        message: string,
        readonly exitCode: number,
    ) {
        super(message);
        this.name = new.target.name;
    }
}

/** Bad arguments on the command line. */
export class UsageError extends StatusBarError {
    constructor(message: string) {
        super(message, 2);
    }
}

/** Duplicate or unknown monitor ids, invalid monitor params, bad user config. */
export class ConfigError extends StatusBarError {
    constructor(message: string) {
        super(message, 2);
    }
}

export class FatalError extends StatusBarError {
    constructor(message: string) {
        super(message, 1);
    }
}

export class PublishError extends FatalError {
    constructor(message: string, cause?: unknown) {
        super(message);
        this.cause = cause;
    }
}

export function exitCodeOf(err: unknown): number {
    return err instanceof StatusBarError ? err.exitCode : 1;
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
