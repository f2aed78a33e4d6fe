export type ErrorCode = 'CONFIG' | 'RUNTIME' | 'IO';

export class CompdbEditError extends Error {
    constructor(message: string, public readonly code: ErrorCode, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'CompdbEditError';
    }
}

/**
 * The tokenizer could not split a command string (unterminated quote or dangling escape).
 * `offset` is the UTF-8 byte offset of the construct left open.
 */
export class MalformedCommandError extends CompdbEditError {
    constructor(message: string, public readonly offset: number) {
        super(`${message} at offset ${offset}`, 'RUNTIME');
        this.name = 'MalformedCommandError';
    }
}

/** An include flag whose value cannot be determined without guessing. */
export class AmbiguousFlagError extends CompdbEditError {
    constructor(message: string, public readonly tokenIndex: number) {
        super(`${message} at token ${tokenIndex}`, 'RUNTIME');
        this.name = 'AmbiguousFlagError';
    }
}

export class InvalidEntryError extends CompdbEditError {
    constructor(message: string) {
        super(message, 'RUNTIME');
        this.name = 'InvalidEntryError';
    }
}

export class IOFailureError extends CompdbEditError {
    constructor(message: string, public readonly filePath: string, cause?: unknown) {
        super(message, 'IO', cause);
        this.name = 'IOFailureError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
