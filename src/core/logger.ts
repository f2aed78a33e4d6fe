export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

export class NullLogger implements Logger {
    debug(): void {}
    info(): void {}
    warn(): void {}
    error(): void {}
}

export function createStreamLogger(stream: { write(chunk: string): void }): Logger {
    const line = (level: string) => (message: string, meta?: Record<string, unknown>) =>
        stream.write(`[${level}] ${message}${meta ? ` ${JSON.stringify(meta)}` : ''}\n`);
    return {
        debug: line('debug'),
        info: line('info'),
        warn: line('warn'),
        error: line('error')
    };
}
