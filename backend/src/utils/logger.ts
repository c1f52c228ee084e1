export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    isLevelEnabled: (level: Exclude<LogLevel, "silent">) => boolean;
    child: (scope: string) => Logger;
}

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

const isLogLevel = (value: string): value is LogLevel =>
    Object.prototype.hasOwnProperty.call(LOG_LEVEL_RANK, value);

/**
 * Read on every call so a test or a reloaded `.env` can change verbosity
 * without rebuilding loggers. Unknown values silence output.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const configured = env.LOG_LEVEL?.trim().toLowerCase();
    if (!configured) {
        if (env.NODE_ENV === "test") {
            return "silent";
        }
        return env.NODE_ENV === "production" ? "warn" : "debug";
    }
    return isLogLevel(configured) ? configured : "silent";
}

function isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
    return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[resolveLogLevel()];
}

function isContextObject(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Error)
    );
}

function serializeError(value: unknown): unknown {
    if (!(value instanceof Error)) {
        return value;
    }
    return {
        name: value.name,
        message: value.message,
        stack: value.stack,
    };
}

function prepareArgs(args: unknown[]): unknown[] {
    const [first, ...rest] = args;
    if (args.length > 0 && isContextObject(first)) {
        const context: LogContext = {};
        for (const [key, value] of Object.entries(first)) {
            context[key] = serializeError(value);
        }
        return [context, ...rest.map(serializeError)];
    }
    return args.map(serializeError);
}

const CONSOLE_METHODS: Record<
    Exclude<LogLevel, "silent">,
    (...data: unknown[]) => void
> = {
    debug: (...data) => console.debug(...data),
    info: (...data) => console.info(...data),
    warn: (...data) => console.warn(...data),
    error: (...data) => console.error(...data),
};

function write(
    level: Exclude<LogLevel, "silent">,
    scope: string | null,
    message: string,
    args: unknown[],
): void {
    if (!isLevelEnabled(level)) {
        return;
    }
    const tag = `[${level.toUpperCase()}]`;
    const line = scope ? `${tag} [${scope}] ${message}` : `${tag} ${message}`;
    CONSOLE_METHODS[level](line, ...prepareArgs(args));
}

export function createLogger(scope?: string): Logger {
    const scoped = scope?.trim() || null;

    return {
        debug: (message, ...args) => write("debug", scoped, message, args),
        info: (message, ...args) => write("info", scoped, message, args),
        warn: (message, ...args) => write("warn", scoped, message, args),
        error: (message, ...args) => write("error", scoped, message, args),
        isLevelEnabled,
        child: (childScope) => {
            const trimmed = childScope.trim();
            return createLogger(scoped ? `${scoped}.${trimmed}` : trimmed);
        },
    };
}

/** Runs a synchronous scoring step and records its duration at debug level. */
export function withLogTiming<T>(
    loggerInstance: Logger,
    operation: string,
    run: () => T,
    context: LogContext = {},
): T {
    const startedAt = Date.now();
    try {
        const result = run();
        loggerInstance.debug(`${operation} completed`, {
            ...context,
            durationMs: Date.now() - startedAt,
        });
        return result;
    } catch (error) {
        loggerInstance.error(`${operation} failed`, {
            ...context,
            durationMs: Date.now() - startedAt,
            error,
        });
        throw error;
    }
}

export function logErrorWithContext(
    loggerInstance: Logger,
    message: string,
    error: unknown,
    context: LogContext = {},
): void {
    loggerInstance.error(message, { ...context, error });
}

export const logger = createLogger("mixflow");
