export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export type Logger = {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
    /** Same sink and level, nested tag: `[Parent:child]`. */
    child(tag: string): Logger;
};

/** Console-like sink, injectable so tests can capture output. */
export type LogSink = Pick<Console, "debug" | "log" | "warn" | "error">;

const RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function createLogger(tag: string, level: LogLevel = "info", sink: LogSink = console): Logger {
    const min = RANK[level];
    const prefix = `[${tag}]`;

    return {
        debug(message, ...details) {
            if (min <= RANK.debug) sink.debug(`${prefix} ${message}`, ...details);
        },
        info(message, ...details) {
            if (min <= RANK.info) sink.log(`${prefix} ${message}`, ...details);
        },
        warn(message, ...details) {
            if (min <= RANK.warn) sink.warn(`${prefix} ${message}`, ...details);
        },
        error(message, ...details) {
            if (min <= RANK.error) sink.error(`${prefix} ${message}`, ...details);
        },
        child(childTag) {
            return createLogger(`${tag}:${childTag}`, level, sink);
        },
    };
}

export const silentLogger: Logger = createLogger("mosaic", "silent");
