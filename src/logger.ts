export interface Logger {
    debug: (...args: unknown[]) => void;
    info: (...args: unknown[]) => void;
    warn: (...args: unknown[]) => void;
    error: (...args: unknown[]) => void;
}

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LoggerOptions {
    level?: string;
    /** Output JSON lines instead of human-readable text. Default: false */
    json?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function normalizeLevel(level: string | undefined): LogLevel {
    switch (level?.toLowerCase()) {
        case "debug": return "debug";
        case "warn": return "warn";
        case "error": return "error";
        case "silent": return "silent";
        default: return "info";
    }
}

export function createLogger(levelOrOpts: string | LoggerOptions): Logger {
    const opts = typeof levelOrOpts === "string"
        ? { level: levelOrOpts, json: undefined }
        : levelOrOpts;
    const threshold = LEVEL_RANK[normalizeLevel(opts.level)];
    const enabled = (level: LogLevel) => LEVEL_RANK[level] >= threshold;
    const json = opts.json ?? (process.env.LOG_FORMAT === "json");

    if (json) {
        return createJsonLogger(enabled);
    }

    return {
        debug: (...args: unknown[]) => {
            if (!enabled("debug")) return;
            console.debug(`[${new Date().toISOString()}] [DEBUG]`, ...args);
        },
        info: (...args: unknown[]) => {
            if (!enabled("info")) return;
            console.log(`[${new Date().toISOString()}] [INFO]`, ...args);
        },
        warn: (...args: unknown[]) => {
            if (!enabled("warn")) return;
            console.warn(`[${new Date().toISOString()}] [WARN]`, ...args);
        },
        error: (...args: unknown[]) => {
            if (!enabled("error")) return;
            console.error(`[${new Date().toISOString()}] [ERROR]`, ...args);
        },
    };
}

/** Logger that drops everything; used by tests and embedded kernels */
export const silentLogger: Logger = createLogger("silent");

/** JSON structured logger — one JSON object per line */
function createJsonLogger(enabled: (level: LogLevel) => boolean): Logger {
    const emit = (level: LogLevel, args: unknown[]) => {
        if (!enabled(level)) return;
        const msg = args.map(a =>
            typeof a === "string" ? a : JSON.stringify(a)
        ).join(" ");
        const entry: Record<string, unknown> = {
            ts: new Date().toISOString(),
            level,
            msg,
        };

        // Messages are prefixed "[tick N]" by the kernel
        const tickMatch = msg.match(/\[tick (\d+)\]/);
        if (tickMatch) {
            entry.tick = Number.parseInt(tickMatch[1], 10);
        }

        const line = JSON.stringify(entry);
        if (level === "error") {
            process.stderr.write(line + "\n");
        } else {
            process.stdout.write(line + "\n");
        }
    };

    return {
        debug: (...args: unknown[]) => emit("debug", args),
        info: (...args: unknown[]) => emit("info", args),
        warn: (...args: unknown[]) => emit("warn", args),
        error: (...args: unknown[]) => emit("error", args),
    };
}
