/**
 * Environment-driven configuration for the kernel runner.
 *
 * Unset variables fall through to the zod defaults in validation.ts, so an
 * empty environment yields the documented default kernel.
 */

import { parseKernelConfig, type KernelConfig } from "./validation.js";

type Env = Record<string, string | undefined>;

function optionalAny(env: Env, keys: string[], fallback: string): string {
    for (const key of keys) {
        const value = env[key];
        if (value) return value;
    }
    return fallback;
}

function optionalBool(env: Env, key: string, fallback: boolean): boolean {
    const raw = env[key];
    if (raw == null || raw === "") return fallback;
    return raw.toLowerCase() === "true" || raw === "1";
}

function optionalInt(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (!raw) return fallback;
    const value = Number.parseInt(raw, 10);
    return Number.isFinite(value) ? value : fallback;
}

/** Raw number or undefined, so the schema default applies */
function maybeNumber(env: Env, key: string): number | undefined {
    const raw = env[key];
    if (!raw) return undefined;
    const value = Number(raw);
    return Number.isFinite(value) ? value : undefined;
}

function maybeBool(env: Env, key: string): boolean | undefined {
    const raw = env[key];
    if (raw == null || raw === "") return undefined;
    return optionalBool(env, key, false);
}

export interface RuntimeConfig {
    logLevel: string;
    logFormat: "text" | "json";
    /** 0 runs until interrupted */
    maxTicks: number;
    tickIntervalMs: number;
    /** Log the formatted MindState every N ticks; 0 disables */
    printEvery: number;

    // PostgreSQL snapshot store; disabled when neither URL nor host is set
    databaseUrl: string;
    pgHost: string;
    pgPort: number;
    pgUser: string;
    pgPassword: string;
    pgDatabase: string;
    pgSsl: boolean;
    pgPoolMax: number;
    maxSnapshots: number;
}

export interface AppConfig {
    kernel: KernelConfig;
    runtime: RuntimeConfig;
}

export function loadConfigFromEnv(env: Env = process.env): AppConfig {
    const viewRadius = maybeNumber(env, "VIEW_RADIUS");
    const kernel = parseKernelConfig({
        seed: maybeNumber(env, "SEED"),
        grid: {
            rows: maybeNumber(env, "GRID_ROWS"),
            cols: maybeNumber(env, "GRID_COLS"),
            objectCount: maybeNumber(env, "OBJECT_COUNT"),
            // Optional without a default: leave the key out entirely when unset
            ...(viewRadius === undefined ? {} : { viewRadius }),
        },
        workingMemory: {
            capacity: maybeNumber(env, "WM_CAPACITY"),
        },
        episodic: {
            maxRecords: maybeNumber(env, "EPISODIC_MAX_RECORDS"),
        },
        semantic: {
            initialConfidence: maybeNumber(env, "INITIAL_CONFIDENCE"),
            confidenceIncrement: maybeNumber(env, "CONFIDENCE_INCREMENT"),
            maxHammingDistance: maybeNumber(env, "MAX_HAMMING_DISTANCE"),
        },
        grounding: {
            minConfidence: maybeNumber(env, "MIN_CONFIDENCE"),
            rotationInvariant: maybeBool(env, "ROTATION_INVARIANT"),
            ambiguityPolicy: env.AMBIGUITY_POLICY || undefined,
            decayPerTick: maybeNumber(env, "DECAY_PER_TICK"),
            trajectoryWindow: maybeNumber(env, "TRAJECTORY_WINDOW"),
        },
        affect: {
            noveltyThreshold: maybeNumber(env, "NOVELTY_THRESHOLD"),
            boredomWindow: maybeNumber(env, "BOREDOM_WINDOW"),
            boredomIncrement: maybeNumber(env, "BOREDOM_INCREMENT"),
            curiosityThreshold: maybeNumber(env, "CURIOSITY_THRESHOLD"),
        },
    });

    const runtime: RuntimeConfig = {
        logLevel: optionalAny(env, ["LOG_LEVEL"], "info"),
        logFormat: optionalAny(env, ["LOG_FORMAT"], "text") === "json" ? "json" : "text",
        maxTicks: optionalInt(env, "MAX_TICKS", 100),
        tickIntervalMs: optionalInt(env, "TICK_INTERVAL_MS", 0),
        printEvery: optionalInt(env, "PRINT_EVERY", 10),

        databaseUrl: optionalAny(env, ["DATABASE_URL"], ""),
        pgHost: optionalAny(env, ["PGHOST"], ""),
        pgPort: optionalInt(env, "PGPORT", 5432),
        pgUser: optionalAny(env, ["PGUSER"], ""),
        pgPassword: optionalAny(env, ["PGPASSWORD"], ""),
        pgDatabase: optionalAny(env, ["PGDATABASE"], ""),
        pgSsl: optionalBool(env, "PG_SSL", false),
        pgPoolMax: optionalInt(env, "PG_POOL_MAX", 10),
        maxSnapshots: optionalInt(env, "MAX_SNAPSHOTS", 1000),
    };

    return { kernel, runtime };
}
