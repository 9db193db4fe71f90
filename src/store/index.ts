/**
 * Snapshot store — PostgreSQL connection setup and public exports.
 *
 * Internal sub-modules:
 *   - snapshots.ts   — SnapshotSink implementations (pg, in-memory)
 *   - migrations.ts  — schema migrations
 *   - helpers.ts     — SqlClient seam + row mappers
 */

import { Pool, type PoolConfig } from "pg";
import { ConfigError } from "../errors/index.js";
import type { SqlClient } from "./helpers.js";

export { PgSnapshotStore, MemorySnapshotStore } from "./snapshots.js";
export type { SnapshotSink, PgSnapshotStoreOptions } from "./snapshots.js";
export type { SqlClient, SnapshotRecord } from "./helpers.js";

export interface PgConnectionConfig {
    databaseUrl: string;
    pgHost: string;
    pgPort: number;
    pgUser: string;
    pgPassword: string;
    pgDatabase: string;
    pgSsl: boolean;
    pgPoolMax: number;
}

/** True when either DATABASE_URL or PGHOST is configured */
export function hasPgConfig(config: PgConnectionConfig): boolean {
    return Boolean(config.databaseUrl || config.pgHost);
}

export function buildPoolConfig(config: PgConnectionConfig): PoolConfig {
    const poolConfig: PoolConfig = {
        max: config.pgPoolMax,
    };

    if (config.databaseUrl) {
        poolConfig.connectionString = config.databaseUrl;
    } else {
        if (!config.pgHost || !config.pgUser || !config.pgDatabase) {
            throw new ConfigError([
                "Postgres config missing: set DATABASE_URL or PGHOST/PGUSER/PGDATABASE",
            ]);
        }
        poolConfig.host = config.pgHost;
        poolConfig.port = config.pgPort;
        poolConfig.user = config.pgUser;
        poolConfig.password = config.pgPassword;
        poolConfig.database = config.pgDatabase;
    }

    if (config.pgSsl) {
        poolConfig.ssl = { rejectUnauthorized: false };
    }

    return poolConfig;
}

export interface PgClient extends SqlClient {
    close(): Promise<void>;
}

/** Pool-backed SqlClient; close() ends the pool */
export function createPgClient(config: PgConnectionConfig): PgClient {
    const pool = new Pool(buildPoolConfig(config));
    return {
        async query(text: string, values?: unknown[]) {
            const result = await pool.query(text, values);
            return { rows: result.rows };
        },
        async close() {
            await pool.end();
        },
    };
}
