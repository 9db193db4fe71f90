/**
 * Snapshot table migrations.
 *
 * Migration style: idempotent (IF NOT EXISTS), safe to run on every start.
 */

import type { SqlClient } from "./helpers.js";

export async function runSnapshotMigrations(client: SqlClient): Promise<void> {
    await client.query(`
        CREATE TABLE IF NOT EXISTS mind_snapshots (
            id           BIGSERIAL PRIMARY KEY,
            run_id       TEXT NOT NULL,
            tick         INTEGER NOT NULL,
            status       TEXT NOT NULL,
            last_action  TEXT NULL,
            fallback     TEXT NULL,
            state        JSONB NOT NULL,
            created_at   TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
    `);

    await client.query(`CREATE INDEX IF NOT EXISTS idx_mind_snapshots_run_tick ON mind_snapshots (run_id, tick DESC)`);
}
