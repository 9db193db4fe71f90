/**
 * Snapshot sinks — where the runner sends each tick's MindState.
 *
 *   PgSnapshotStore      one row per tick in mind_snapshots, trimmed per run
 *   MemorySnapshotStore  bounded in-process list, for tests and dry runs
 */

import { KernelError } from "../errors/index.js";
import { serializeMindState, type MindState } from "../kernel/mindState.js";
import { mapSnapshotRow, type SnapshotRecord, type SqlClient } from "./helpers.js";
import { runSnapshotMigrations } from "./migrations.js";

export interface SnapshotSink {
    save(state: MindState): Promise<void>;
}

export interface PgSnapshotStoreOptions {
    /** Groups the snapshots of one kernel run */
    runId: string;
    /** Rows kept per run; older ones are deleted after each insert */
    maxSnapshots: number;
}

export class PgSnapshotStore implements SnapshotSink {
    constructor(
        private readonly client: SqlClient,
        private readonly opts: PgSnapshotStoreOptions,
    ) {
        if (!Number.isInteger(opts.maxSnapshots) || opts.maxSnapshots < 1) {
            throw new KernelError(`maxSnapshots must be a positive integer, got ${opts.maxSnapshots}`, {
                code: "INVALID_CONFIG",
            });
        }
    }

    async init(): Promise<void> {
        await runSnapshotMigrations(this.client);
    }

    async save(state: MindState): Promise<void> {
        await this.client.query(
            `
            INSERT INTO mind_snapshots (run_id, tick, status, last_action, fallback, state)
            VALUES ($1, $2, $3, $4, $5, $6::jsonb)
            `,
            [
                this.opts.runId,
                state.tick,
                state.status,
                state.lastAction,
                state.fallback?.code ?? null,
                serializeMindState(state, 0),
            ],
        );

        // Trim old snapshots
        await this.client.query(
            `
            DELETE FROM mind_snapshots
            WHERE id IN (
                SELECT id FROM mind_snapshots WHERE run_id = $1
                ORDER BY tick DESC, id DESC OFFSET $2
            )
            `,
            [this.opts.runId, this.opts.maxSnapshots],
        );
    }

    async listRecent(limit: number): Promise<SnapshotRecord[]> {
        const result = await this.client.query(
            `SELECT id, run_id, tick, state, created_at FROM mind_snapshots WHERE run_id = $1 ORDER BY tick DESC, id DESC LIMIT $2`,
            [this.opts.runId, limit],
        );
        return result.rows.map(mapSnapshotRow);
    }

    async latest(): Promise<SnapshotRecord | null> {
        const [row] = await this.listRecent(1);
        return row ?? null;
    }
}

export class MemorySnapshotStore implements SnapshotSink {
    private readonly states: MindState[] = [];

    constructor(private readonly maxSnapshots = 1000) { }

    async save(state: MindState): Promise<void> {
        this.states.push(state);
        if (this.states.length > this.maxSnapshots) {
            this.states.splice(0, this.states.length - this.maxSnapshots);
        }
    }

    /** Oldest first */
    all(): readonly MindState[] {
        return this.states;
    }

    latest(): MindState | undefined {
        return this.states[this.states.length - 1];
    }

    get size(): number {
        return this.states.length;
    }
}
