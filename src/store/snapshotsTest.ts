import assert from "node:assert/strict";
import { ConfigError, KernelError } from "../errors/index.js";
import { MindKernel } from "../kernel/kernel.js";
import { parseMindStateSnapshot, serializeMindState } from "../kernel/mindState.js";
import type { SqlClient } from "./helpers.js";
import { buildPoolConfig, hasPgConfig, type PgConnectionConfig } from "./index.js";
import { MemorySnapshotStore, PgSnapshotStore } from "./snapshots.js";

/** Records every statement; SELECTs answer with `rows` */
class FakeSql implements SqlClient {
    readonly calls: { text: string; values: unknown[] }[] = [];
    rows: Record<string, unknown>[] = [];

    async query(text: string, values: unknown[] = []): Promise<{ rows: Record<string, unknown>[] }> {
        this.calls.push({ text: text.replace(/\s+/g, " ").trim(), values });
        return { rows: text.includes("SELECT id, run_id") ? this.rows : [] };
    }
}

function smallKernel(): MindKernel {
    return new MindKernel({ grid: { rows: 3, cols: 3, agentStart: { row: 0, col: 0 }, objects: [] } });
}

async function runPgStoreTests(): Promise<void> {
    const sql = new FakeSql();
    const store = new PgSnapshotStore(sql, { runId: "run-1", maxSnapshots: 50 });

    await store.init();
    assert.equal(sql.calls.length, 2);
    assert.ok(sql.calls[0].text.startsWith("CREATE TABLE IF NOT EXISTS mind_snapshots"));
    assert.ok(sql.calls[1].text.startsWith("CREATE INDEX IF NOT EXISTS idx_mind_snapshots_run_tick"));

    const state = smallKernel().tick();
    await store.save(state);
    const [insert, trim] = sql.calls.slice(2);

    assert.ok(insert.text.startsWith("INSERT INTO mind_snapshots"));
    assert.deepEqual(insert.values.slice(0, 5), ["run-1", 1, "running", state.lastAction, null]);
    assert.equal(insert.values[5], serializeMindState(state, 0));
    assert.deepEqual(parseMindStateSnapshot(insert.values[5]), state);

    assert.ok(trim.text.startsWith("DELETE FROM mind_snapshots"));
    assert.deepEqual(trim.values, ["run-1", 50]);

    // Rows come back with JSONB already parsed
    sql.rows = [
        {
            id: "12",
            run_id: "run-1",
            tick: 1,
            state: JSON.parse(serializeMindState(state)),
            created_at: new Date("2026-01-02T03:04:05.000Z"),
        },
    ];
    const recent = await store.listRecent(5);
    assert.equal(recent.length, 1);
    assert.equal(recent[0].id, 12);
    assert.equal(recent[0].runId, "run-1");
    assert.equal(recent[0].tick, 1);
    assert.equal(recent[0].createdAt, "2026-01-02T03:04:05.000Z");
    assert.deepEqual(recent[0].state, state);
    assert.deepEqual(sql.calls[sql.calls.length - 1].values, ["run-1", 5]);

    assert.equal((await store.latest())?.id, 12);
    sql.rows = [];
    assert.equal(await store.latest(), null);

    assert.throws(
        () => new PgSnapshotStore(sql, { runId: "run-1", maxSnapshots: 0 }),
        (err: unknown) => err instanceof KernelError && err.code === "INVALID_CONFIG",
    );
}

async function runMemoryStoreTests(): Promise<void> {
    const kernel = smallKernel();
    const store = new MemorySnapshotStore(2);

    for (let i = 0; i < 3; i++) {
        await store.save(kernel.tick());
    }
    assert.equal(store.size, 2);
    assert.deepEqual(store.all().map((s) => s.tick), [2, 3]);
    assert.equal(store.latest()?.tick, 3);
}

function runPoolConfigTests(): void {
    const base: PgConnectionConfig = {
        databaseUrl: "",
        pgHost: "",
        pgPort: 5432,
        pgUser: "",
        pgPassword: "",
        pgDatabase: "",
        pgSsl: false,
        pgPoolMax: 4,
    };
    assert.equal(hasPgConfig(base), false);
    assert.throws(() => buildPoolConfig(base), ConfigError);

    const byUrl = buildPoolConfig({ ...base, databaseUrl: "postgres://localhost/minds" });
    assert.deepEqual(byUrl, { max: 4, connectionString: "postgres://localhost/minds" });

    const byHost = { ...base, pgHost: "db", pgUser: "kernel", pgPassword: "test-secret", pgDatabase: "minds", pgSsl: true };
    assert.equal(hasPgConfig(byHost), true);
    assert.deepEqual(buildPoolConfig(byHost), {
        max: 4,
        host: "db",
        port: 5432,
        user: "kernel",
        password: "test-secret",
        database: "minds",
        ssl: { rejectUnauthorized: false },
    });
}

await runPgStoreTests();
await runMemoryStoreTests();
runPoolConfigTests();
console.log("Snapshot store tests passed.");
