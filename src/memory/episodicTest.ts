import assert from "node:assert/strict";
import { NEUTRAL_AFFECT } from "../affect/tracker.js";
import type { Action, Observation } from "../environment/interface.js";
import { ConfigError, KernelError } from "../errors/index.js";
import { EpisodicMemory } from "./episodic.js";
import type { EpisodicRecord } from "./interface.js";

function observationAt(row: number, col: number): Observation {
    return {
        agent: { position: { row, col }, orientation: "up" },
        visibleObjects: [],
        grid: [["."]],
    };
}

function entry(tick: number, action: Action = "stay", row = 0): EpisodicRecord {
    return { tick, observation: observationAt(row, 0), action, affect: NEUTRAL_AFFECT };
}

function ticks(records: Iterable<EpisodicRecord>): number[] {
    return [...records].map((r) => r.tick);
}

function runOrderingTests(): void {
    const memory = new EpisodicMemory(10);
    memory.record(entry(1));
    memory.record(entry(2));
    memory.record(entry(5));

    assert.deepEqual(ticks(memory.query()), [1, 2, 5]);
    assert.equal(memory.latest()?.tick, 5);

    assert.throws(
        () => memory.record(entry(5)),
        (err: unknown) => err instanceof KernelError && err.code === "EPISODIC_ORDER",
    );
    assert.throws(() => memory.record(entry(3)), KernelError);
    assert.equal(memory.size, 3);
}

function runEvictionTests(): void {
    const memory = new EpisodicMemory(3);
    for (let tick = 1; tick <= 5; tick++) {
        memory.record(entry(tick));
    }
    assert.deepEqual(ticks(memory.all()), [3, 4, 5]);
    assert.equal(memory.size, 3);
    assert.equal(memory.totalRecorded, 5);
    assert.equal(memory.latest()?.tick, 5, "the newest record is never evicted");

    const single = new EpisodicMemory(1);
    single.record(entry(1));
    single.record(entry(2));
    assert.deepEqual(ticks(single.all()), [2]);

    assert.throws(() => new EpisodicMemory(0), ConfigError);
}

function runQueryTests(): void {
    const memory = new EpisodicMemory(10);
    memory.record(entry(1, "up", 3));
    memory.record(entry(2, "stay", 2));
    memory.record(entry(3, "left", 2));
    memory.record(entry(4, "stay", 2));

    const stays = memory.query((r) => r.action === "stay");
    assert.deepEqual(ticks(stays), [2, 4]);
    // Restartable
    assert.deepEqual(ticks(stays), [2, 4]);

    // An iteration walks the log as it was when it began
    const all = memory.query();
    const seen: number[] = [];
    for (const record of all) {
        seen.push(record.tick);
        if (record.tick === 1) memory.record(entry(5));
    }
    assert.deepEqual(seen, [1, 2, 3, 4]);
    // A fresh iteration sees the new record
    assert.deepEqual(ticks(all), [1, 2, 3, 4, 5]);

    assert.deepEqual(ticks(memory.query((r) => r.observation.agent.position.row === 3)), [1]);
}

function runImmutabilityTests(): void {
    const memory = new EpisodicMemory(5);
    const stored = memory.record(entry(1));
    assert.ok(Object.isFrozen(stored));
    assert.ok(Object.isFrozen(stored.observation.agent.position));

    memory.clear();
    assert.equal(memory.size, 0);
    assert.equal(memory.latest(), undefined);
    // After clear the tick sequence may start again
    memory.record(entry(1));
    assert.equal(memory.size, 1);
}

runOrderingTests();
runEvictionTests();
runQueryTests();
runImmutabilityTests();
console.log("Episodic memory tests passed.");
