import assert from "node:assert/strict";
import { KernelError } from "../errors/index.js";
import { MindKernel } from "../kernel/kernel.js";
import { SKILL_APPROACH, SKILL_EXPLORE, SKILL_HOLD } from "../memory/skills.js";
import type { EpisodicRecord } from "../memory/interface.js";
import { classifyRun, replayEpisode } from "./replay.js";

function runReplayTests(): void {
    const kernel = new MindKernel({ seed: 11 });
    for (let i = 0; i < 12; i++) kernel.tick();
    const records = [...kernel.history()];

    const clean = replayEpisode(kernel.config.grid, kernel.config.seed, records);
    assert.equal(clean.ok, true);
    assert.equal(clean.ticks, 12);
    assert.deepEqual(clean.divergences, []);

    // Forge one remembered position
    const original = records[3];
    const forged: EpisodicRecord = {
        ...original,
        observation: {
            ...original.observation,
            agent: { ...original.observation.agent, position: { row: 9, col: 9 } },
        },
    };
    const tampered = replayEpisode(kernel.config.grid, kernel.config.seed, [
        ...records.slice(0, 3),
        forged,
        ...records.slice(4),
    ]);
    assert.equal(tampered.ok, false);
    assert.deepEqual(tampered.divergences, [
        {
            tick: 4,
            field: "position",
            expected: "{\"row\":9,\"col\":9}",
            actual: JSON.stringify(original.observation.agent.position),
        },
    ]);

    assert.deepEqual(replayEpisode(kernel.config.grid, kernel.config.seed, []), { ok: true, ticks: 0, divergences: [] });
}

function runTrimmedLogTests(): void {
    const kernel = new MindKernel({ seed: 11, episodic: { maxRecords: 3 } });
    for (let i = 0; i < 5; i++) kernel.tick();
    const records = [...kernel.history()];
    assert.deepEqual(records.map((r) => r.tick), [3, 4, 5]);

    assert.throws(
        () => replayEpisode(kernel.config.grid, kernel.config.seed, records),
        (err: unknown) => err instanceof KernelError && err.code === "EPISODIC_ORDER",
    );
}

function runClassifyTests(): void {
    const kernel = new MindKernel({
        grid: {
            rows: 5,
            cols: 5,
            agentStart: { row: 4, col: 0 },
            objects: [{ id: "glyph", position: { row: 1, col: 3 }, shape: [[0, 1, 0], [1, 1, 1], [1, 0, 1]] }],
        },
    });
    const states = [kernel.snapshot()];

    kernel.teach("A", { source: "object", objectId: "glyph" });
    states.push(kernel.tick());
    kernel.teach("A", { source: "object", objectId: "glyph" });
    states.push(kernel.tick());
    kernel.ask({ source: "object", objectId: "glyph" });
    states.push(kernel.tick());
    kernel.ask({ source: "shape", cells: [[1, 0, 1], [0, 1, 0], [1, 0, 1]] });
    states.push(kernel.tick());
    for (let i = 0; i < 6; i++) states.push(kernel.tick());

    assert.deepEqual(classifyRun(states), {
        ticks: 10,
        actions: { up: 4, right: 2, stay: 4 },
        skills: { [SKILL_APPROACH]: 5, [SKILL_HOLD]: 4, [SKILL_EXPLORE]: 1 },
        fallbacks: 0,
        lessons: 2,
        recognised: 1,
        unknown: 1,
        // (4,0) (3,0) (2,0) (1,0) (1,1) (1,2)
        cellsVisited: 6,
        peakBoredom: 0.25,
    });

    assert.deepEqual(classifyRun([]).ticks, 0);
}

runReplayTests();
runTrimmedLogTests();
runClassifyTests();
console.log("Replay tests passed.");
