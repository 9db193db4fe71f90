import assert from "node:assert/strict";
import type { Observation, Position, VisibleObject } from "../environment/interface.js";
import type { EpisodicRecord } from "../memory/interface.js";
import { countVisits, deriveAffect, NEUTRAL_AFFECT, type AffectState } from "./tracker.js";

const opts = { noveltyThreshold: 0.5, boredomWindow: 3, boredomIncrement: 0.25 };

function near(actual: number, expected: number, message?: string): void {
    assert.ok(Math.abs(actual - expected) < 1e-9, message ?? `expected ${expected}, got ${actual}`);
}

function seen(id: string): VisibleObject {
    return {
        id,
        kind: "block",
        symbol: "O",
        position: { row: 0, col: 0 },
        relativePosition: { row: 0, col: 0 },
        shape: null,
    };
}

function obs(position: Position, visible: string[] = []): Observation {
    return {
        agent: { position, orientation: "up" },
        visibleObjects: visible.map(seen),
        grid: [],
    };
}

/** Affect at every tick of a walk, feeding each observation through the tracker */
function walk(observations: Observation[]): AffectState[] {
    const history: EpisodicRecord[] = [];
    const out: AffectState[] = [];
    observations.forEach((observation, i) => {
        const affect = deriveAffect(history, observation, opts);
        out.push(affect);
        history.push({ tick: i + 1, observation, action: "stay", affect });
    });
    return out;
}

function runBoredomTests(): void {
    const still = walk(Array.from({ length: 9 }, () => obs({ row: 1, col: 1 })));

    near(still[0].novelty, 1);
    near(still[1].novelty, 0.5);
    near(still[2].novelty, 1 / 3);
    assert.deepEqual(still.map((a) => a.lowNoveltyStreak), [0, 0, 1, 2, 3, 4, 5, 6, 7]);
    assert.deepEqual(still.map((a) => a.boredom), [0, 0, 0, 0, 0.25, 0.5, 0.75, 1, 1]);

    // curiosity = max(novelty, surprise) * (1 - boredom)
    near(still[4].curiosity, 0.2 * 0.75);
    assert.equal(still[7].curiosity, 0);

    // A fresh cell resets the streak and boredom
    const moved = walk([
        ...Array.from({ length: 6 }, () => obs({ row: 1, col: 1 })),
        obs({ row: 1, col: 2 }),
    ]);
    assert.equal(moved[5].boredom, 0.5);
    assert.equal(moved[6].boredom, 0);
    assert.equal(moved[6].lowNoveltyStreak, 0);
    assert.equal(moved[6].novelty, 1);
    assert.equal(moved[6].curiosity, 1);
}

function runSurpriseTests(): void {
    const states = walk([
        obs({ row: 0, col: 0 }),
        obs({ row: 0, col: 0 }),
        obs({ row: 0, col: 0 }),
        obs({ row: 0, col: 0 }, ["obj-1"]),
        obs({ row: 0, col: 0 }, ["obj-1"]),
        obs({ row: 0, col: 0 }, ["obj-2"]),
    ]);

    assert.deepEqual(states.map((a) => a.surprise), [0, 0, 0, 1, 0, 1]);
    // The surprising tick counts as novel
    assert.deepEqual(states.map((a) => a.lowNoveltyStreak), [0, 0, 1, 0, 1, 0]);
    assert.equal(states[3].curiosity, 1);
}

function runPurityTests(): void {
    const history: EpisodicRecord[] = [
        { tick: 1, observation: obs({ row: 0, col: 0 }), action: "right", affect: NEUTRAL_AFFECT },
        { tick: 2, observation: obs({ row: 0, col: 1 }), action: "left", affect: NEUTRAL_AFFECT },
    ];
    const current = obs({ row: 0, col: 0 });

    // Same history, same answer; stored affect values are ignored
    assert.deepEqual(deriveAffect(history, current, opts), deriveAffect(history, current, opts));
    near(deriveAffect(history, current, opts).novelty, 0.5);
    near(deriveAffect([], current, opts).novelty, 1);

    const visits = countVisits(history, current);
    assert.equal(visits.get("0,0"), 2);
    assert.equal(visits.get("0,1"), 1);
    assert.equal(countVisits(history).get("0,0"), 1);
}

runBoredomTests();
runSurpriseTests();
runPurityTests();
console.log("Affect tracker tests passed.");
