import assert from "node:assert/strict";
import { createMetrics, METRIC_LESSONS, METRIC_UNKNOWN } from "../metrics.js";
import { runCuriosityScenario, runGroundingScenario } from "./scenarios.js";

function near(actual: number, expected: number): void {
    assert.ok(Math.abs(actual - expected) < 1e-9, `expected ${expected}, got ${actual}`);
}

function runGroundingScenarioTests(): void {
    const metrics = createMetrics();
    const result = runGroundingScenario({}, { metrics });

    assert.deepEqual(
        result.lessons.map((l) => (l.status === "learned" ? l.label : l.status)),
        ["A", "A", "A", "B"],
    );
    const confidences = result.lessons.map((l) => (l.status === "learned" ? l.confidence : -1));
    near(confidences[0], 0.4);
    near(confidences[1], 0.6);
    near(confidences[2], 0.8);
    near(confidences[3], 0.4);

    assert.ok(result.taught?.status === "known");
    assert.equal(result.taught.label, "A");
    near(result.taught.confidence, 0.8);
    assert.equal(result.taught.ambiguous, false);

    assert.deepEqual(result.unseen, { status: "unknown", candidates: [] });

    assert.equal(metrics.counter(METRIC_LESSONS), 4);
    assert.equal(metrics.counter(METRIC_UNKNOWN), 1);

    // One exposure stays under the recognition threshold
    const once = runGroundingScenario({ exposures: 1 }, { metrics: createMetrics() });
    assert.equal(once.taught?.status, "unknown");
}

function runCuriosityScenarioTests(): void {
    const result = runCuriosityScenario({}, { metrics: createMetrics() });
    assert.deepEqual(result, {
        firstSeenTick: 33,
        reachedTick: 36,
        finalPosition: { row: 6, col: 5 },
        ticks: 36,
    });

    const short = runCuriosityScenario({ maxTicks: 10 }, { metrics: createMetrics() });
    assert.equal(short.firstSeenTick, null);
    assert.equal(short.reachedTick, null);
    assert.equal(short.ticks, 10);
}

runGroundingScenarioTests();
runCuriosityScenarioTests();
console.log("Scenario tests passed.");
