import assert from "node:assert/strict";
import { ConfigError } from "../errors/index.js";
import { MindKernel } from "./kernel.js";
import {
    describeGrounding,
    formatMindState,
    parseMindStateSnapshot,
    serializeMindState,
} from "./mindState.js";

function firstLessonState() {
    const kernel = new MindKernel({
        grid: {
            rows: 5,
            cols: 5,
            agentStart: { row: 4, col: 0 },
            objects: [{ id: "glyph", position: { row: 1, col: 3 }, shape: [[0, 1, 0], [1, 1, 1], [1, 0, 1]] }],
        },
    });
    kernel.teach("A", { source: "object", objectId: "glyph" });
    return kernel.tick();
}

function runFormatTests(): void {
    const state = firstLessonState();
    assert.equal(
        formatMindState(state),
        [
            "tick 1 (running)",
            "agent 4,0 facing up",
            "affect novelty=1.00 boredom=0.00 curiosity=1.00 surprise=0",
            "action up via approach_nearest_object",
            "grounding learned \"A\" (0.40, x1)",
            "visible glyph@1,3",
            "working memory [percept, object:glyph, grounding, action]",
            "  . . . . .",
            "  . . . O .",
            "  . . . . .",
            "  . . . . .",
            "  A . . . .",
        ].join("\n"),
    );
}

function runRoundTripTests(): void {
    const state = firstLessonState();
    const json = serializeMindState(state);
    const parsed = parseMindStateSnapshot(json);
    assert.deepEqual(parsed, state);
    assert.ok(Object.isFrozen(parsed.observation));

    // Objects are accepted as well as JSON text
    assert.deepEqual(parseMindStateSnapshot(JSON.parse(json)), state);

    assert.throws(() => parseMindStateSnapshot("{"), ConfigError);
    assert.throws(
        () => parseMindStateSnapshot({ ...JSON.parse(json), tick: -1 }),
        (err: unknown) => err instanceof ConfigError && err.issues[0].startsWith("tick:"),
    );
}

function runDescribeGroundingTests(): void {
    assert.equal(
        describeGrounding({ status: "known", label: "A", confidence: 0.8, ambiguous: false, candidates: [] }),
        "this is \"A\" (0.80)",
    );
    assert.equal(
        describeGrounding({ status: "known", label: "L", confidence: 0.6, ambiguous: true, candidates: [] }),
        "this is \"L\" (0.60) (ambiguous)",
    );
    assert.equal(describeGrounding({ status: "unknown", candidates: [] }), "I don't know");
    assert.equal(
        describeGrounding({ status: "no_pattern", reason: "no object in view" }),
        "nothing to ground: no object in view",
    );
}

runFormatTests();
runRoundTripTests();
runDescribeGroundingTests();
console.log("MindState tests passed.");
