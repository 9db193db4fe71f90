import assert from "node:assert/strict";
import { ConfigError, InvalidActionError, InvalidSymbolError } from "../errors/index.js";
import { GridWorld, type GridWorldConfig } from "./gridWorld.js";
import { assertGrid, positionKey } from "./interface.js";
import { getShape } from "./shapes.js";

function fixedWorld(overrides: Partial<GridWorldConfig> = {}): GridWorld {
    return new GridWorld({ rows: 5, cols: 5, objectCount: 0, objects: [], ...overrides }, 0);
}

function runWalkScenarioTests(): void {
    const world = new GridWorld(
        {
            rows: 5,
            cols: 5,
            objectCount: 1,
            agentStart: { row: 4, col: 0 },
            objects: [{ position: { row: 1, col: 3 } }],
        },
        42,
    );

    for (const action of ["up", "up", "right", "right"]) {
        world.step(action);
    }
    const obs = world.observe();

    assert.deepEqual(obs.agent.position, { row: 2, col: 2 });
    assert.equal(obs.agent.orientation, "right");
    assert.deepEqual(obs.visibleObjects, [
        {
            id: "obj-1",
            kind: "block",
            symbol: "O",
            position: { row: 1, col: 3 },
            relativePosition: { row: -1, col: 1 },
            shape: null,
        },
    ]);
    assert.equal(
        world.render(),
        [". . . . .", ". . . O .", ". . A . .", ". . . . .", ". . . . ."].join("\n"),
    );
}

function runSeededWalkTests(): void {
    const world = new GridWorld({ rows: 5, cols: 5, objectCount: 1, agentStart: { row: 4, col: 0 } }, 42);
    assert.deepEqual(
        world.toJSON().objects,
        [{ id: "obj-1", kind: "block", position: { row: 0, col: 0 }, shape: getShape("A") }],
    );

    for (const action of ["up", "up", "right", "right"]) {
        world.step(action);
    }
    const obs = world.observe();

    assert.deepEqual(obs.agent.position, { row: 2, col: 2 });
    assert.equal(obs.agent.orientation, "right");
    assert.deepEqual(obs.visibleObjects, [
        {
            id: "obj-1",
            kind: "block",
            symbol: "O",
            position: { row: 0, col: 0 },
            relativePosition: { row: -2, col: -2 },
            shape: getShape("A"),
        },
    ]);
    assert.equal(
        world.render(),
        ["O . . . .", ". . . . .", ". . A . .", ". . . . .", ". . . . ."].join("\n"),
    );
}

function runExplicitLayoutStartTests(): void {
    // No fixed start: the seeded start cell must avoid hand-placed objects
    const config: GridWorldConfig = { rows: 3, cols: 3, objectCount: 0, objects: [{ position: { row: 1, col: 1 } }] };
    const world = new GridWorld(config, 0);
    for (let seed = 0; seed < 50; seed++) {
        const fresh = new GridWorld(config, seed);
        assert.notDeepEqual(fresh.observe().agent.position, { row: 1, col: 1 }, `seed ${seed}`);
        assert.deepEqual(world.reset(seed), fresh.observe(), `reset(${seed}) matches a fresh world`);
        assert.equal(world.seed, seed);
    }

    // Draws from the free cells in row-major order
    assert.deepEqual(new GridWorld(config, 42).observe().agent.position, { row: 0, col: 0 });
    assert.deepEqual(new GridWorld(config, 8).observe().agent.position, { row: 1, col: 2 });
    assert.deepEqual(new GridWorld(config, 31).observe().agent.position, { row: 1, col: 0 });

    assert.throws(
        () => new GridWorld({
            rows: 1,
            cols: 2,
            objectCount: 0,
            objects: [{ position: { row: 0, col: 0 } }, { position: { row: 0, col: 1 } }],
        }),
        (err: unknown) => err instanceof ConfigError && err.issues[0] === "no free cell left for the agent in a 1x2 grid",
    );
}

function runDeterminismTests(): void {
    const config: GridWorldConfig = { rows: 6, cols: 6, objectCount: 3 };
    const a = new GridWorld(config, 42);
    const b = new GridWorld(config, 42);
    assert.deepEqual(a.toJSON(), b.toJSON(), "same seed must give the same layout");

    const actions = ["up", "left", "left", "down", "stay", "right", "down"];
    for (const action of actions) {
        assert.deepEqual(a.step(action), b.step(action));
    }

    // reset() with the original seed restores the original layout
    const replayed = new GridWorld(config, 42);
    a.reset(42);
    assert.deepEqual(a.observe(), replayed.observe());
    assert.equal(a.seed, 42);
}

function runRandomPlacementTests(): void {
    const world = new GridWorld({ rows: 4, cols: 4, objectCount: 3 }, 7);
    const snapshot = world.toJSON();

    assert.equal(snapshot.objects.length, 3);
    const cells = new Set(snapshot.objects.map((o) => positionKey(o.position)));
    cells.add(positionKey(snapshot.agent.position));
    assert.equal(cells.size, 4, "objects and agent must occupy distinct cells");
    assert.deepEqual(snapshot.objects.map((o) => o.id), ["obj-1", "obj-2", "obj-3"]);

    const flat = snapshot.grid.flat();
    assert.equal(flat.filter((c) => c === "O").length, 3);
    assert.equal(flat.filter((c) => c === "A").length, 1);
    for (const obj of snapshot.objects) {
        assert.ok(obj.shape, `${obj.id} should carry a library shape`);
    }
}

function runMovementTests(): void {
    // Border clamp: position unchanged, orientation follows the action
    const corner = fixedWorld({ agentStart: { row: 0, col: 0 } });
    let obs = corner.step("up");
    assert.deepEqual(obs.agent.position, { row: 0, col: 0 });
    assert.equal(obs.agent.orientation, "up");
    obs = corner.step("left");
    assert.deepEqual(obs.agent.position, { row: 0, col: 0 });
    assert.equal(obs.agent.orientation, "left");
    obs = corner.step("down");
    assert.deepEqual(obs.agent.position, { row: 1, col: 0 });

    // Occupied cells block the move
    const blocked = fixedWorld({
        agentStart: { row: 2, col: 2 },
        objects: [{ id: "rock", kind: "wall", position: { row: 1, col: 2 } }],
    });
    obs = blocked.step("up");
    assert.deepEqual(obs.agent.position, { row: 2, col: 2 });
    assert.equal(obs.agent.orientation, "up");
    assert.equal(obs.grid[1][2], "#");

    // stay keeps everything
    obs = blocked.step("stay");
    assert.deepEqual(obs.agent.position, { row: 2, col: 2 });
    assert.equal(obs.agent.orientation, "up");
}

function runInvalidActionTests(): void {
    const world = fixedWorld({ agentStart: { row: 3, col: 3 } });
    const before = world.observe();

    assert.throws(
        () => world.step("jump"),
        (err: unknown) => err instanceof InvalidActionError && err.action === "jump" && err.recoverable,
    );
    assert.deepEqual(world.observe(), before, "a rejected action must not change the world");
}

function runVisibilityTests(): void {
    const world = fixedWorld({
        agentStart: { row: 0, col: 0 },
        viewRadius: 1,
        objects: [
            { id: "near", position: { row: 1, col: 1 }, shape: getShape("T") },
            { id: "far", position: { row: 0, col: 4 } },
        ],
    });
    const obs = world.observe();

    assert.deepEqual(obs.visibleObjects.map((o) => o.id), ["near"]);
    assert.deepEqual(obs.visibleObjects[0].shape, [
        [1, 1, 1],
        [0, 1, 0],
        [0, 1, 0],
    ]);
    // The grid itself is not masked
    assert.equal(obs.grid[0][4], "O");
    assert.ok(Object.isFrozen(obs));
    assert.ok(Object.isFrozen(obs.grid[0]));
    assert.ok(Object.isFrozen(obs.visibleObjects[0].position));
}

function runConfigValidationTests(): void {
    assert.throws(
        () => fixedWorld({
            agentStart: { row: 0, col: 0 },
            objects: [{ position: { row: 0, col: 0 } }],
        }),
        (err: unknown) => err instanceof ConfigError && err.issues[0] === "obj-1 at 0,0 overlaps another occupant",
    );
    assert.throws(
        () => fixedWorld({ objects: [{ id: "lost", position: { row: 9, col: 1 } }] }),
        (err: unknown) => err instanceof ConfigError && err.issues[0] === "lost at 9,1 is outside the grid",
    );
    assert.throws(
        () => new GridWorld({ rows: 2, cols: 2, objectCount: 4 }, 1),
        ConfigError,
    );
    assert.throws(() => new GridWorld({ rows: 0, cols: 3, objectCount: 0 }), ConfigError);
}

function runGridSymbolTests(): void {
    assertGrid([[".", "A"], ["O", "#"], ["*", "."]]);
    assert.throws(
        () => assertGrid([[".", "?"]]),
        (err: unknown) => err instanceof InvalidSymbolError && err.symbol === "?",
    );
    assert.throws(() => assertGrid([[".", "."], ["."]]), InvalidSymbolError);
}

runWalkScenarioTests();
runSeededWalkTests();
runExplicitLayoutStartTests();
runDeterminismTests();
runRandomPlacementTests();
runMovementTests();
runInvalidActionTests();
runVisibilityTests();
runConfigValidationTests();
runGridSymbolTests();
console.log("GridWorld tests passed.");
