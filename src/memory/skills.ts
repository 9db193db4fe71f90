/**
 * Built-in skills registered on every kernel.
 *
 * All of them are pure functions of the SkillContext and break ties in the
 * fixed order up, down, left, right, so action selection stays deterministic.
 */

import { manhattan, positionKey, type Orientation, type Position } from "../environment/interface.js";
import type { ProceduralMemory } from "./procedural.js";
import type { SkillContext } from "./interface.js";

export const SKILL_APPROACH = "approach_nearest_object";
export const SKILL_EXPLORE = "explore_least_visited";
export const SKILL_HOLD = "hold";

const DIRECTIONS: ReadonlyArray<[Orientation, Position]> = [
    ["up", { row: -1, col: 0 }],
    ["down", { row: 1, col: 0 }],
    ["left", { row: 0, col: -1 }],
    ["right", { row: 0, col: 1 }],
];

/**
 * Walk toward the nearest visible object until adjacent to it.
 * Rows are closed first, then columns. Yields nothing when no object is
 * visible or the agent is already next to the target.
 */
export function* approachNearestObject(ctx: SkillContext): Generator<string> {
    const target = nearestObject(ctx);
    if (!target) return;

    let at = { ...ctx.observation.agent.position };
    while (manhattan(at, target) > 1) {
        if (at.row !== target.row) {
            const dir = at.row < target.row ? "down" : "up";
            at = { row: at.row + (dir === "down" ? 1 : -1), col: at.col };
            yield dir;
            continue;
        }
        const dir = at.col < target.col ? "right" : "left";
        at = { row: at.row, col: at.col + (dir === "right" ? 1 : -1) };
        yield dir;
    }
}

/**
 * Step to the in-bounds, unoccupied neighbour with the fewest recorded
 * visits; stays put when boxed in.
 */
export function* exploreLeastVisited(ctx: SkillContext): Generator<string> {
    const { grid, agent } = ctx.observation;
    let best: { dir: Orientation; visits: number } | null = null;

    for (const [dir, delta] of DIRECTIONS) {
        const next = { row: agent.position.row + delta.row, col: agent.position.col + delta.col };
        const cell = grid[next.row]?.[next.col];
        if (cell !== ".") continue;
        const visits = ctx.visitCounts.get(positionKey(next)) ?? 0;
        if (!best || visits < best.visits) {
            best = { dir, visits };
        }
    }

    yield best ? best.dir : "stay";
}

export function* hold(): Generator<string> {
    yield "stay";
}

export function registerDefaultSkills(memory: ProceduralMemory): void {
    memory.register(SKILL_APPROACH, approachNearestObject);
    memory.register(SKILL_EXPLORE, exploreLeastVisited);
    memory.register(SKILL_HOLD, hold);
}

/** Closest visible object by Manhattan distance; ties keep observation order */
export function nearestObject(ctx: SkillContext): Position | undefined {
    const agent = ctx.observation.agent.position;
    let best: { position: Position; distance: number } | undefined;
    for (const obj of ctx.observation.visibleObjects) {
        const distance = manhattan(agent, obj.position);
        if (!best || distance < best.distance) {
            best = { position: obj.position, distance };
        }
    }
    return best?.position;
}
