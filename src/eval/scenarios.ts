/**
 * Canned end-to-end scenarios for the kernel.
 *
 * grounding: teach two shapes, ask about the taught one and an unseen one.
 * curiosity: drop the agent in a corner with a limited view and let it
 *            explore until it finds and reaches a distant object.
 *
 * Both return plain result objects so tests and the CLI can inspect them.
 */

import { getShape } from "../environment/shapes.js";
import type { Position } from "../environment/interface.js";
import { MindKernel } from "../kernel/kernel.js";
import { SKILL_HOLD } from "../memory/skills.js";
import type { Logger } from "../logger.js";
import type { MetricsRegistry } from "../metrics.js";
import type { GroundingResult } from "../grounding/engine.js";
import type { KernelConfigInput } from "../validation.js";

export interface ScenarioDeps {
    logger?: Logger;
    metrics?: MetricsRegistry;
}

// ═══════════════════════════════════════════════════════
//                  Grounding
// ═══════════════════════════════════════════════════════

export interface GroundingScenarioResult {
    /** Learn results, in teaching order */
    lessons: GroundingResult[];
    taught: GroundingResult | null;
    unseen: GroundingResult | null;
}

export interface GroundingScenarioOptions {
    /** Exposures of the first shape */
    exposures?: number;
    taughtShape?: string;
    otherShape?: string;
    unseenShape?: string;
}

export function runGroundingScenario(
    opts: GroundingScenarioOptions = {},
    deps: ScenarioDeps = {},
): GroundingScenarioResult {
    const exposures = opts.exposures ?? 3;
    const taught = opts.taughtShape ?? "A";
    const other = opts.otherShape ?? "B";
    const unseen = opts.unseenShape ?? "X";

    const kernel = new MindKernel(
        { seed: 1, grid: { rows: 5, cols: 5, agentStart: { row: 2, col: 2 }, objects: [] } },
        deps,
    );

    const lessons: GroundingResult[] = [];
    const lesson = (label: string, shape: string) => {
        kernel.teach(label, { source: "shape", cells: toCells(getShape(shape)) });
        const { grounding } = kernel.tick();
        if (grounding) lessons.push(grounding);
    };

    for (let i = 0; i < exposures; i++) lesson(taught, taught);
    lesson(other, other);

    kernel.ask({ source: "shape", cells: toCells(getShape(taught)) });
    const taughtAnswer = kernel.tick().grounding;

    kernel.ask({ source: "shape", cells: toCells(getShape(unseen)) });
    const unseenAnswer = kernel.tick().grounding;

    kernel.shutdown();
    return { lessons, taught: taughtAnswer, unseen: unseenAnswer };
}

function toCells(pattern: readonly (readonly number[])[]): (0 | 1)[][] {
    return pattern.map((row) => row.map((v) => (v === 1 ? 1 : 0)));
}

// ═══════════════════════════════════════════════════════
//                  Curiosity
// ═══════════════════════════════════════════════════════

export interface CuriosityScenarioResult {
    /** Tick on which the object first came into view; null if never */
    firstSeenTick: number | null;
    /** Tick on which the agent stood next to it; null if never */
    reachedTick: number | null;
    finalPosition: Position;
    ticks: number;
}

export interface CuriosityScenarioOptions {
    maxTicks?: number;
    config?: KernelConfigInput;
}

const CURIOSITY_WORLD: KernelConfigInput = {
    seed: 7,
    grid: {
        rows: 7,
        cols: 7,
        viewRadius: 2,
        agentStart: { row: 0, col: 0 },
        objects: [{ id: "beacon", kind: "treasure", position: { row: 6, col: 6 } }],
    },
};

export function runCuriosityScenario(
    opts: CuriosityScenarioOptions = {},
    deps: ScenarioDeps = {},
): CuriosityScenarioResult {
    const maxTicks = opts.maxTicks ?? 60;
    const kernel = new MindKernel(opts.config ?? CURIOSITY_WORLD, deps);

    let firstSeenTick: number | null = null;
    let reachedTick: number | null = null;

    while (kernel.currentTick < maxTicks) {
        const state = kernel.tick();
        if (firstSeenTick === null && state.observation.visibleObjects.length > 0) {
            firstSeenTick = state.tick;
        }
        if (state.skill === SKILL_HOLD) {
            reachedTick = state.tick;
            break;
        }
    }

    const final = kernel.shutdown();
    return {
        firstSeenTick,
        reachedTick,
        finalPosition: { ...final.observation.agent.position },
        ticks: final.tick,
    };
}
