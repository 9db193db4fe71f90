/**
 * Replay checks for recorded kernel runs.
 *
 * - replayEpisode(): rebuild the world from its seed, resubmit the recorded
 *   actions and compare every observation with the one on record. Any
 *   difference means the environment is no longer deterministic.
 * - classifyRun(): fold a run's MindStates into stable buckets so
 *   regressions in behaviour are easy to spot between versions.
 */

import { GridWorld, type GridWorldConfig } from "../environment/gridWorld.js";
import type { Observation } from "../environment/interface.js";
import { KernelError } from "../errors/index.js";
import type { EpisodicRecord } from "../memory/interface.js";
import type { MindState } from "../kernel/mindState.js";

export type ReplayField = "position" | "orientation" | "visibleObjects" | "grid";

export interface ReplayDivergence {
    tick: number;
    field: ReplayField;
    expected: string;
    actual: string;
}

export interface ReplayResult {
    ok: boolean;
    ticks: number;
    divergences: ReplayDivergence[];
}

const FIELDS: Record<ReplayField, (obs: Observation) => unknown> = {
    position: (obs) => obs.agent.position,
    orientation: (obs) => obs.agent.orientation,
    visibleObjects: (obs) => obs.visibleObjects,
    grid: (obs) => obs.grid,
};

export function replayEpisode(
    config: GridWorldConfig,
    seed: number,
    records: readonly EpisodicRecord[],
): ReplayResult {
    // Replay needs the whole run; a trimmed log starts mid-episode
    if (records.length > 0 && records[0].tick !== 1) {
        throw new KernelError(
            `Cannot replay from tick ${records[0].tick}: the log no longer starts at tick 1`,
            { code: "EPISODIC_ORDER" },
        );
    }

    const world = new GridWorld(config, seed);
    const divergences: ReplayDivergence[] = [];

    for (const record of records) {
        const actual = world.observe();
        for (const field of Object.keys(FIELDS)) {
            if (!isReplayField(field)) continue;
            const expected = JSON.stringify(FIELDS[field](record.observation));
            const got = JSON.stringify(FIELDS[field](actual));
            if (expected !== got) {
                divergences.push({ tick: record.tick, field, expected, actual: got });
            }
        }
        world.step(record.action);
    }

    return { ok: divergences.length === 0, ticks: records.length, divergences };
}

function isReplayField(value: string): value is ReplayField {
    return value in FIELDS;
}

// ═══════════════════════════════════════════════════════
//                  Run classification
// ═══════════════════════════════════════════════════════

export interface RunClassification {
    ticks: number;
    actions: Record<string, number>;
    skills: Record<string, number>;
    fallbacks: number;
    lessons: number;
    recognised: number;
    unknown: number;
    /** Distinct cells the agent stood on */
    cellsVisited: number;
    /** Highest boredom reached during the run */
    peakBoredom: number;
}

export function classifyRun(states: readonly MindState[]): RunClassification {
    const actions: Record<string, number> = {};
    const skills: Record<string, number> = {};
    const cells = new Set<string>();
    let fallbacks = 0;
    let lessons = 0;
    let recognised = 0;
    let unknown = 0;
    let peakBoredom = 0;
    let ticks = 0;

    for (const state of states) {
        if (state.tick === 0 || state.lastAction === null) continue;
        ticks++;
        actions[state.lastAction] = (actions[state.lastAction] ?? 0) + 1;
        if (state.skill) {
            skills[state.skill] = (skills[state.skill] ?? 0) + 1;
        }
        if (state.actionSource === "fallback") fallbacks++;

        switch (state.grounding?.status) {
            case "learned":
                lessons++;
                break;
            case "known":
                recognised++;
                break;
            case "unknown":
                unknown++;
                break;
            default:
                break;
        }

        const { row, col } = state.observation.agent.position;
        cells.add(`${row},${col}`);
        peakBoredom = Math.max(peakBoredom, state.affect.boredom);
    }

    return {
        ticks,
        actions,
        skills,
        fallbacks,
        lessons,
        recognised,
        unknown,
        cellsVisited: cells.size,
        peakBoredom,
    };
}
