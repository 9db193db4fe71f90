/**
 * MindState — the inspectable snapshot emitted once per tick.
 *
 * Snapshots are deep-frozen and never reused; external tools read them
 * through serializeMindState / formatMindState and read them back with
 * parseMindStateSnapshot without touching kernel internals.
 */

import { ZodError } from "zod";
import { ConfigError } from "../errors/index.js";
import type { Action, Observation } from "../environment/interface.js";
import type { AffectState } from "../affect/tracker.js";
import type { GroundingResult } from "../grounding/engine.js";
import type { ActionSource, WorkingMemoryItem } from "../memory/interface.js";
import { mindStateSnapshotSchema } from "../validation.js";
import { deepFreeze } from "../utils/freeze.js";

export type KernelStatus = "running" | "terminated";

export interface FallbackRecord {
    /** KernelError code (or INTERNAL) of the error that forced "stay" */
    code: string;
    message: string;
}

export interface MindState {
    tick: number;
    status: KernelStatus;
    observation: Observation;
    workingMemory: readonly WorkingMemoryItem[];
    affect: AffectState;
    lastAction: Action | null;
    actionSource: ActionSource | null;
    /** Skill that produced the action, if any */
    skill: string | null;
    /** Grounding attempt made during this tick */
    grounding: GroundingResult | null;
    fallback: FallbackRecord | null;
}

export function createMindState(fields: MindState): MindState {
    return deepFreeze(structuredClone(fields));
}

/** Structured JSON dump, stable key order */
export function serializeMindState(state: MindState, indent = 2): string {
    return JSON.stringify(state, null, indent);
}

/** Read a serialized snapshot back; throws ConfigError when it does not validate */
export function parseMindStateSnapshot(raw: unknown): MindState {
    let data: unknown = raw;
    if (typeof raw === "string") {
        try {
            data = JSON.parse(raw);
        } catch (err) {
            throw new ConfigError([`snapshot is not valid JSON: ${err instanceof Error ? err.message : String(err)}`], err);
        }
    }
    try {
        return deepFreeze(mindStateSnapshotSchema.parse(data));
    } catch (err) {
        if (err instanceof ZodError) {
            throw new ConfigError(err.issues.map((i) => `${i.path.join(".")}: ${i.message}`), err);
        }
        throw err;
    }
}

/** Human-readable dump for consoles and logs */
export function formatMindState(state: MindState): string {
    const { agent, visibleObjects, grid } = state.observation;
    const a = state.affect;
    const lines: string[] = [
        `tick ${state.tick} (${state.status})`,
        `agent ${agent.position.row},${agent.position.col} facing ${agent.orientation}`,
        `affect novelty=${a.novelty.toFixed(2)} boredom=${a.boredom.toFixed(2)} curiosity=${a.curiosity.toFixed(2)} surprise=${a.surprise.toFixed(0)}`,
        `action ${state.lastAction ?? "-"}${state.skill ? ` via ${state.skill}` : ""}${state.actionSource === "fallback" ? " (fallback)" : ""}`,
    ];

    if (state.fallback) {
        lines.push(`fallback ${state.fallback.code}: ${state.fallback.message}`);
    }
    if (state.grounding) {
        lines.push(`grounding ${describeGrounding(state.grounding)}`);
    }

    lines.push(`visible ${visibleObjects.length === 0
        ? "none"
        : visibleObjects.map((o) => `${o.id}@${o.position.row},${o.position.col}`).join(" ")}`);
    lines.push(`working memory [${state.workingMemory.map((i) => i.key).join(", ")}]`);
    for (const row of grid) {
        lines.push(`  ${row.join(" ")}`);
    }
    return lines.join("\n");
}

export function describeGrounding(result: GroundingResult): string {
    switch (result.status) {
        case "learned":
            return `learned "${result.label}" (${result.confidence.toFixed(2)}, x${result.exposures})`;
        case "known":
            return `this is "${result.label}" (${result.confidence.toFixed(2)})${result.ambiguous ? " (ambiguous)" : ""}`;
        case "unknown":
            return "I don't know";
        case "no_pattern":
            return `nothing to ground: ${result.reason}`;
    }
}
