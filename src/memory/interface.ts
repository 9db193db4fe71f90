/**
 * Memory subsystem types.
 *
 * Four stores with distinct retention and query semantics:
 *   Working    — tiny LRU of currently salient items
 *   Episodic   — append-only log of past ticks, FIFO retention
 *   Semantic   — pattern → label associations with confidence
 *   Procedural — named skills that generate actions
 */

import type { Action, Observation, Position } from "../environment/interface.js";
import type { AffectState } from "../affect/tracker.js";
import type { GroundingResult } from "../grounding/engine.js";
import type { PatternSignature } from "../grounding/signature.js";

// ═══════════════════════════════════════════════════════
//                    Working Memory
// ═══════════════════════════════════════════════════════

export type WorkingMemoryItem =
    | { key: string; kind: "percept"; value: { position: Position; visibleObjectIds: string[] } }
    | { key: string; kind: "object"; value: { id: string; position: Position; distance: number } }
    | { key: string; kind: "focus"; value: { skill: string } }
    | { key: string; kind: "grounding"; value: GroundingResult }
    | { key: string; kind: "action"; value: { action: Action; source: ActionSource } };

export type WorkingMemoryKind = WorkingMemoryItem["kind"];

/** Where the selected action came from */
export type ActionSource = "skill" | "fallback";

// ═══════════════════════════════════════════════════════
//                    Episodic Memory
// ═══════════════════════════════════════════════════════

export interface EpisodicRecord {
    tick: number;
    observation: Observation;
    /** Action submitted at the end of this tick */
    action: Action;
    affect: AffectState;
}

export type EpisodicPredicate = (record: EpisodicRecord) => boolean;

// ═══════════════════════════════════════════════════════
//                    Semantic Memory
// ═══════════════════════════════════════════════════════

/** One (signature, label) association */
export interface SemanticAssociation {
    signature: PatternSignature;
    label: string;
    /** Always within [0, 1] */
    confidence: number;
    exposures: number;
    /** Monotonic sequence number of the last reinforcement */
    reinforcedSeq: number;
}

/** Label-centric view: every signature grounded to the same label */
export interface SemanticConcept {
    label: string;
    signatures: PatternSignature[];
    /** Strongest association for the label */
    confidence: number;
    exposures: number;
    reinforcedSeq: number;
}

export interface SemanticCandidate {
    label: string;
    confidence: number;
    /** 1 for an exact signature match, lower for fuzzy matches */
    similarity: number;
    reinforcedSeq: number;
}

// ═══════════════════════════════════════════════════════
//                    Procedural Memory
// ═══════════════════════════════════════════════════════

/** Read-only view of the agent's situation handed to skills */
export interface SkillContext {
    observation: Observation;
    /** Visit counts by "row,col" key, from the retained episodic log */
    visitCounts: ReadonlyMap<string, number>;
    workingMemory: readonly WorkingMemoryItem[];
}

/** Generates an action sequence; invoke() takes the first element */
export type ProceduralRoutine = (ctx: SkillContext) => Iterable<string>;

export interface ProceduralEntry {
    name: string;
    routine: ProceduralRoutine;
    invocations: number;
}
