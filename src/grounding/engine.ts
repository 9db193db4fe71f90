/**
 * Grounding engine — learns which label goes with which pattern.
 *
 * learn():    labelled exposure. New (signature, label) pairs start at
 *             initialConfidence; repeats add confidenceIncrement, capped at 1.
 * identify(): unlabelled query. Returns the best candidate whose confidence
 *             clears minConfidence, or "unknown" — never a guess.
 */

import { GroundingAmbiguousError } from "../errors/index.js";
import type { SemanticMemory } from "../memory/semantic.js";
import type { SemanticCandidate } from "../memory/interface.js";
import { computeSignature, type GroundingPattern } from "./signature.js";

export interface GroundingOptions {
    /** Candidates below this confidence are reported as unknown */
    minConfidence: number;
    /** Fold the four rotations of a shape into one signature */
    rotationInvariant: boolean;
    /** "rank": report ties in the candidate list; "raise": throw GroundingAmbiguousError */
    ambiguityPolicy: "rank" | "raise";
    /** Confidence removed from every association per decay() call; 0 disables */
    decayPerTick: number;
}

export interface LearnResult {
    status: "learned";
    label: string;
    confidence: number;
    exposures: number;
    signature: string;
}

export type IdentifyResult =
    | {
        status: "known";
        label: string;
        confidence: number;
        /** Another label scored exactly the same */
        ambiguous: boolean;
        candidates: SemanticCandidate[];
    }
    | {
        status: "unknown";
        candidates: SemanticCandidate[];
    };

export type GroundingResult =
    | LearnResult
    | IdentifyResult
    | { status: "no_pattern"; reason: string };

const TIE_EPSILON = 1e-9;

export class GroundingEngine {
    constructor(
        private readonly memory: SemanticMemory,
        private readonly opts: GroundingOptions,
    ) { }

    learn(pattern: GroundingPattern, label: string): LearnResult {
        const signature = computeSignature(pattern, { rotationInvariant: this.opts.rotationInvariant });
        const assoc = this.memory.associate(signature, label);
        return {
            status: "learned",
            label: assoc.label,
            confidence: assoc.confidence,
            exposures: assoc.exposures,
            signature: signature.key,
        };
    }

    identify(pattern: GroundingPattern): IdentifyResult {
        const signature = computeSignature(pattern, { rotationInvariant: this.opts.rotationInvariant });
        const candidates = this.memory.lookup(signature);
        const top = candidates[0];

        if (!top || top.confidence < this.opts.minConfidence) {
            return { status: "unknown", candidates };
        }

        const tied = candidates.filter((c) => Math.abs(c.confidence - top.confidence) < TIE_EPSILON);
        if (tied.length > 1 && this.opts.ambiguityPolicy === "raise") {
            throw new GroundingAmbiguousError(tied.map((c) => c.label), top.confidence, candidates);
        }

        return {
            status: "known",
            label: top.label,
            confidence: top.confidence,
            ambiguous: tied.length > 1,
            candidates,
        };
    }

    /** Apply the configured decay rule once */
    decay(): void {
        this.memory.decay(this.opts.decayPerTick);
    }
}
