/**
 * SemanticMemory — learned pattern → label associations.
 *
 * Associations are keyed by (signature key, label), so one label can be
 * grounded in many patterns and one pattern can carry several labels.
 * Confidence only changes through associate() and the explicit decay()
 * rule, and always stays within [0, 1].
 */

import { hammingDistance, similarity, type PatternSignature } from "../grounding/signature.js";
import type {
    SemanticAssociation,
    SemanticCandidate,
    SemanticConcept,
} from "./interface.js";

export interface SemanticMemoryOptions {
    /** Confidence of a first exposure */
    initialConfidence: number;
    /** Added on each repeated exposure of the same (signature, label) */
    confidenceIncrement: number;
    /** Fuzzy matches further than this Hamming distance are ignored */
    maxHammingDistance: number;
}

const MAX_CONFIDENCE = 1;

function clampConfidence(value: number): number {
    return Math.min(MAX_CONFIDENCE, Math.max(0, value));
}

export class SemanticMemory {
    private readonly associations = new Map<string, SemanticAssociation>();
    private seq = 0;

    constructor(private readonly opts: SemanticMemoryOptions) { }

    get size(): number {
        return this.associations.size;
    }

    /** Create the association or strengthen it by the fixed increment */
    associate(signature: PatternSignature, label: string): SemanticAssociation {
        const id = associationId(signature, label);
        const existing = this.associations.get(id);
        this.seq++;

        const next: SemanticAssociation = existing
            ? {
                ...existing,
                confidence: clampConfidence(existing.confidence + this.opts.confidenceIncrement),
                exposures: existing.exposures + 1,
                reinforcedSeq: this.seq,
            }
            : {
                signature,
                label,
                confidence: clampConfidence(this.opts.initialConfidence),
                exposures: 1,
                reinforcedSeq: this.seq,
            };

        this.associations.set(id, next);
        return { ...next };
    }

    /**
     * Candidate labels for a signature, best first.
     * Exact matches score their confidence; fuzzy ones confidence * similarity.
     * Per label only the best-scoring association counts for the score.
     * Ties are broken by the most recently reinforced label, across all of
     * that label's signatures.
     */
    lookup(signature: PatternSignature): SemanticCandidate[] {
        const byLabel = new Map<string, SemanticCandidate>();

        for (const assoc of this.associations.values()) {
            const distance = hammingDistance(signature, assoc.signature);
            if (!Number.isFinite(distance) || distance > this.opts.maxHammingDistance) continue;

            const sim = assoc.signature.key === signature.key ? 1 : similarity(signature, assoc.signature);
            const candidate: SemanticCandidate = {
                label: assoc.label,
                confidence: assoc.confidence * sim,
                similarity: sim,
                reinforcedSeq: assoc.reinforcedSeq,
            };

            const current = byLabel.get(assoc.label);
            if (!current) {
                byLabel.set(assoc.label, candidate);
                continue;
            }
            const best = compareCandidates(candidate, current) < 0 ? candidate : current;
            byLabel.set(assoc.label, {
                ...best,
                reinforcedSeq: Math.max(candidate.reinforcedSeq, current.reinforcedSeq),
            });
        }

        return [...byLabel.values()].sort(compareCandidates);
    }

    /**
     * The decay rule: lower every association by `amount`, floored at 0.
     * Nothing else reduces confidence.
     */
    decay(amount: number): void {
        if (amount <= 0) return;
        for (const [id, assoc] of this.associations) {
            this.associations.set(id, { ...assoc, confidence: clampConfidence(assoc.confidence - amount) });
        }
    }

    list(): SemanticAssociation[] {
        return [...this.associations.values()].map((a) => ({ ...a }));
    }

    /** Associations grouped by label, strongest label first */
    concepts(): SemanticConcept[] {
        const byLabel = new Map<string, SemanticConcept>();
        for (const assoc of this.associations.values()) {
            const concept = byLabel.get(assoc.label);
            if (!concept) {
                byLabel.set(assoc.label, {
                    label: assoc.label,
                    signatures: [assoc.signature],
                    confidence: assoc.confidence,
                    exposures: assoc.exposures,
                    reinforcedSeq: assoc.reinforcedSeq,
                });
                continue;
            }
            concept.signatures.push(assoc.signature);
            concept.confidence = Math.max(concept.confidence, assoc.confidence);
            concept.exposures += assoc.exposures;
            concept.reinforcedSeq = Math.max(concept.reinforcedSeq, assoc.reinforcedSeq);
        }
        return [...byLabel.values()].sort(
            (a, b) => b.confidence - a.confidence || b.reinforcedSeq - a.reinforcedSeq,
        );
    }

    clear(): void {
        this.associations.clear();
        this.seq = 0;
    }
}

function associationId(signature: PatternSignature, label: string): string {
    return `${signature.key}\u0000${label}`;
}

function compareCandidates(a: SemanticCandidate, b: SemanticCandidate): number {
    return b.confidence - a.confidence || b.reinforcedSeq - a.reinforcedSeq;
}
