/**
 * Affect tracker — drive signals derived from the episodic log.
 *
 * Nothing here holds state: every value is recomputed from history plus the
 * current observation, so replaying the log always yields the same affect.
 *
 *   novelty   = 1 / (1 + earlier visits to the current cell)
 *   surprise  = 1 when the set of visible objects changed since last tick
 *   boredom   = grows once novelty has stayed low for `boredomWindow` ticks,
 *               back to 0 on any novel tick
 *   curiosity = max(novelty, surprise) * (1 - boredom)
 */

import { positionKey, type Observation } from "../environment/interface.js";
import type { EpisodicRecord } from "../memory/interface.js";

export interface AffectState {
    novelty: number;
    boredom: number;
    curiosity: number;
    surprise: number;
    /** Consecutive ticks, ending now, without a novel observation */
    lowNoveltyStreak: number;
}

export interface AffectOptions {
    /** A tick is novel when novelty is at least this */
    noveltyThreshold: number;
    /** Non-novel ticks tolerated before boredom starts */
    boredomWindow: number;
    /** Boredom added per non-novel tick once the window is exceeded */
    boredomIncrement: number;
}

export const NEUTRAL_AFFECT: AffectState = Object.freeze({
    novelty: 0,
    boredom: 0,
    curiosity: 0,
    surprise: 0,
    lowNoveltyStreak: 0,
});

export function deriveAffect(
    history: readonly EpisodicRecord[],
    current: Observation,
    opts: AffectOptions,
): AffectState {
    const visits = new Map<string, number>();
    let streak = 0;
    let previous: Observation | undefined;

    const visit = (obs: Observation) => {
        const key = positionKey(obs.agent.position);
        const before = visits.get(key) ?? 0;
        visits.set(key, before + 1);

        const novelty = 1 / (1 + before);
        const surprise = previous && !sameVisibleSet(previous, obs) ? 1 : 0;
        streak = novelty >= opts.noveltyThreshold || surprise === 1 ? 0 : streak + 1;
        previous = obs;
        return { novelty, surprise };
    };

    for (const record of history) {
        visit(record.observation);
    }
    const { novelty, surprise } = visit(current);

    const boredom = streak < opts.boredomWindow
        ? 0
        : Math.min(1, (streak - opts.boredomWindow + 1) * opts.boredomIncrement);

    return {
        novelty,
        boredom,
        curiosity: Math.max(novelty, surprise) * (1 - boredom),
        surprise,
        lowNoveltyStreak: streak,
    };
}

/** Visits per cell over the history, plus the current observation if given */
export function countVisits(
    history: Iterable<EpisodicRecord>,
    current?: Observation,
): Map<string, number> {
    const visits = new Map<string, number>();
    const add = (obs: Observation) => {
        const key = positionKey(obs.agent.position);
        visits.set(key, (visits.get(key) ?? 0) + 1);
    };
    for (const record of history) add(record.observation);
    if (current) add(current);
    return visits;
}

function sameVisibleSet(a: Observation, b: Observation): boolean {
    if (a.visibleObjects.length !== b.visibleObjects.length) return false;
    const ids = new Set(a.visibleObjects.map((o) => o.id));
    return b.visibleObjects.every((o) => ids.has(o.id));
}
