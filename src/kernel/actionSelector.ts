/**
 * Action selection — deterministic choice of the next skill.
 *
 * Reads only working memory and affect:
 *   1. a focus goal in working memory wins
 *   2. bored → explore the least visited neighbour
 *   3. next to a visible object → hold and attend to it
 *   4. curious and an object is in view → approach it
 *   5. otherwise explore
 */

import type { AffectState } from "../affect/tracker.js";
import type { WorkingMemoryItem } from "../memory/interface.js";
import { SKILL_APPROACH, SKILL_EXPLORE, SKILL_HOLD } from "../memory/skills.js";

export interface SkillChoice {
    skill: string;
    reason: "focus" | "bored" | "attend" | "curious" | "explore";
}

export function chooseSkill(
    workingMemory: readonly WorkingMemoryItem[],
    affect: AffectState,
    curiosityThreshold: number,
): SkillChoice {
    let focus: string | undefined;
    let visibleIds: string[] = [];
    const objects: { id: string; distance: number }[] = [];

    for (const item of workingMemory) {
        switch (item.kind) {
            case "focus":
                focus = item.value.skill;
                break;
            case "percept":
                visibleIds = item.value.visibleObjectIds;
                break;
            case "object":
                objects.push({ id: item.value.id, distance: item.value.distance });
                break;
            default:
                break;
        }
    }

    if (focus) {
        return { skill: focus, reason: "focus" };
    }
    if (affect.boredom > 0) {
        return { skill: SKILL_EXPLORE, reason: "bored" };
    }

    // Object items can outlive the percept that produced them
    const inView = objects.filter((o) => visibleIds.includes(o.id));
    if (inView.length > 0) {
        const nearest = Math.min(...inView.map((o) => o.distance));
        if (nearest <= 1) {
            return { skill: SKILL_HOLD, reason: "attend" };
        }
        if (affect.curiosity >= curiosityThreshold) {
            return { skill: SKILL_APPROACH, reason: "curious" };
        }
    }

    return { skill: SKILL_EXPLORE, reason: "explore" };
}
