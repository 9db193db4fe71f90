/**
 * ProceduralMemory — named skills the action selector can invoke.
 *
 * A skill is a routine that generates an action sequence for the current
 * context. invoke() takes the first action (or "stay" when the routine has
 * nothing to do); plan() unrolls several steps without touching the world.
 */

import { InvalidActionError, SkillNotFoundError } from "../errors/index.js";
import { isAction, type Action } from "../environment/interface.js";
import type { ProceduralEntry, ProceduralRoutine, SkillContext } from "./interface.js";

export class ProceduralMemory {
    private readonly skills = new Map<string, ProceduralEntry>();

    /** Register or replace a skill; the invocation count survives replacement */
    register(name: string, routine: ProceduralRoutine): void {
        const invocations = this.skills.get(name)?.invocations ?? 0;
        this.skills.set(name, { name, routine, invocations });
    }

    has(name: string): boolean {
        return this.skills.has(name);
    }

    names(): string[] {
        return [...this.skills.keys()];
    }

    invocations(name: string): number {
        return this.require(name).invocations;
    }

    invoke(name: string, context: SkillContext): Action {
        const entry = this.require(name);
        entry.invocations++;
        for (const action of entry.routine(context)) {
            return toAction(action);
        }
        return "stay";
    }

    /** First `maxSteps` actions the skill would take from this context */
    plan(name: string, context: SkillContext, maxSteps: number): Action[] {
        const entry = this.require(name);
        const out: Action[] = [];
        if (maxSteps <= 0) return out;
        for (const action of entry.routine(context)) {
            out.push(toAction(action));
            if (out.length >= maxSteps) break;
        }
        return out;
    }

    private require(name: string): ProceduralEntry {
        const entry = this.skills.get(name);
        if (!entry) {
            throw new SkillNotFoundError(name);
        }
        return entry;
    }
}

function toAction(value: string): Action {
    if (!isAction(value)) {
        throw new InvalidActionError(value);
    }
    return value;
}
