/**
 * MindKernel — the cognitive control loop.
 *
 * One tick walks the phase machine:
 *   idle → perceiving → updating → action_selecting → acting → idle
 *
 *   perceiving        pull the current observation from the environment
 *   updating          fold it into working memory, derive affect from the
 *                     episodic log, run a pending lesson or question
 *   action_selecting  pick a skill and let procedural memory produce the
 *                     action; any failure here becomes "stay"
 *   acting            submit the action and append the episodic record
 *
 * Everything inside a tick is synchronous. The kernel owns the environment
 * and every memory store; callers only see frozen MindState snapshots.
 */

import { GridWorld } from "../environment/gridWorld.js";
import {
    assertGrid,
    manhattan,
    type Action,
    type IEnvironment,
    type Observation,
    type VisibleObject,
} from "../environment/interface.js";
import { GroundingAmbiguousError, KernelError } from "../errors/index.js";
import { WorkingMemory } from "../memory/working.js";
import { EpisodicMemory } from "../memory/episodic.js";
import { SemanticMemory } from "../memory/semantic.js";
import { ProceduralMemory } from "../memory/procedural.js";
import { registerDefaultSkills } from "../memory/skills.js";
import type {
    ActionSource,
    EpisodicPredicate,
    EpisodicRecord,
    ProceduralRoutine,
    SemanticConcept,
    WorkingMemoryItem,
} from "../memory/interface.js";
import { NEUTRAL_AFFECT, countVisits, deriveAffect, type AffectState } from "../affect/tracker.js";
import { GroundingEngine, type GroundingResult, type IdentifyResult } from "../grounding/engine.js";
import { extractNeighborhood, type GroundingPattern } from "../grounding/signature.js";
import { silentLogger, type Logger } from "../logger.js";
import {
    createMetrics,
    METRIC_EPISODIC_SIZE,
    METRIC_FALLBACKS,
    METRIC_LESSONS,
    METRIC_RECOGNISED,
    METRIC_TICKS,
    METRIC_UNKNOWN,
    METRIC_WORKING_MEMORY_SIZE,
    type MetricsRegistry,
} from "../metrics.js";
import {
    parseKernelConfig,
    parseLabel,
    parseLessonTarget,
    type KernelConfig,
    type KernelConfigInput,
    type LessonTarget,
} from "../validation.js";
import { chooseSkill } from "./actionSelector.js";
import { createMindState, type FallbackRecord, type MindState } from "./mindState.js";

// ═══════════════════════════════════════════════════════
//                   Phases
// ═══════════════════════════════════════════════════════

export type KernelPhase =
    | "idle"
    | "perceiving"
    | "updating"
    | "action_selecting"
    | "acting"
    | "terminated";

const TRANSITIONS: Record<KernelPhase, readonly KernelPhase[]> = {
    idle: ["perceiving", "terminated"],
    perceiving: ["updating"],
    updating: ["action_selecting"],
    action_selecting: ["acting"],
    acting: ["idle"],
    terminated: [],
};

export interface KernelDeps {
    /** Defaults to a GridWorld built from config.grid */
    environment?: IEnvironment;
    logger?: Logger;
    metrics?: MetricsRegistry;
}

interface Selection {
    action: Action;
    skill: string | null;
    source: ActionSource;
    fallback: FallbackRecord | null;
}

// ═══════════════════════════════════════════════════════
//                   Kernel
// ═══════════════════════════════════════════════════════

export class MindKernel {
    readonly config: KernelConfig;

    private readonly env: IEnvironment;
    private readonly log: Logger;
    /** Counters for this kernel; a fresh registry unless one is injected */
    readonly metrics: MetricsRegistry;

    private readonly working: WorkingMemory;
    private readonly episodic: EpisodicMemory;
    private readonly semantic: SemanticMemory;
    private readonly procedural = new ProceduralMemory();
    private readonly grounding: GroundingEngine;

    private currentPhase: KernelPhase = "idle";
    private tickCount = 0;
    private seed: number;
    private pendingLesson: { label: string; target: LessonTarget } | null = null;
    private pendingQuestion: LessonTarget | null = null;
    private state: MindState;

    constructor(config: KernelConfigInput = {}, deps: KernelDeps = {}) {
        this.config = parseKernelConfig(config);
        this.seed = this.config.seed;
        this.log = deps.logger ?? silentLogger;
        this.metrics = deps.metrics ?? createMetrics();

        this.working = new WorkingMemory(this.config.workingMemory.capacity);
        this.episodic = new EpisodicMemory(this.config.episodic.maxRecords);
        this.semantic = new SemanticMemory(this.config.semantic);
        this.grounding = new GroundingEngine(this.semantic, this.config.grounding);
        registerDefaultSkills(this.procedural);

        if (deps.environment) {
            this.env = deps.environment;
            this.env.reset(this.seed);
        } else {
            this.env = new GridWorld(this.config.grid, this.seed);
        }

        this.state = this.initialState();
    }

    // ── Inspection ─────────────────────────────────────

    get phase(): KernelPhase {
        return this.currentPhase;
    }

    /** Completed ticks since construction or the last reset */
    get currentTick(): number {
        return this.tickCount;
    }

    /** Latest MindState (tick 0 before the first step) */
    snapshot(): MindState {
        return this.state;
    }

    history(predicate?: EpisodicPredicate): Iterable<EpisodicRecord> {
        return this.episodic.query(predicate);
    }

    concepts(): SemanticConcept[] {
        return this.semantic.concepts();
    }

    workingMemory(): WorkingMemoryItem[] {
        return this.working.contents();
    }

    skills(): string[] {
        return this.procedural.names();
    }

    // ── Instruction ────────────────────────────────────

    /** Queue a labelled exposure; it is applied during the next tick */
    teach(label: string, target?: LessonTarget): void {
        this.pendingLesson = { label: parseLabel(label), target: parseLessonTarget(target) };
    }

    /** Queue a "what is this?" question for the next tick */
    ask(target?: LessonTarget): void {
        this.pendingQuestion = parseLessonTarget(target);
    }

    /** Query semantic memory directly, outside the tick loop */
    identify(pattern: GroundingPattern): IdentifyResult {
        return this.grounding.identify(pattern);
    }

    /** Pin a skill as the current focus; action selection follows it until cleared */
    setGoal(skill: string): void {
        this.working.push({ key: "focus", kind: "focus", value: { skill } });
    }

    clearGoal(): void {
        this.working.remove("focus");
    }

    registerSkill(name: string, routine: ProceduralRoutine): void {
        this.procedural.register(name, routine);
    }

    // ── Lifecycle ──────────────────────────────────────

    /**
     * Start a new run: rebuild the world and forget working and episodic
     * memory. Learned concepts and skills carry over.
     */
    reset(seed: number = this.seed): MindState {
        this.assertRunning();
        this.seed = seed;
        this.env.reset(seed);
        this.working.clear();
        this.episodic.clear();
        this.pendingLesson = null;
        this.pendingQuestion = null;
        this.tickCount = 0;
        this.state = this.initialState();
        return this.state;
    }

    /** Terminal; tick() and reset() fail afterwards */
    shutdown(): MindState {
        if (this.currentPhase === "terminated") return this.state;
        this.transition("terminated");
        this.state = createMindState({ ...this.state, status: "terminated" });
        this.log.info(`[tick ${this.tickCount}] kernel shut down`);
        return this.state;
    }

    // ── Tick ───────────────────────────────────────────

    tick(): MindState {
        this.assertRunning();
        const tick = this.tickCount + 1;

        try {
            this.transition("perceiving");
            const observation = this.env.observe();
            assertGrid(observation.grid);

            this.transition("updating");
            const affect = deriveAffect(this.episodic.all(), observation, this.config.affect);
            this.foldObservation(observation);
            this.grounding.decay();
            const grounding = this.runPendingGrounding(observation, tick);

            this.transition("action_selecting");
            let selection = this.selectAction(observation, affect, tick);

            this.transition("acting");
            selection = this.submit(selection, tick);
            this.working.push({
                key: "action",
                kind: "action",
                value: { action: selection.action, source: selection.source },
            });
            this.episodic.record({ tick, observation, action: selection.action, affect });

            this.tickCount = tick;
            this.transition("idle");

            this.state = createMindState({
                tick,
                status: "running",
                observation,
                workingMemory: this.working.contents(),
                affect,
                lastAction: selection.action,
                actionSource: selection.source,
                skill: selection.skill,
                grounding,
                fallback: selection.fallback,
            });
        } catch (err) {
            // The tick did not complete; leave the machine ready for the next one
            this.currentPhase = "idle";
            throw err;
        }

        this.metrics.inc(METRIC_TICKS);
        this.metrics.set(METRIC_WORKING_MEMORY_SIZE, this.working.size);
        this.metrics.set(METRIC_EPISODIC_SIZE, this.episodic.size);
        this.log.debug(
            `[tick ${tick}] ${this.state.lastAction} via ${this.state.skill ?? "-"}`,
            `novelty=${this.state.affect.novelty.toFixed(2)} boredom=${this.state.affect.boredom.toFixed(2)}`,
        );
        return this.state;
    }

    // ── Phase helpers ──────────────────────────────────

    private foldObservation(observation: Observation): void {
        const agent = observation.agent.position;
        this.working.push({
            key: "percept",
            kind: "percept",
            value: {
                position: { ...agent },
                visibleObjectIds: observation.visibleObjects.map((o) => o.id),
            },
        });

        // Farthest first so the nearest object ends up most recently used
        const byDistance = [...observation.visibleObjects]
            .map((o) => ({ o, distance: manhattan(agent, o.position) }))
            .sort((a, b) => b.distance - a.distance);
        for (const { o, distance } of byDistance) {
            this.working.push({
                key: `object:${o.id}`,
                kind: "object",
                value: { id: o.id, position: { ...o.position }, distance },
            });
        }
    }

    private runPendingGrounding(observation: Observation, tick: number): GroundingResult | null {
        let result: GroundingResult | null = null;

        if (this.pendingLesson) {
            const { label, target } = this.pendingLesson;
            this.pendingLesson = null;
            const pattern = this.extractPattern(target, observation);
            if ("reason" in pattern) {
                result = { status: "no_pattern", reason: pattern.reason };
                this.log.warn(`[tick ${tick}] lesson "${label}" skipped: ${pattern.reason}`);
            } else {
                result = this.grounding.learn(pattern, label);
                this.metrics.inc(METRIC_LESSONS);
                this.log.info(`[tick ${tick}] learned "${label}" confidence=${result.confidence.toFixed(2)}`);
            }
        }

        if (this.pendingQuestion) {
            const target = this.pendingQuestion;
            this.pendingQuestion = null;
            const pattern = this.extractPattern(target, observation);
            if ("reason" in pattern) {
                result = { status: "no_pattern", reason: pattern.reason };
            } else {
                result = this.answer(pattern, tick);
            }
        }

        if (result) {
            this.working.push({ key: "grounding", kind: "grounding", value: result });
        }
        return result;
    }

    private answer(pattern: GroundingPattern, tick: number): IdentifyResult {
        try {
            const result = this.grounding.identify(pattern);
            this.metrics.inc(result.status === "known" ? METRIC_RECOGNISED : METRIC_UNKNOWN);
            return result;
        } catch (err) {
            if (err instanceof GroundingAmbiguousError) {
                this.log.warn(`[tick ${tick}] ${err.message}`);
                this.metrics.inc(METRIC_UNKNOWN);
                return { status: "unknown", candidates: err.candidates };
            }
            throw err;
        }
    }

    private extractPattern(
        target: LessonTarget,
        observation: Observation,
    ): GroundingPattern | { reason: string } {
        switch (target.source) {
            case "shape":
                return { kind: "shape", cells: target.cells };
            case "object": {
                const obj = observation.visibleObjects.find((o) => o.id === target.objectId);
                return obj
                    ? objectPattern(obj, observation)
                    : { reason: `object ${target.objectId} is not in view` };
            }
            case "nearest": {
                const agent = observation.agent.position;
                let nearest: VisibleObject | undefined;
                for (const o of observation.visibleObjects) {
                    if (!nearest || manhattan(agent, o.position) < manhattan(agent, nearest.position)) {
                        nearest = o;
                    }
                }
                return nearest ? objectPattern(nearest, observation) : { reason: "no object in view" };
            }
            case "trajectory": {
                const window = target.window ?? this.config.grounding.trajectoryWindow;
                const past = this.episodic.all().slice(-(window - 1));
                const points = [...past.map((r) => r.observation.agent.position), observation.agent.position];
                return points.length < 2
                    ? { reason: "not enough movement history" }
                    : { kind: "trajectory", points };
            }
        }
    }

    private selectAction(observation: Observation, affect: AffectState, tick: number): Selection {
        let skill: string | null = null;
        try {
            const contents = this.working.contents();
            const choice = chooseSkill(contents, affect, this.config.affect.curiosityThreshold);
            skill = choice.skill;
            if (choice.reason === "focus") {
                this.working.get("focus");
            }
            const action = this.procedural.invoke(skill, {
                observation,
                visitCounts: countVisits(this.episodic.query(), observation),
                workingMemory: contents,
            });
            return { action, skill, source: "skill", fallback: null };
        } catch (err) {
            return this.fallback(err, skill, tick, "action selection");
        }
    }

    /** Hand the action to the environment; a rejected action becomes "stay" */
    private submit(selection: Selection, tick: number): Selection {
        try {
            this.env.step(selection.action);
            return selection;
        } catch (err) {
            if (selection.action === "stay") throw err;
            const fallback = this.fallback(err, selection.skill, tick, "submitting the action");
            this.env.step("stay");
            return fallback;
        }
    }

    private fallback(err: unknown, skill: string | null, tick: number, during: string): Selection {
        // Only kernel contract violations are recoverable here; anything else is a bug
        if (!(err instanceof KernelError)) throw err;
        this.metrics.inc(METRIC_FALLBACKS);
        this.log.warn(`[tick ${tick}] ${during} failed (${err.code}): ${err.message}; staying put`);
        return {
            action: "stay",
            skill,
            source: "fallback",
            fallback: { code: err.code, message: err.message },
        };
    }

    // ── Machinery ──────────────────────────────────────

    private transition(next: KernelPhase): void {
        if (!TRANSITIONS[this.currentPhase].includes(next)) {
            throw new KernelError(
                `Illegal kernel transition ${this.currentPhase} → ${next}`,
                { code: "INVALID_TRANSITION" },
            );
        }
        this.currentPhase = next;
    }

    private assertRunning(): void {
        if (this.currentPhase === "terminated") {
            throw new KernelError("Kernel has been shut down", { code: "KERNEL_TERMINATED" });
        }
    }

    private initialState(): MindState {
        return createMindState({
            tick: 0,
            status: "running",
            observation: this.env.observe(),
            workingMemory: [],
            affect: NEUTRAL_AFFECT,
            lastAction: null,
            actionSource: null,
            skill: null,
            grounding: null,
            fallback: null,
        });
    }
}

function objectPattern(obj: VisibleObject, observation: Observation): GroundingPattern {
    return {
        kind: "shape",
        cells: obj.shape ?? extractNeighborhood(observation.grid, obj.position),
    };
}
