import { z, ZodError } from "zod";
import { ConfigError } from "./errors/index.js";
import { ACTIONS, GRID_SYMBOLS, OBJECT_KINDS } from "./environment/interface.js";

// ═══════════════════════════════════════════════════════
//                  Kernel Configuration
// ═══════════════════════════════════════════════════════

const positionSchema = z.object({
    row: z.number().int().min(0),
    col: z.number().int().min(0),
});

const shapeSchema = z
    .array(z.array(z.union([z.literal(0), z.literal(1)])).min(1))
    .min(1)
    .refine((rows) => rows.every((r) => r.length === rows[0].length), {
        message: "shape rows must all have the same width",
    });

const objectSpecSchema = z.object({
    id: z.string().min(1).max(64).optional(),
    kind: z.enum(OBJECT_KINDS).optional(),
    position: positionSchema,
    shape: shapeSchema.nullable().optional(),
});

const gridSchema = z
    .object({
        /** Grid height in cells */
        rows: z.number().int().min(1).max(256).default(5),
        /** Grid width in cells */
        cols: z.number().int().min(1).max(256).default(5),
        /** Randomly placed objects; ignored when `objects` is given */
        objectCount: z.number().int().min(0).default(2),
        /** Chebyshev view radius; omit for full visibility */
        viewRadius: z.number().int().min(0).optional(),
        /** Fixed agent start cell; omit for a seeded random start */
        agentStart: positionSchema.optional(),
        /** Hand-placed object layout */
        objects: z.array(objectSpecSchema).max(1024).optional(),
    })
    .superRefine((grid, ctx) => {
        if (grid.objectCount > grid.rows * grid.cols - 1) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["objectCount"],
                message: `${grid.objectCount} objects do not fit a ${grid.rows}x${grid.cols} grid`,
            });
        }
        const cells = [grid.agentStart, ...(grid.objects ?? []).map((o) => o.position)];
        cells.forEach((p, i) => {
            if (p && (p.row >= grid.rows || p.col >= grid.cols)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: i === 0 ? ["agentStart"] : ["objects", i - 1, "position"],
                    message: `cell ${p.row},${p.col} is outside the grid`,
                });
            }
        });

        const objects = grid.objects ?? [];
        const start = grid.agentStart;
        if (start) {
            const index = objects.findIndex((o) => o.position.row === start.row && o.position.col === start.col);
            if (index >= 0) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ["agentStart"],
                    message: `cell ${start.row},${start.col} is taken by objects.${index}`,
                });
            }
        } else if (grid.objects) {
            const taken = new Set(objects.map((o) => `${o.position.row},${o.position.col}`));
            if (taken.size >= grid.rows * grid.cols) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ["objects"],
                    message: `no free cell left for the agent in a ${grid.rows}x${grid.cols} grid`,
                });
            }
        }
    });

const unit = z.number().min(0).max(1);

export const kernelConfigSchema = z.object({
    /** Seed for GridWorld placement; same seed ⇒ same layout */
    seed: z.number().int().default(0),
    grid: gridSchema.default({}),
    workingMemory: z
        .object({
            /** Maximum salient items held at once (LRU eviction) */
            capacity: z.number().int().min(1).max(64).default(7),
        })
        .default({}),
    episodic: z
        .object({
            /** Eviction ceiling; oldest records are dropped first */
            maxRecords: z.number().int().min(1).default(1000),
        })
        .default({}),
    semantic: z
        .object({
            /** Confidence of a first labelled exposure */
            initialConfidence: unit.default(0.4),
            /** Confidence added per repeated exposure, capped at 1 */
            confidenceIncrement: unit.default(0.2),
            /** Largest Hamming distance still treated as "close enough" */
            maxHammingDistance: z.number().int().min(0).default(1),
        })
        .default({}),
    grounding: z
        .object({
            /** Minimum confidence for a known answer; below it the answer is "unknown" */
            minConfidence: unit.default(0.5),
            rotationInvariant: z.boolean().default(false),
            ambiguityPolicy: z.enum(["rank", "raise"]).default("rank"),
            /** Per-tick confidence decay; 0 disables the decay rule */
            decayPerTick: unit.default(0),
            /** Positions used when a lesson targets the agent's own trajectory */
            trajectoryWindow: z.number().int().min(2).max(64).default(4),
        })
        .default({}),
    affect: z
        .object({
            noveltyThreshold: unit.default(0.5),
            boredomWindow: z.number().int().min(1).default(3),
            boredomIncrement: unit.default(0.25),
            /** Curiosity at or above this makes the agent approach visible objects */
            curiosityThreshold: unit.default(0.5),
        })
        .default({}),
});

export type KernelConfig = z.infer<typeof kernelConfigSchema>;
export type KernelConfigInput = z.input<typeof kernelConfigSchema>;

function toConfigError(err: ZodError): ConfigError {
    return new ConfigError(
        err.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
        err,
    );
}

export function parseKernelConfig(raw: unknown = {}): KernelConfig {
    const parsed = kernelConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw toConfigError(parsed.error);
    }
    return parsed.data;
}

// ═══════════════════════════════════════════════════════
//                  Lessons & Questions
// ═══════════════════════════════════════════════════════

const labelSchema = z.string().trim().min(1).max(64);

const lessonTargetSchema = z.union([
    z.object({ source: z.literal("nearest") }),
    z.object({ source: z.literal("object"), objectId: z.string().min(1) }),
    z.object({ source: z.literal("trajectory"), window: z.number().int().min(2).max(64).optional() }),
    z.object({ source: z.literal("shape"), cells: shapeSchema }),
]);

export type LessonTarget = z.infer<typeof lessonTargetSchema>;

export function parseLabel(raw: unknown): string {
    const parsed = labelSchema.safeParse(raw);
    if (!parsed.success) {
        throw toConfigError(parsed.error);
    }
    return parsed.data;
}

export function parseLessonTarget(raw: unknown): LessonTarget {
    const parsed = lessonTargetSchema.safeParse(raw ?? { source: "nearest" });
    if (!parsed.success) {
        throw toConfigError(parsed.error);
    }
    return parsed.data;
}

// ═══════════════════════════════════════════════════════
//                  MindState Snapshots
// ═══════════════════════════════════════════════════════

const candidateSchema = z.object({
    label: z.string(),
    confidence: unit,
    similarity: unit,
    reinforcedSeq: z.number().int(),
});

const groundingSchema = z.discriminatedUnion("status", [
    z.object({
        status: z.literal("learned"),
        label: z.string(),
        confidence: unit,
        exposures: z.number().int().min(1),
        signature: z.string(),
    }),
    z.object({
        status: z.literal("known"),
        label: z.string(),
        confidence: unit,
        ambiguous: z.boolean(),
        candidates: z.array(candidateSchema),
    }),
    z.object({
        status: z.literal("unknown"),
        candidates: z.array(candidateSchema),
    }),
    z.object({
        status: z.literal("no_pattern"),
        reason: z.string(),
    }),
]);

const observationSchema = z.object({
    agent: z.object({
        position: positionSchema,
        orientation: z.enum(["up", "down", "left", "right"]),
    }),
    visibleObjects: z.array(
        z.object({
            id: z.string(),
            kind: z.enum(OBJECT_KINDS),
            symbol: z.enum(GRID_SYMBOLS),
            position: positionSchema,
            relativePosition: z.object({ row: z.number().int(), col: z.number().int() }),
            shape: shapeSchema.nullable(),
        }),
    ),
    grid: z.array(z.array(z.enum(GRID_SYMBOLS))),
});

const affectSchema = z.object({
    novelty: unit,
    boredom: unit,
    curiosity: unit,
    surprise: unit,
    lowNoveltyStreak: z.number().int().min(0),
});

const workingMemoryItemSchema = z.discriminatedUnion("kind", [
    z.object({
        key: z.string(),
        kind: z.literal("percept"),
        value: z.object({ position: positionSchema, visibleObjectIds: z.array(z.string()) }),
    }),
    z.object({
        key: z.string(),
        kind: z.literal("object"),
        value: z.object({ id: z.string(), position: positionSchema, distance: z.number().int().min(0) }),
    }),
    z.object({
        key: z.string(),
        kind: z.literal("focus"),
        value: z.object({ skill: z.string() }),
    }),
    z.object({
        key: z.string(),
        kind: z.literal("grounding"),
        value: groundingSchema,
    }),
    z.object({
        key: z.string(),
        kind: z.literal("action"),
        value: z.object({ action: z.enum(ACTIONS), source: z.enum(["skill", "fallback"]) }),
    }),
]);

export const mindStateSnapshotSchema = z.object({
    tick: z.number().int().min(0),
    status: z.enum(["running", "terminated"]),
    observation: observationSchema,
    workingMemory: z.array(workingMemoryItemSchema),
    affect: affectSchema,
    lastAction: z.enum(ACTIONS).nullable(),
    actionSource: z.enum(["skill", "fallback"]).nullable(),
    skill: z.string().nullable(),
    grounding: groundingSchema.nullable(),
    fallback: z
        .object({ code: z.string(), message: z.string() })
        .nullable(),
});
