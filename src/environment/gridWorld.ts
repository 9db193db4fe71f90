/**
 * GridWorld — deterministic 2D environment for the mind kernel.
 *
 * - Discrete rows x cols grid, one agent, a few objects.
 * - Object layout is drawn from a seedrandom PRNG at reset(); nothing
 *   random happens afterwards, so (seed, actions) fully determines
 *   every observation.
 * - Moves clamp at the border and are blocked by occupied cells.
 */

import seedrandom from "seedrandom";
import { ConfigError, InvalidActionError } from "../errors/index.js";
import { deepFreeze } from "../utils/freeze.js";
import { SHAPE_LIBRARY } from "./shapes.js";
import {
    isAction,
    positionKey,
    type Action,
    type GridSymbol,
    type IEnvironment,
    type ObjectKind,
    type Observation,
    type Orientation,
    type Position,
    type ShapePattern,
    type VisibleObject,
} from "./interface.js";

// ═══════════════════════════════════════════════════════
//                    Configuration
// ═══════════════════════════════════════════════════════

/** Hand-placed object; replaces random placement when given */
export interface ObjectSpec {
    id?: string;
    kind?: ObjectKind;
    position: Position;
    shape?: ShapePattern | null;
}

export interface GridWorldConfig {
    rows: number;
    cols: number;
    /** Number of randomly placed objects (ignored when `objects` is set) */
    objectCount: number;
    /** Chebyshev radius of the agent's view; unset means everything is visible */
    viewRadius?: number;
    /** Fixed agent start; unset means a seeded random cell */
    agentStart?: Position;
    /** Explicit object layout */
    objects?: readonly ObjectSpec[];
}

export interface GridObject {
    id: string;
    kind: ObjectKind;
    position: Position;
    shape: ShapePattern | null;
}

const KIND_SYMBOL: Record<ObjectKind, GridSymbol> = {
    block: "O",
    wall: "#",
    treasure: "*",
};

const MOVES: Record<Orientation, Position> = {
    up: { row: -1, col: 0 },
    down: { row: 1, col: 0 },
    left: { row: 0, col: -1 },
    right: { row: 0, col: 1 },
};

// ═══════════════════════════════════════════════════════
//                    GridWorld
// ═══════════════════════════════════════════════════════

export class GridWorld implements IEnvironment {
    private agentPosition: Position = { row: 0, col: 0 };
    private orientation: Orientation = "up";
    private objects: GridObject[] = [];
    private grid: GridSymbol[][] = [];
    private currentSeed = 0;

    constructor(private readonly config: GridWorldConfig, seed = 0) {
        if (!Number.isInteger(config.rows) || !Number.isInteger(config.cols) || config.rows < 1 || config.cols < 1) {
            throw new ConfigError([`grid must be at least 1x1, got ${config.rows}x${config.cols}`]);
        }
        this.reset(seed);
    }

    get seed(): number {
        return this.currentSeed;
    }

    // ── Core environment API ───────────────────────────

    reset(seed: number): Observation {
        const rng = seedrandom(String(seed));
        const explicit = this.config.objects;
        const start = this.drawStart(rng, explicit);
        const objects = explicit
            ? this.placeExplicit(explicit, start)
            : this.placeRandom(rng, start);

        // Commit only once the whole layout is valid
        this.currentSeed = seed;
        this.orientation = "up";
        this.agentPosition = start;
        this.objects = objects;
        this.paint();
        return this.observe();
    }

    step(action: string): Observation {
        if (!isAction(action)) {
            throw new InvalidActionError(action);
        }
        if (action !== "stay") {
            this.move(action);
        }
        this.paint();
        return this.observe();
    }

    observe(): Observation {
        const agent = this.agentPosition;
        const radius = this.config.viewRadius;
        const visibleObjects: VisibleObject[] = [];

        for (const obj of this.objects) {
            const dRow = obj.position.row - agent.row;
            const dCol = obj.position.col - agent.col;
            if (radius != null && Math.max(Math.abs(dRow), Math.abs(dCol)) > radius) {
                continue;
            }
            visibleObjects.push({
                id: obj.id,
                kind: obj.kind,
                symbol: KIND_SYMBOL[obj.kind],
                position: { ...obj.position },
                relativePosition: { row: dRow, col: dCol },
                shape: obj.shape ? obj.shape.map((row) => [...row]) : null,
            });
        }

        return deepFreeze({
            agent: {
                position: { ...agent },
                orientation: this.orientation,
            },
            visibleObjects,
            grid: this.grid.map((row) => [...row]),
        });
    }

    // ── Convenience ────────────────────────────────────

    /** Human-readable grid, one row per line */
    render(): string {
        return this.grid.map((row) => row.join(" ")).join("\n");
    }

    toJSON(): {
        config: GridWorldConfig;
        seed: number;
        agent: { position: Position; orientation: Orientation };
        objects: GridObject[];
        grid: GridSymbol[][];
    } {
        return {
            config: this.config,
            seed: this.currentSeed,
            agent: { position: { ...this.agentPosition }, orientation: this.orientation },
            objects: this.objects.map((o) => ({ ...o, position: { ...o.position } })),
            grid: this.grid.map((row) => [...row]),
        };
    }

    // ── Internal helpers ───────────────────────────────

    private move(direction: Exclude<Action, "stay">): void {
        const delta = MOVES[direction];
        const target = {
            row: Math.max(0, Math.min(this.config.rows - 1, this.agentPosition.row + delta.row)),
            col: Math.max(0, Math.min(this.config.cols - 1, this.agentPosition.col + delta.col)),
        };
        this.orientation = direction;
        if (!this.isOccupied(target)) {
            this.agentPosition = target;
        }
    }

    private isOccupied(p: Position): boolean {
        return this.objects.some((o) => o.position.row === p.row && o.position.col === p.col);
    }

    /** Fixed start, or a seeded cell the explicit layout leaves free */
    private drawStart(rng: seedrandom.PRNG, explicit: readonly ObjectSpec[] | undefined): Position {
        const { rows, cols, agentStart } = this.config;
        if (agentStart) {
            this.assertInBounds(agentStart, "agentStart");
            return { ...agentStart };
        }
        if (!explicit) {
            return {
                row: Math.floor(rng() * rows),
                col: Math.floor(rng() * cols),
            };
        }

        const taken = new Set(explicit.map((o) => positionKey(o.position)));
        const free = this.freeCells(taken);
        if (free.length === 0) {
            throw new ConfigError([`no free cell left for the agent in a ${rows}x${cols} grid`]);
        }
        return free[Math.floor(rng() * free.length)];
    }

    private freeCells(occupied: ReadonlySet<string>): Position[] {
        const free: Position[] = [];
        for (let row = 0; row < this.config.rows; row++) {
            for (let col = 0; col < this.config.cols; col++) {
                if (!occupied.has(positionKey({ row, col }))) free.push({ row, col });
            }
        }
        return free;
    }

    private placeRandom(rng: seedrandom.PRNG, start: Position): GridObject[] {
        const { rows, cols, objectCount } = this.config;
        if (objectCount > rows * cols - 1) {
            throw new ConfigError([`objectCount ${objectCount} does not fit a ${rows}x${cols} grid`]);
        }

        const occupied = new Set([positionKey(start)]);
        const placed: GridObject[] = [];
        for (let i = 0; i < objectCount; i++) {
            const free = this.freeCells(occupied);
            const position = free[Math.floor(rng() * free.length)];
            const shape = SHAPE_LIBRARY[Math.floor(rng() * SHAPE_LIBRARY.length)].pattern;
            occupied.add(positionKey(position));
            placed.push({ id: `obj-${i + 1}`, kind: "block", position, shape });
        }
        return placed;
    }

    private placeExplicit(specs: readonly ObjectSpec[], start: Position): GridObject[] {
        const occupied = new Set([positionKey(start)]);
        const issues: string[] = [];
        const placed: GridObject[] = [];

        specs.forEach((spec, i) => {
            const id = spec.id ?? `obj-${i + 1}`;
            const key = positionKey(spec.position);
            if (!this.inBounds(spec.position)) {
                issues.push(`${id} at ${key} is outside the grid`);
                return;
            }
            if (occupied.has(key)) {
                issues.push(`${id} at ${key} overlaps another occupant`);
                return;
            }
            occupied.add(key);
            placed.push({
                id,
                kind: spec.kind ?? "block",
                position: { ...spec.position },
                shape: spec.shape ?? null,
            });
        });

        if (issues.length > 0) {
            throw new ConfigError(issues);
        }
        return placed;
    }

    private paint(): void {
        const { rows, cols } = this.config;
        const grid: GridSymbol[][] = [];
        for (let r = 0; r < rows; r++) {
            grid.push(new Array<GridSymbol>(cols).fill("."));
        }
        for (const obj of this.objects) {
            grid[obj.position.row][obj.position.col] = KIND_SYMBOL[obj.kind];
        }
        grid[this.agentPosition.row][this.agentPosition.col] = "A";
        this.grid = grid;
    }

    private inBounds(p: Position): boolean {
        return Number.isInteger(p.row) && Number.isInteger(p.col)
            && p.row >= 0 && p.row < this.config.rows
            && p.col >= 0 && p.col < this.config.cols;
    }

    private assertInBounds(p: Position, label: string): void {
        if (!this.inBounds(p)) {
            throw new ConfigError([`${label} ${positionKey(p)} is outside the ${this.config.rows}x${this.config.cols} grid`]);
        }
    }
}
