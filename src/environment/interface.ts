/**
 * IEnvironment — the world the kernel perceives and acts upon.
 *
 * The kernel only ever talks to the environment through this boundary:
 * action in, observation out. Implementations must be deterministic
 * given (seed, action sequence).
 */

import { InvalidSymbolError } from "../errors/index.js";

// ═══════════════════════════════════════════════════════
//                    Symbols & Geometry
// ═══════════════════════════════════════════════════════

/** Closed grid alphabet: empty, agent, block, wall, treasure */
export const GRID_SYMBOLS = [".", "A", "O", "#", "*"] as const;
export type GridSymbol = (typeof GRID_SYMBOLS)[number];

export const ACTIONS = ["up", "down", "left", "right", "stay"] as const;
export type Action = (typeof ACTIONS)[number];
export type Orientation = Exclude<Action, "stay">;

export const OBJECT_KINDS = ["block", "wall", "treasure"] as const;
export type ObjectKind = (typeof OBJECT_KINDS)[number];

export interface Position {
    row: number;
    col: number;
}

/** Rectangular 0/1 matrix, row-major */
export type ShapePattern = readonly (readonly number[])[];

// ═══════════════════════════════════════════════════════
//                    Observation Data
// ═══════════════════════════════════════════════════════

export interface VisibleObject {
    id: string;
    kind: ObjectKind;
    symbol: GridSymbol;
    /** Absolute grid position */
    position: Position;
    /** Offset from the agent (object - agent) */
    relativePosition: Position;
    /** Surface shape of the object, when it has one */
    shape: ShapePattern | null;
}

/** Snapshot of the world as the agent sees it at one step */
export interface Observation {
    agent: {
        position: Position;
        orientation: Orientation;
    };
    visibleObjects: readonly VisibleObject[];
    grid: readonly (readonly GridSymbol[])[];
}

// ═══════════════════════════════════════════════════════
//                    IEnvironment Interface
// ═══════════════════════════════════════════════════════

export interface IEnvironment {
    /** Rebuild the world from a seed and return the first observation */
    reset(seed: number): Observation;
    /** Apply one action; throws InvalidActionError for anything outside ACTIONS */
    step(action: string): Observation;
    /** Current observation without advancing the world */
    observe(): Observation;
}

export function isAction(value: unknown): value is Action {
    return typeof value === "string" && (ACTIONS as readonly string[]).includes(value);
}

export function isGridSymbol(value: unknown): value is GridSymbol {
    return typeof value === "string" && (GRID_SYMBOLS as readonly string[]).includes(value);
}

export function samePosition(a: Position, b: Position): boolean {
    return a.row === b.row && a.col === b.col;
}

export function positionKey(p: Position): string {
    return `${p.row},${p.col}`;
}

export function manhattan(a: Position, b: Position): number {
    return Math.abs(a.row - b.row) + Math.abs(a.col - b.col);
}

/** Every row must have the same width and every cell must be in GRID_SYMBOLS */
export function assertGrid(grid: readonly (readonly string[])[]): void {
    const width = grid[0]?.length ?? 0;
    for (const row of grid) {
        if (row.length !== width) {
            throw new InvalidSymbolError(`<ragged row of width ${row.length}, expected ${width}>`);
        }
        for (const cell of row) {
            if (!isGridSymbol(cell)) {
                throw new InvalidSymbolError(cell);
            }
        }
    }
}
