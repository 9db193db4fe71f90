/**
 * Pattern signatures — canonical, comparable forms of grounding patterns.
 *
 * Shapes are cropped to the bounding box of their set cells, so the same
 * shape anywhere in a larger frame yields the same signature. Rotation is
 * folded in only when asked for. Trajectories become their move string
 * (U/D/L/R/S, "?" for a non-unit jump), which is translation invariant.
 *
 * Fuzzy comparison is Hamming distance over a shared frame, so a one-cell
 * change that moves the bounding box is still one cell away.
 */

import { KernelError } from "../errors/index.js";
import type { GridSymbol, Position, ShapePattern } from "../environment/interface.js";

export type GroundingPattern =
    | { kind: "shape"; cells: ShapePattern }
    | { kind: "trajectory"; points: readonly Position[] };

export interface PatternSignature {
    kind: GroundingPattern["kind"];
    /** Canonical key; equal keys mean identical patterns */
    key: string;
    /** Flattened cells ("0"/"1") or move letters */
    bits: string;
    rows: number;
    cols: number;
}

export interface SignatureOptions {
    rotationInvariant?: boolean;
}

// ═══════════════════════════════════════════════════════
//                    Canonicalisation
// ═══════════════════════════════════════════════════════

export function computeSignature(
    pattern: GroundingPattern,
    opts: SignatureOptions = {},
): PatternSignature {
    return pattern.kind === "shape"
        ? shapeSignature(pattern.cells, opts.rotationInvariant ?? false)
        : trajectorySignature(pattern.points, opts.rotationInvariant ?? false);
}

function shapeSignature(cells: ShapePattern, rotationInvariant: boolean): PatternSignature {
    assertBinaryMatrix(cells);
    let best = crop(cells);
    if (rotationInvariant) {
        let rotated = best;
        for (let i = 0; i < 3; i++) {
            rotated = rotateClockwise(rotated);
            if (matrixKey(rotated) < matrixKey(best)) best = rotated;
        }
    }
    const rows = best.length;
    const cols = best[0]?.length ?? 0;
    const bits = best.map((row) => row.join("")).join("");
    return { kind: "shape", key: matrixKey(best), bits, rows, cols };
}

const TURN: Record<string, string> = { U: "R", R: "D", D: "L", L: "U", S: "S", "?": "?" };

function trajectorySignature(points: readonly Position[], rotationInvariant: boolean): PatternSignature {
    let moves = "";
    for (let i = 1; i < points.length; i++) {
        moves += moveLetter(points[i - 1], points[i]);
    }
    if (rotationInvariant) {
        let rotated = moves;
        for (let i = 0; i < 3; i++) {
            rotated = [...rotated].map((m) => TURN[m]).join("");
            if (rotated < moves) moves = rotated;
        }
    }
    return {
        kind: "trajectory",
        key: `trajectory:${moves}`,
        bits: moves,
        rows: 1,
        cols: moves.length,
    };
}

function moveLetter(from: Position, to: Position): string {
    const dRow = to.row - from.row;
    const dCol = to.col - from.col;
    if (dRow === 0 && dCol === 0) return "S";
    if (dRow === -1 && dCol === 0) return "U";
    if (dRow === 1 && dCol === 0) return "D";
    if (dRow === 0 && dCol === -1) return "L";
    if (dRow === 0 && dCol === 1) return "R";
    return "?";
}

function crop(cells: ShapePattern): number[][] {
    let top = Infinity;
    let bottom = -1;
    let left = Infinity;
    let right = -1;
    cells.forEach((row, r) => {
        row.forEach((v, c) => {
            if (v !== 1) return;
            top = Math.min(top, r);
            bottom = Math.max(bottom, r);
            left = Math.min(left, c);
            right = Math.max(right, c);
        });
    });
    if (bottom < 0) return [];
    const out: number[][] = [];
    for (let r = top; r <= bottom; r++) {
        out.push(cells[r].slice(left, right + 1));
    }
    return out;
}

function rotateClockwise(m: number[][]): number[][] {
    const rows = m.length;
    const cols = m[0]?.length ?? 0;
    const out: number[][] = [];
    for (let c = 0; c < cols; c++) {
        const row: number[] = [];
        for (let r = rows - 1; r >= 0; r--) row.push(m[r][c]);
        out.push(row);
    }
    return out;
}

function matrixKey(m: number[][]): string {
    const rows = m.length;
    const cols = m[0]?.length ?? 0;
    return `shape:${rows}x${cols}:${m.map((row) => row.join("")).join("/")}`;
}

function assertBinaryMatrix(cells: ShapePattern): void {
    const width = cells[0]?.length ?? 0;
    for (const row of cells) {
        if (row.length !== width) {
            throw new KernelError("Shape pattern rows must all have the same width", { code: "INVALID_PATTERN" });
        }
        for (const v of row) {
            if (v !== 0 && v !== 1) {
                throw new KernelError(`Shape pattern cells must be 0 or 1, got ${v}`, { code: "INVALID_PATTERN" });
            }
        }
    }
}

// ═══════════════════════════════════════════════════════
//                    Similarity
// ═══════════════════════════════════════════════════════

/**
 * Mismatching cells. Shapes of different sizes are compared over the larger
 * frame, both anchored top-left, with missing cells read as 0. Trajectories
 * compare only at equal length; Infinity when not comparable.
 */
export function hammingDistance(a: PatternSignature, b: PatternSignature): number {
    if (a.kind !== b.kind) return Infinity;
    if (a.kind === "trajectory" && a.bits.length !== b.bits.length) return Infinity;

    const rows = Math.max(a.rows, b.rows);
    const cols = Math.max(a.cols, b.cols);
    let distance = 0;
    for (let r = 0; r < rows; r++) {
        for (let c = 0; c < cols; c++) {
            if (cellAt(a, r, c) !== cellAt(b, r, c)) distance++;
        }
    }
    return distance;
}

function cellAt(sig: PatternSignature, row: number, col: number): string {
    if (row >= sig.rows || col >= sig.cols) return "0";
    return sig.bits[row * sig.cols + col] ?? "0";
}

/** 1 - hamming / compared cells, in [0, 1]; 0 when not comparable */
export function similarity(a: PatternSignature, b: PatternSignature): number {
    const distance = hammingDistance(a, b);
    if (!Number.isFinite(distance)) return 0;
    const cells = Math.max(a.rows, b.rows) * Math.max(a.cols, b.cols);
    if (cells === 0) return 1;
    return 1 - distance / cells;
}

// ═══════════════════════════════════════════════════════
//                    Extraction
// ═══════════════════════════════════════════════════════

/**
 * 3x3 occupancy around a cell: 1 where something other than empty floor
 * or the agent sits, 0 elsewhere (including off-grid).
 */
export function extractNeighborhood(
    grid: readonly (readonly GridSymbol[])[],
    center: Position,
): ShapePattern {
    const out: number[][] = [];
    for (let dr = -1; dr <= 1; dr++) {
        const row: number[] = [];
        for (let dc = -1; dc <= 1; dc++) {
            const cell = grid[center.row + dr]?.[center.col + dc];
            row.push(cell !== undefined && cell !== "." && cell !== "A" ? 1 : 0);
        }
        out.push(row);
    }
    return out;
}
