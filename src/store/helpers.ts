/**
 * Store helpers — the query seam and row mappers.
 */

import { parseMindStateSnapshot, type MindState } from "../kernel/mindState.js";

/**
 * The slice of pg's Pool the store needs. Tests hand in an in-process fake.
 */
export interface SqlClient {
    query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

export interface SnapshotRecord {
    id: number;
    runId: string;
    tick: number;
    state: MindState;
    createdAt: string;
}

export function toIso(value: unknown): string {
    if (value instanceof Date) return value.toISOString();
    return new Date(String(value)).toISOString();
}

export function mapSnapshotRow(row: Record<string, unknown>): SnapshotRecord {
    return {
        id: Number(row.id),
        runId: String(row.run_id),
        tick: Number(row.tick),
        // JSONB arrives parsed from pg; plain strings come from text columns
        state: parseMindStateSnapshot(row.state),
        createdAt: toIso(row.created_at),
    };
}
