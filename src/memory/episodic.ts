/**
 * EpisodicMemory — append-only chronological log of ticks.
 *
 * Records are frozen on entry and never mutated. When the log grows past
 * maxRecords the oldest records are dropped first; the newest is never
 * evicted. query() is lazy and can be iterated any number of times.
 */

import { ConfigError, KernelError } from "../errors/index.js";
import { deepFreeze } from "../utils/freeze.js";
import type { EpisodicPredicate, EpisodicRecord } from "./interface.js";

export class EpisodicMemory {
    private records: EpisodicRecord[] = [];
    private recorded = 0;

    constructor(readonly maxRecords: number) {
        if (!Number.isInteger(maxRecords) || maxRecords < 1) {
            throw new ConfigError([`episodic maxRecords must be a positive integer, got ${maxRecords}`]);
        }
    }

    /** Records currently retained */
    get size(): number {
        return this.records.length;
    }

    /** Records ever appended, including evicted ones */
    get totalRecorded(): number {
        return this.recorded;
    }

    record(entry: EpisodicRecord): EpisodicRecord {
        const last = this.latest();
        if (last && entry.tick <= last.tick) {
            throw new KernelError(
                `Episodic record for tick ${entry.tick} does not follow tick ${last.tick}`,
                { code: "EPISODIC_ORDER" },
            );
        }
        const frozen = deepFreeze({ ...entry });
        this.records.push(frozen);
        this.recorded++;
        if (this.records.length > this.maxRecords) {
            this.records = this.records.slice(this.records.length - this.maxRecords);
        }
        return frozen;
    }

    /**
     * Records matching the predicate, ascending by tick.
     * Each iteration walks the log as it stood when the iteration began.
     */
    query(predicate: EpisodicPredicate = () => true): Iterable<EpisodicRecord> {
        const source = () => this.records;
        return {
            *[Symbol.iterator]() {
                const list = source();
                const end = list.length;
                for (let i = 0; i < end; i++) {
                    if (predicate(list[i])) yield list[i];
                }
            },
        };
    }

    latest(): EpisodicRecord | undefined {
        return this.records[this.records.length - 1];
    }

    /** Retained records as an array (ascending tick) */
    all(): readonly EpisodicRecord[] {
        return this.records;
    }

    clear(): void {
        this.records = [];
        this.recorded = 0;
    }
}
