/**
 * WorkingMemory — capacity-bounded LRU of salient items.
 *
 * Items are keyed; pushing an existing key replaces the item and marks it
 * most recently used. Reading through get() also counts as a use.
 * contents() is ordered least recently used first.
 */

import { ConfigError } from "../errors/index.js";
import type { WorkingMemoryItem } from "./interface.js";

export class WorkingMemory {
    // Map iteration order doubles as recency order (oldest first)
    private readonly items = new Map<string, WorkingMemoryItem>();

    constructor(readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new ConfigError([`working memory capacity must be a positive integer, got ${capacity}`]);
        }
    }

    get size(): number {
        return this.items.size;
    }

    /** Always succeeds; evicts the least recently used item when full */
    push(item: WorkingMemoryItem): WorkingMemoryItem | undefined {
        if (this.items.has(item.key)) {
            this.items.delete(item.key);
            this.items.set(item.key, item);
            return undefined;
        }
        const evicted = this.evictIfFull();
        this.items.set(item.key, item);
        return evicted;
    }

    /** Drop the least recently used item if there is no room for another */
    evictIfFull(): WorkingMemoryItem | undefined {
        if (this.items.size < this.capacity) return undefined;
        const oldest = this.items.keys().next();
        if (oldest.done) return undefined;
        const evicted = this.items.get(oldest.value);
        this.items.delete(oldest.value);
        return evicted;
    }

    get(key: string): WorkingMemoryItem | undefined {
        const item = this.items.get(key);
        if (item) {
            this.items.delete(key);
            this.items.set(key, item);
        }
        return item;
    }

    remove(key: string): boolean {
        return this.items.delete(key);
    }

    contents(): WorkingMemoryItem[] {
        return [...this.items.values()];
    }

    clear(): void {
        this.items.clear();
    }
}
