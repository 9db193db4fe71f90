/**
 * In-memory metrics counters for the mind kernel.
 *
 * Prometheus-style counters/gauges kept in process.
 * The runner logs snapshot() periodically; toPrometheus() is there for scrapers.
 */

export interface MetricsSnapshot {
    /** Unix timestamp when snapshot was taken */
    snapshotAt: number;
    /** Uptime in seconds */
    uptimeSeconds: number;
    counters: Record<string, number>;
    gauges: Record<string, number>;
}

export class MetricsRegistry {
    private startedAt = Date.now();
    private counters = new Map<string, number>();
    private gauges = new Map<string, number>();

    /** Increment a counter by delta (default 1) */
    inc(name: string, delta = 1): void {
        this.counters.set(name, (this.counters.get(name) ?? 0) + delta);
    }

    /** Set a gauge to an exact value */
    set(name: string, value: number): void {
        this.gauges.set(name, value);
    }

    /** Get current value of a counter */
    counter(name: string): number {
        return this.counters.get(name) ?? 0;
    }

    /** Get current value of a gauge */
    gauge(name: string): number {
        return this.gauges.get(name) ?? 0;
    }

    /** Snapshot all metrics */
    snapshot(): MetricsSnapshot {
        const now = Date.now();
        return {
            snapshotAt: now,
            uptimeSeconds: Math.round((now - this.startedAt) / 1000),
            counters: Object.fromEntries(this.counters),
            gauges: Object.fromEntries(this.gauges),
        };
    }

    /** Format as Prometheus text exposition */
    toPrometheus(prefix = "mind_kernel"): string {
        const lines: string[] = [];
        for (const [key, value] of this.counters) {
            const name = `${prefix}_${key}_total`;
            lines.push(`# TYPE ${name} counter`);
            lines.push(`${name} ${value}`);
        }
        for (const [key, value] of this.gauges) {
            const name = `${prefix}_${key}`;
            lines.push(`# TYPE ${name} gauge`);
            lines.push(`${name} ${value}`);
        }
        lines.push(`# TYPE ${prefix}_uptime_seconds gauge`);
        lines.push(`${prefix}_uptime_seconds ${Math.round((Date.now() - this.startedAt) / 1000)}`);
        return lines.join("\n") + "\n";
    }
}

/** Fresh registry; each kernel gets its own unless one is injected */
export function createMetrics(): MetricsRegistry {
    return new MetricsRegistry();
}

// Process-wide registry, wired in by the entry point
export const metrics = new MetricsRegistry();

// ═══════════════════════════════════════════════════════
//                  Well-known metric names
// ═══════════════════════════════════════════════════════

/** Counter: completed kernel ticks */
export const METRIC_TICKS = "kernel_ticks";
/** Counter: ticks that fell back to the safe "stay" action */
export const METRIC_FALLBACKS = "kernel_fallbacks";
/** Counter: labelled exposures applied */
export const METRIC_LESSONS = "grounding_lessons";
/** Counter: questions answered with a known label */
export const METRIC_RECOGNISED = "grounding_recognised";
/** Counter: questions answered with "unknown" */
export const METRIC_UNKNOWN = "grounding_unknown";
/** Counter: snapshots persisted by the runner */
export const METRIC_SNAPSHOTS_SAVED = "snapshots_saved";
/** Counter: snapshot persistence failures (after retries) */
export const METRIC_SNAPSHOT_FAILURES = "snapshot_failures";
/** Gauge: items in working memory */
export const METRIC_WORKING_MEMORY_SIZE = "working_memory_size";
/** Gauge: records retained in episodic memory */
export const METRIC_EPISODIC_SIZE = "episodic_size";
