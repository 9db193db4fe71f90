/**
 * Runner — drives a MindKernel tick by tick.
 *
 * The kernel itself is synchronous; this loop is the only async part. It
 * persists each snapshot (with retry on transient failures), paces ticks,
 * and stops on the tick limit or when the AbortSignal fires. The kernel is
 * always shut down on the way out and the terminated snapshot is persisted
 * like any other.
 */

import { withRetry, type RetryOptions } from "./errors/index.js";
import { extractErrorMessage } from "./errors.js";
import type { MindKernel } from "./kernel/kernel.js";
import { formatMindState, type MindState } from "./kernel/mindState.js";
import { silentLogger, type Logger } from "./logger.js";
import {
    METRIC_SNAPSHOT_FAILURES,
    METRIC_SNAPSHOTS_SAVED,
    type MetricsRegistry,
} from "./metrics.js";
import type { SnapshotSink } from "./store/snapshots.js";

export interface RunnerOptions {
    /** Stop after this many ticks; 0 or unset runs until aborted */
    maxTicks?: number;
    /** Pause between ticks */
    tickIntervalMs?: number;
    sink?: SnapshotSink;
    log?: Logger;
    signal?: AbortSignal;
    /** Defaults to the kernel's own registry */
    metrics?: MetricsRegistry;
    /** Log the formatted MindState every N ticks; 0 disables */
    printEvery?: number;
    retry?: Pick<RetryOptions, "maxAttempts" | "baseDelayMs">;
    /** Called after every completed tick, before persistence */
    onTick?: (state: MindState) => void;
}

export interface RunSummary {
    ticks: number;
    snapshotsSaved: number;
    persistenceFailures: number;
    stoppedBy: "max_ticks" | "aborted";
    final: MindState;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
        if (ms <= 0 || signal?.aborted) {
            resolve();
            return;
        }
        const done = () => {
            clearTimeout(timer);
            signal?.removeEventListener("abort", done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener("abort", done, { once: true });
    });
}

export async function runKernel(kernel: MindKernel, opts: RunnerOptions = {}): Promise<RunSummary> {
    const log = opts.log ?? silentLogger;
    const registry = opts.metrics ?? kernel.metrics;
    const maxTicks = opts.maxTicks ?? 0;
    const printEvery = opts.printEvery ?? 0;

    let ticks = 0;
    let snapshotsSaved = 0;
    let persistenceFailures = 0;

    const persist = async (state: MindState) => {
        const sink = opts.sink;
        if (!sink) return;
        try {
            await withRetry(() => sink.save(state), {
                maxAttempts: opts.retry?.maxAttempts ?? 3,
                baseDelayMs: opts.retry?.baseDelayMs ?? 200,
                label: `save snapshot tick ${state.tick}`,
                onRetry: (message) => log.warn(message),
            });
            snapshotsSaved++;
            registry.inc(METRIC_SNAPSHOTS_SAVED);
        } catch (err) {
            // A lost snapshot does not stop the mind
            persistenceFailures++;
            registry.inc(METRIC_SNAPSHOT_FAILURES);
            log.error(`[tick ${state.tick}] snapshot not persisted: ${extractErrorMessage(err)}`);
        }
    };

    log.info(`Runner started (maxTicks=${maxTicks || "unbounded"}, interval=${opts.tickIntervalMs ?? 0}ms)`);

    try {
        while (!opts.signal?.aborted && (maxTicks === 0 || ticks < maxTicks)) {
            const state = kernel.tick();
            ticks++;
            opts.onTick?.(state);

            if (printEvery > 0 && state.tick % printEvery === 0) {
                log.info(`\n${formatMindState(state)}`);
            }

            await persist(state);
            await sleep(opts.tickIntervalMs ?? 0, opts.signal);
        }
    } finally {
        kernel.shutdown();
    }

    const final = kernel.snapshot();
    await persist(final);

    const stoppedBy = opts.signal?.aborted ? "aborted" : "max_ticks";
    log.info(`Runner stopped (${stoppedBy}) after ${ticks} ticks; ${snapshotsSaved} snapshots saved, ${persistenceFailures} failed`);

    return { ticks, snapshotsSaved, persistenceFailures, stoppedBy, final };
}
