/**
 * Grid mind kernel — command line entry point.
 *
 * Builds a kernel from the environment (see config.ts), optionally wires a
 * PostgreSQL snapshot store, and runs the tick loop until MAX_TICKS or
 * SIGINT/SIGTERM.
 */

import "dotenv/config";
import { randomUUID } from "node:crypto";
import { loadConfigFromEnv } from "./config.js";
import { ConfigError } from "./errors/index.js";
import { extractErrorMessage } from "./errors.js";
import { MindKernel } from "./kernel/kernel.js";
import { formatMindState } from "./kernel/mindState.js";
import { createLogger } from "./logger.js";
import { metrics } from "./metrics.js";
import { runKernel } from "./runner.js";
import { createPgClient, hasPgConfig, PgSnapshotStore, type PgClient } from "./store/index.js";

async function main(): Promise<void> {
    const { kernel: kernelConfig, runtime } = loadConfigFromEnv();
    const log = createLogger({ level: runtime.logLevel, json: runtime.logFormat === "json" });

    log.info("=== Grid Mind Kernel ===");
    log.info(`Grid: ${kernelConfig.grid.rows}x${kernelConfig.grid.cols}, objects=${kernelConfig.grid.objectCount}, seed=${kernelConfig.seed}`);
    log.info(`Working memory capacity: ${kernelConfig.workingMemory.capacity}`);

    let client: PgClient | null = null;
    let store: PgSnapshotStore | null = null;
    if (hasPgConfig(runtime)) {
        client = createPgClient(runtime);
        store = new PgSnapshotStore(client, { runId: randomUUID(), maxSnapshots: runtime.maxSnapshots });
        await store.init();
        log.info(
            `Snapshot store: postgres (${runtime.databaseUrl ? "DATABASE_URL" : `${runtime.pgHost}:${runtime.pgPort}/${runtime.pgDatabase}`})`,
        );
    } else {
        log.info("Snapshot store: disabled");
    }

    const kernel = new MindKernel(kernelConfig, { logger: log, metrics });
    const controller = new AbortController();
    const stop = () => {
        log.info("Stopping kernel...");
        controller.abort();
    };
    process.on("SIGINT", stop);
    process.on("SIGTERM", stop);

    try {
        const summary = await runKernel(kernel, {
            maxTicks: runtime.maxTicks,
            tickIntervalMs: runtime.tickIntervalMs,
            printEvery: runtime.printEvery,
            sink: store ?? undefined,
            signal: controller.signal,
            log,
            metrics,
        });
        log.info(`\n${formatMindState(summary.final)}`);
        log.info("Metrics:", metrics.snapshot());
    } finally {
        await client?.close();
    }
}

main().catch((err) => {
    if (err instanceof ConfigError) {
        console.error(`Configuration error:\n  ${err.issues.join("\n  ")}`);
    } else {
        console.error("Fatal:", extractErrorMessage(err));
    }
    process.exit(1);
});
