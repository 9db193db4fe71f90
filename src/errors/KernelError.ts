/**
 * KernelError — typed error family for the mind kernel.
 *
 * Every error carries:
 * - code: stable machine-readable identifier
 * - recoverable: whether the caller can continue (retry, fall back)
 */

import { extractErrorMessage, isTransientMessage } from "../errors.js";
import type { SemanticCandidate } from "../memory/interface.js";

export type KernelErrorCode =
    | "INVALID_ACTION"
    | "SKILL_NOT_FOUND"
    | "GROUNDING_AMBIGUOUS"
    | "INVALID_SYMBOL"
    | "INVALID_CONFIG"
    | "INVALID_TRANSITION"
    | "KERNEL_TERMINATED"
    | "EPISODIC_ORDER"
    | "INVALID_PATTERN"
    | "PERSISTENCE_FAILED"
    | "INTERNAL";

export class KernelError extends Error {
    readonly code: KernelErrorCode;
    readonly recoverable: boolean;

    constructor(
        message: string,
        opts?: {
            code?: KernelErrorCode;
            recoverable?: boolean;
            cause?: unknown;
        },
    ) {
        super(message, { cause: opts?.cause });
        this.name = "KernelError";
        this.code = opts?.code ?? "INTERNAL";
        this.recoverable = opts?.recoverable ?? false;
    }

    /** Wrap any unknown caught value into a KernelError */
    static from(err: unknown): KernelError {
        if (err instanceof KernelError) return err;
        const message = extractErrorMessage(err);
        return new KernelError(message, {
            code: isTransientMessage(message) ? "PERSISTENCE_FAILED" : "INTERNAL",
            recoverable: isTransientMessage(message),
            cause: err,
        });
    }

    /** Check if an unknown error is worth retrying */
    static isRetryable(err: unknown): boolean {
        if (err instanceof KernelError) return err.recoverable && err.code === "PERSISTENCE_FAILED";
        return isTransientMessage(extractErrorMessage(err));
    }
}

/** Action outside {up, down, left, right, stay}. The caller may retry with a valid one. */
export class InvalidActionError extends KernelError {
    readonly action: string;

    constructor(action: string) {
        super(`Invalid action: ${action}`, { code: "INVALID_ACTION", recoverable: true });
        this.name = "InvalidActionError";
        this.action = action;
    }
}

/** Procedural routine requested under a name nobody registered */
export class SkillNotFoundError extends KernelError {
    readonly skill: string;

    constructor(skill: string) {
        super(`Skill not registered: ${skill}`, { code: "SKILL_NOT_FOUND", recoverable: true });
        this.name = "SkillNotFoundError";
        this.skill = skill;
    }
}

/**
 * Several labels tie for the top candidate above threshold.
 * Only raised when the grounding engine runs with ambiguityPolicy "raise".
 */
export class GroundingAmbiguousError extends KernelError {
    readonly labels: string[];
    readonly confidence: number;
    /** Full ranked candidate list the tie was found in */
    readonly candidates: SemanticCandidate[];

    constructor(labels: string[], confidence: number, candidates: SemanticCandidate[] = []) {
        super(
            `Ambiguous grounding: ${labels.join(", ")} tie at ${confidence.toFixed(3)}`,
            { code: "GROUNDING_AMBIGUOUS", recoverable: true },
        );
        this.name = "GroundingAmbiguousError";
        this.labels = labels;
        this.confidence = confidence;
        this.candidates = candidates;
    }
}

/** Grid cell outside the closed symbol alphabet */
export class InvalidSymbolError extends KernelError {
    readonly symbol: string;

    constructor(symbol: string) {
        super(`Invalid grid symbol: ${JSON.stringify(symbol)}`, { code: "INVALID_SYMBOL" });
        this.name = "InvalidSymbolError";
        this.symbol = symbol;
    }
}

export class ConfigError extends KernelError {
    readonly issues: string[];

    constructor(issues: string[], cause?: unknown) {
        super(`Invalid kernel config: ${issues.join("; ")}`, { code: "INVALID_CONFIG", cause });
        this.name = "ConfigError";
        this.issues = issues;
    }
}

// ═══════════════════════════════════════════════════════
//                  Retry Utility
// ═══════════════════════════════════════════════════════

export interface RetryOptions {
    /** Maximum number of attempts (including the first one). Default: 3 */
    maxAttempts?: number;
    /** Base delay in ms between retries. Default: 200 */
    baseDelayMs?: number;
    /** Whether to use exponential backoff. Default: true */
    exponential?: boolean;
    /** Optional label for logging. */
    label?: string;
    /** Custom predicate to decide if an error is retryable. Default: KernelError.isRetryable */
    isRetryable?: (err: unknown) => boolean;
    /** Called before each retry; defaults to console.warn */
    onRetry?: (message: string) => void;
}

/**
 * Retry wrapper for transient persistence errors.
 * Kernel contract violations are never retried.
 */
export async function withRetry<T>(
    fn: () => Promise<T>,
    opts?: RetryOptions,
): Promise<T> {
    const maxAttempts = opts?.maxAttempts ?? 3;
    const baseDelayMs = opts?.baseDelayMs ?? 200;
    const exponential = opts?.exponential ?? true;
    const label = opts?.label ?? "operation";
    const isRetryable = opts?.isRetryable ?? KernelError.isRetryable;
    const onRetry = opts?.onRetry ?? ((message: string) => console.warn(message));

    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
            return await fn();
        } catch (err) {
            lastError = err;

            if (attempt >= maxAttempts || !isRetryable(err)) {
                throw KernelError.from(err);
            }

            const delay = exponential
                ? baseDelayMs * Math.pow(2, attempt - 1)
                : baseDelayMs;
            onRetry(`[Retry] ${label} attempt ${attempt}/${maxAttempts} failed, retrying in ${delay}ms...`);
            await new Promise((resolve) => setTimeout(resolve, delay));
        }
    }

    throw KernelError.from(lastError);
}
