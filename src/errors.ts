/**
 * Error helpers shared by the kernel, the runner and the snapshot store.
 */

/** Failures of the persistence layer that are worth another attempt */
const TRANSIENT_PATTERNS: RegExp[] = [
    /ECONNREFUSED/i,
    /ECONNRESET/i,
    /getaddrinfo/i,
    /ETIMEDOUT|ESOCKETTIMEDOUT|timeout/i,
    /Connection terminated/i,
    /too many clients/i,
    /the database system is starting up/i,
];

/**
 * Extract error message from unknown catch value.
 */
export function extractErrorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === "string") return err;
    return String(err);
}

/** True when the message looks like a network or database hiccup */
export function isTransientMessage(message: string): boolean {
    return TRANSIENT_PATTERNS.some((pattern) => pattern.test(message));
}
