/**
 * Error utilities — barrel export.
 */

export { extractErrorMessage, isTransientMessage } from "../errors.js";
export {
    KernelError,
    InvalidActionError,
    SkillNotFoundError,
    GroundingAmbiguousError,
    InvalidSymbolError,
    ConfigError,
    withRetry,
} from "./KernelError.js";
export type { KernelErrorCode, RetryOptions } from "./KernelError.js";
