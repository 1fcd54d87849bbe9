/**
 * Async utilities
 */

/** Suspends the caller; may reject when the wait is interrupted */
export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise<void>((r) => setTimeout(r, ms));
