/**
 * Promise-based delay, injectable so tests never wait.
 */
export type DelayFn = (ms: number) => Promise<void>;
