import { setTimeout as sleep } from "timers/promises";
import type { DelayFn } from "../ports/timer.js";

/**
 * Real delay backed by a timer. Zero resolves on the next tick.
 */
export const realDelay: DelayFn = async (ms) => {
  await sleep(ms);
};
