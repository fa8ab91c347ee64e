import type { MonitorEvent } from "./types.js";

/**
 * Decides which notification, if any, a balance transition produces.
 * Only the previous and current readings matter: a low-balance alert fires
 * when the threshold is newly crossed, and any increase counts as a recharge.
 */
export const classifyTransition = (
  previous: number | null,
  current: number,
  threshold: number,
  updateTime: string | null = null,
): MonitorEvent | null => {
  if (previous === null) return null;

  if (current > previous) {
    return { type: "recharge", balance: current, previous, delta: current - previous, updateTime };
  }

  if (current < previous && current < threshold && !(previous < threshold)) {
    return { type: "low-balance", balance: current, threshold, updateTime };
  }

  return null;
};
