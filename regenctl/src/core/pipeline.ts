import type { StepTimeouts } from "../types/config.js";

/**
 * All regeneration steps in execution order.
 */
export const ALL_STEPS = [
  "checkout_main",
  "checkout_upstream",
  "provision",
  "install",
  "generate",
  "commit",
] as const;

export type StepId = (typeof ALL_STEPS)[number];

/**
 * Run status: the step in progress, or a terminal state.
 */
export type RunStatus = StepId | "done" | `failed_${StepId}` | `timeout_${StepId}`;

/**
 * Events that drive state transitions.
 */
export type TransitionEvent = "success" | "skipped" | "failure" | "timeout";

/**
 * Pure function: given current step + event, return next status.
 * A skipped step advances exactly like a successful one.
 */
export function nextState(current: StepId, event: TransitionEvent): RunStatus {
  if (event === "failure") return `failed_${current}`;
  if (event === "timeout") return `timeout_${current}`;

  const idx = ALL_STEPS.indexOf(current);
  if (idx >= ALL_STEPS.length - 1) return "done";
  return ALL_STEPS[idx + 1];
}

export function isTerminal(status: string): boolean {
  return status === "done" || status.startsWith("failed_") || status.startsWith("timeout_");
}

const DEFAULT_TIMEOUTS: Record<StepId, number> = {
  checkout_main: 300,
  checkout_upstream: 900,
  provision: 300,
  install: 900,
  generate: 3600,
  commit: 300,
};

/**
 * Get the timeout for a step in seconds.
 */
export function getStepTimeout(step: StepId, timeouts?: StepTimeouts): number {
  return timeouts?.[step] ?? DEFAULT_TIMEOUTS[step];
}
