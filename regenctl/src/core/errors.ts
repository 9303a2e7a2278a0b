import type { StepId } from "./pipeline.js";

/** Failure taxonomy for a regeneration run. All codes are fatal to the run. */
export type RegenErrorCode =
  | "CHECKOUT_FAILED"
  | "PROVISION_FAILED"
  | "INSTALL_FAILED"
  | "GENERATE_FAILED"
  | "COMMIT_FAILED"
  | "STEP_TIMEOUT";

export class RegenError extends Error {
  readonly code: RegenErrorCode;
  readonly step: StepId | null;
  readonly detail: Record<string, unknown> | undefined;

  constructor(
    code: RegenErrorCode,
    message: string,
    opts: { step?: StepId; detail?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "RegenError";
    this.code = code;
    this.step = opts.step ?? null;
    this.detail = opts.detail;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
