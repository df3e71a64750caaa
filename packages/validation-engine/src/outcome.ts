import type { ValidationOutcome } from "./types";

const VALID: ValidationOutcome = Object.freeze({ type: "valid" });

export function valid(): ValidationOutcome {
  return VALID;
}

export function invalid(message: string): ValidationOutcome {
  return { type: "invalid", message };
}

export function stop(message?: string, options: { clearErrors?: boolean } = {}): ValidationOutcome {
  return {
    type: "stop",
    ...(message ? { message } : {}),
    ...(options.clearErrors ? { clearErrors: true } : {})
  };
}

export function isHalting(outcome: ValidationOutcome | void): boolean {
  return outcome?.type === "stop";
}
