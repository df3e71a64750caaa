import type { ErrorSink, FormLike, ValidationOutcome, ValidationTarget, Validator } from "./types";

/**
 * Records one outcome into the sink. Returns true when the outcome halts validation.
 */
export function applyOutcome(outcome: ValidationOutcome | void, sink: ErrorSink): boolean {
  if (!outcome || outcome.type === "valid") return false;
  if (outcome.type === "invalid") {
    sink.push(outcome.message);
    return false;
  }
  if (outcome.clearErrors) sink.clear();
  if (outcome.message) sink.push(outcome.message);
  return true;
}

function isOutcomeList(value: ValidationOutcome | readonly ValidationOutcome[]): value is readonly ValidationOutcome[] {
  return Array.isArray(value);
}

export function applyOutcomes(
  outcomes: ValidationOutcome | readonly ValidationOutcome[] | void,
  sink: ErrorSink
): boolean {
  if (!outcomes) return false;
  if (!isOutcomeList(outcomes)) return applyOutcome(outcomes, sink);
  for (const outcome of outcomes) {
    if (applyOutcome(outcome, sink)) return true;
  }
  return false;
}

export function runValidationChain<F extends FormLike, T extends ValidationTarget>(
  form: F | undefined,
  field: T,
  validators: Iterable<Validator<F, T>>,
  sink: ErrorSink
): boolean {
  for (const validator of validators) {
    if (applyOutcome(validator(form, field), sink)) return true;
  }
  return false;
}

export function arraySink(errors: Array<unknown>): ErrorSink {
  return {
    push: (message) => {
      errors.push(message);
    },
    clear: () => {
      errors.length = 0;
    }
  };
}
