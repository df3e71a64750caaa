export type { ErrorSink, FormLike, ValidationOutcome, ValidationTarget, Validator } from "./types";
export { invalid, isHalting, stop, valid } from "./outcome";
export { applyOutcome, applyOutcomes, arraySink, runValidationChain } from "./chain";
export { interpolate, type MessageParams } from "./interpolate";
export {
  anyOf,
  dataRequired,
  email,
  equalTo,
  inputRequired,
  ipAddress,
  length,
  macAddress,
  noneOf,
  numberRange,
  optional,
  regexp,
  url,
  uuid
} from "./validators";
export { matchesSchema } from "./schema-validator";
