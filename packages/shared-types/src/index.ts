export * from "./domain/form-domain";
export * from "./domain/errors";
export * from "./runtime/form-input";
