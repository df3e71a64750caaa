export interface ValidationTarget {
  readonly name: string;
  readonly shortName: string;
  readonly label: string;
  readonly data: unknown;
  readonly rawData: readonly string[] | undefined;
  gettext(message: string): string;
  ngettext(singular: string, plural: string, n: number): string;
}

export interface FormLike {
  getField(name: string): ValidationTarget | undefined;
}

export type ValidationOutcome =
  | { readonly type: "valid" }
  | { readonly type: "invalid"; readonly message: string }
  | { readonly type: "stop"; readonly message?: string; readonly clearErrors?: boolean };

/**
 * A validator inspects the field and reports an outcome. Returning nothing means valid.
 *
 * `invalid` records a message and lets the rest of the chain run; `stop` halts the chain,
 * since later validators would be looking at data already known to be unusable.
 */
export type Validator<F extends FormLike = FormLike, T extends ValidationTarget = ValidationTarget> = (
  form: F | undefined,
  field: T
) => ValidationOutcome | void;

export interface ErrorSink {
  push(message: string): void;
  clear(): void;
}
