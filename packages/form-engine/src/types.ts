import type { FormInput, Translations } from "@formwire/shared-types";
import type { FormLike, ValidationTarget, Validator } from "@formwire/validation-engine";
import type { FormMeta } from "./meta";

export type FieldErrors = ReadonlyArray<string | FieldErrors> | FormErrors;

export interface FormErrors {
  readonly [name: string]: FieldErrors;
}

export type FormValues = Record<string, unknown>;

/**
 * Declared with method syntax so a field type stays assignable across its data type.
 */
export type FieldFilter<T> = { filter(data: T): T }["filter"];

export interface FormContext extends FormLike {
  readonly meta: FormMeta;
  getField(name: string): BoundField | undefined;
}

export interface BoundField extends ValidationTarget {
  readonly id: string;
  readonly type: string;
  readonly description: string;
  readonly creationCounter: number;
  readonly errors: FieldErrors;
  readonly processErrors: readonly string[];
  readonly objectData: unknown;
  process(formdata: FormInput | undefined, data?: unknown): void;
  validate(form?: FormContext, extraValidators?: readonly Validator[]): boolean;
  populateObj(obj: object, name: string): void;
}

export interface BindOptions {
  prefix?: string;
  translations?: Translations;
  meta?: FormMeta;
  id?: string;
}

export interface BindContext extends BindOptions {
  form?: FormContext;
  name: string;
  creationCounter?: number;
}

export interface FieldDeclaration<F extends BoundField = BoundField> {
  readonly creationCounter: number;
  readonly fieldType: string;
  bind(form: FormContext | undefined, name: string, options?: BindOptions): F;
}
