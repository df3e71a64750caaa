import { ValueError, type Choice, type ChoiceOption, type ChoiceValue } from "@formwire/shared-types";
import { interpolate, invalid, type ValidationOutcome } from "@formwire/validation-engine";
import { Field, type FieldOptions, type PreValidateResult } from "./base-field";
import type { Coercer } from "./coercion";
import type { BindContext, FormContext } from "./types";

export interface ChoiceFieldOptions<T> extends FieldOptions<T> {
  choices?: readonly Choice[];
  coerce?: Coercer<T>;
}

/** Options as stored on a declaration, with the coercer resolved. */
export interface ChoiceFieldConfig<T> extends ChoiceFieldOptions<T> {
  coerce: Coercer<T>;
}

export interface MultiChoiceFieldOptions<T> extends FieldOptions<readonly T[]> {
  choices?: readonly Choice[];
  coerce?: Coercer<T>;
}

export interface MultiChoiceFieldConfig<T> extends MultiChoiceFieldOptions<T> {
  coerce: Coercer<T>;
}

function isCoercionFailure(error: unknown): boolean {
  return error instanceof ValueError || error instanceof TypeError;
}

/**
 * Choices are copied at construction; replace `choices` to change them later.
 */
abstract class ChoiceField<T extends ChoiceValue, TData> extends Field<TData> {
  choices: readonly Choice[];
  readonly coerce: Coercer<T>;

  constructor(options: FieldOptions<TData> & { choices?: readonly Choice[]; coerce: Coercer<T> }, context: BindContext) {
    super(options, context);
    this.choices = [...(options.choices ?? [])];
    this.coerce = options.coerce;
  }

  *iterChoices(): Generator<ChoiceOption<ChoiceValue>> {
    for (const [value, label] of this.choices) {
      const coerced = this.tryCoerce(value);
      yield { value, label, selected: coerced !== undefined && this.isSelected(coerced) };
    }
  }

  protected tryCoerce(value: unknown): T | undefined {
    try {
      return this.coerce(value);
    } catch (error) {
      if (isCoercionFailure(error)) return undefined;
      throw error;
    }
  }

  protected choiceValues(): T[] {
    return this.choices.map(([value]) => this.tryCoerce(value)).filter((value): value is T => value !== undefined);
  }

  protected abstract isSelected(value: T): boolean;
}

/**
 * Single-choice select. A wire value that fails to coerce records an error and leaves the
 * previous `data` in place.
 */
export class SelectField<T extends ChoiceValue = string> extends ChoiceField<T, T> {
  readonly type: string = "SelectField";
  readonly inputType: string | undefined = undefined;

  constructor(options: ChoiceFieldConfig<T>, context: BindContext) {
    super(options, context);
  }

  processFormdata(values: readonly string[]): void {
    const [first] = values;
    if (first === undefined) return;
    try {
      this.data = this.coerce(first);
    } catch (error) {
      if (!(error instanceof ValueError)) throw error;
      throw new ValueError(this.gettext("Invalid Choice: could not coerce"));
    }
  }

  preValidate(_form: FormContext | undefined): PreValidateResult {
    if (this.data !== null && this.choiceValues().includes(this.data)) return;
    return invalid(this.gettext("Not a valid choice"));
  }

  protected fromObject(value: unknown): T | null {
    return this.tryCoerce(value) ?? null;
  }

  protected fromWire(value: string): T {
    return this.coerce(value);
  }

  protected isSelected(value: T): boolean {
    return value === this.data;
  }
}

export class RadioField<T extends ChoiceValue = string> extends SelectField<T> {
  readonly type: string = "RadioField";
  readonly inputType: string | undefined = "radio";
}

/**
 * Multi-choice select. Any value that fails to coerce rejects the whole submission with a
 * single error; each value outside the choices gets its own error on validation.
 */
export class SelectMultipleField<T extends ChoiceValue = string> extends ChoiceField<T, readonly T[]> {
  readonly type: string = "SelectMultipleField";
  readonly inputType: string | undefined = undefined;

  constructor(options: MultiChoiceFieldConfig<T>, context: BindContext) {
    super({ ...options, attributes: { multiple: "multiple", ...options.attributes } }, context);
  }

  processFormdata(values: readonly string[]): void {
    try {
      this.data = values.map((value) => this.coerce(value));
    } catch (error) {
      if (!(error instanceof ValueError)) throw error;
      throw new ValueError(this.gettext("Invalid choice(s): one or more data inputs could not be coerced"));
    }
  }

  preValidate(_form: FormContext | undefined): PreValidateResult {
    if (!this.data || this.data.length === 0) return;
    const allowed = this.choiceValues();
    const outcomes: ValidationOutcome[] = this.data
      .filter((value) => !allowed.includes(value))
      .map((value) =>
        invalid(interpolate(this.gettext("'{value}' is not a valid choice for this field"), { value: String(value) }))
      );
    return outcomes;
  }

  value(): string {
    return this.data ? this.data.join(",") : "";
  }

  protected fromObject(value: unknown): readonly T[] | null {
    if (value === null || value === undefined) return null;
    if (!Array.isArray(value)) return null;
    const coerced: T[] = [];
    for (const item of value) {
      const result = this.tryCoerce(item);
      if (result === undefined) return null;
      coerced.push(result);
    }
    return coerced;
  }

  protected fromWire(value: string): readonly T[] {
    return [this.coerce(value)];
  }

  protected isSelected(value: T): boolean {
    return this.data !== null && this.data.includes(value);
  }
}
