import { Field, type FieldOptions } from "./base-field";
import type { BindContext } from "./types";

export type FalseValue = string | boolean;

export interface BooleanFieldOptions extends FieldOptions<boolean> {
  /** Raw values read as unchecked. Defaults to `false`, `"false"` and `""`. */
  falseValues?: readonly FalseValue[];
}

const DEFAULT_FALSE_VALUES: readonly FalseValue[] = [false, "false", ""];

/**
 * Checkbox semantics: once formdata is present, a missing key means unchecked.
 */
export class BooleanField extends Field<boolean> {
  readonly type: string = "BooleanField";
  readonly inputType: string | undefined = "checkbox";
  readonly falseValues: readonly FalseValue[];

  constructor(options: BooleanFieldOptions, context: BindContext) {
    super(options, context);
    this.falseValues = [...(options.falseValues ?? DEFAULT_FALSE_VALUES)];
  }

  processFormdata(values: readonly string[]): void {
    const [first] = values;
    this.data = first === undefined ? false : this.fromWire(first);
  }

  value(): string {
    return this.rawData?.[0] ?? "y";
  }

  protected fromObject(value: unknown): boolean {
    if (Array.isArray(value)) return value.length > 0;
    return Boolean(value);
  }

  protected fromWire(value: string): boolean {
    return !this.falseValues.includes(value);
  }
}

export class SubmitField extends BooleanField {
  readonly type: string = "SubmitField";
  readonly inputType: string | undefined = "submit";
}
