import {
  ConfigurationError,
  isUnset,
  resolveDefault,
  UNSET,
  type FieldDefault,
  type FormInput
} from "@formwire/shared-types";
import type { Validator } from "@formwire/validation-engine";
import { BaseField, type BaseFieldOptions } from "./base-field";
import type { Form, FormDefinition } from "./form";
import type { BindContext, BoundField, FormContext, FormErrors, FormValues } from "./types";

export interface FormFieldOptions extends BaseFieldOptions {
  form: FormDefinition;
  /** Appended to this field's name to prefix the enclosed fields. */
  separator?: string;
  default?: FieldDefault<object | null>;
  validators?: readonly Validator[];
  filters?: readonly unknown[];
}

function isPlainRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Embeds a whole form as one field. Validation and errors come from the enclosed form,
 * so filters and validators cannot be attached here.
 */
export class FormField extends BaseField {
  readonly type: string = "FormField";
  readonly definition: FormDefinition;
  readonly separator: string;
  readonly rawData: readonly string[] | undefined = undefined;
  readonly processErrors: readonly string[] = [];
  objectData: unknown = undefined;

  private readonly defaultValue: FieldDefault<unknown>;
  private enclosed: Form | undefined;
  private captured: object | undefined;

  constructor(options: FormFieldOptions, context: BindContext) {
    super(options, context);
    if (options.filters && options.filters.length > 0) {
      throw new ConfigurationError("FormField cannot take filters, as the encapsulated data is not mutable.");
    }
    if (options.validators && options.validators.length > 0) {
      throw new ConfigurationError("FormField does not accept any validators. Instead, define them on the enclosed form.");
    }
    this.definition = options.form;
    this.separator = options.separator ?? "-";
    this.defaultValue = options.default ?? null;
  }

  get form(): Form {
    if (!this.enclosed) throw new ConfigurationError(`FormField '${this.name}' has not been processed yet`);
    return this.enclosed;
  }

  get data(): FormValues | null {
    return this.enclosed ? this.enclosed.data : null;
  }

  get errors(): FormErrors {
    return this.enclosed ? this.enclosed.errors : {};
  }

  process(formdata: FormInput | undefined, data: unknown = UNSET): void {
    let value = data;
    if (isUnset(value)) {
      value = resolveDefault(this.defaultValue);
      this.captured = typeof value === "object" && value !== null ? value : undefined;
    }
    this.objectData = value;

    const prefix = this.name + this.separator;
    if (isPlainRecord(value)) {
      this.enclosed = this.definition.create({ formdata, prefix, data: value });
    } else {
      const obj = typeof value === "object" && value !== null ? value : undefined;
      this.enclosed = this.definition.create({ formdata, prefix, obj });
    }
  }

  validate(_form?: FormContext, extraValidators: readonly Validator[] = []): boolean {
    if (extraValidators.length > 0) {
      throw new ConfigurationError("FormField does not accept in-line validators, as it gets errors from the enclosed form.");
    }
    return this.form.validate();
  }

  /**
   * Populates the existing object at `obj[name]`, or the default object captured during
   * `process` when there is none.
   */
  populateObj(obj: object, name: string): void {
    const existing: unknown = Reflect.get(obj, name);
    let candidate = typeof existing === "object" && existing !== null ? existing : undefined;
    if (!candidate) {
      if (!this.captured) {
        throw new ConfigurationError(
          "populateObj: cannot find a value to populate from the provided obj or input data/defaults"
        );
      }
      candidate = this.captured;
      Reflect.set(obj, name, candidate);
    }
    this.form.populateObj(candidate);
  }

  getField(name: string): BoundField | undefined {
    return this.form.getField(name);
  }

  [Symbol.iterator](): Iterator<BoundField> {
    return this.form[Symbol.iterator]();
  }
}
