import type { ChoiceValue } from "@formwire/shared-types";
import { BooleanField, SubmitField, type BooleanFieldOptions } from "./boolean-field";
import {
  RadioField,
  SelectField,
  SelectMultipleField,
  type ChoiceFieldConfig,
  type ChoiceFieldOptions,
  type MultiChoiceFieldConfig,
  type MultiChoiceFieldOptions
} from "./choice-fields";
import { coerceString, type Coercer } from "./coercion";
import {
  DateField,
  DateTimeField,
  DateTimeLocalField,
  TimeField,
  type DateTimeFieldOptions
} from "./date-time-fields";
import { FieldList, type FieldListOptions } from "./field-list";
import type { FormDefinition } from "./form";
import { FormField, type FormFieldOptions } from "./form-field";
import {
  DecimalField,
  DecimalRangeField,
  FloatField,
  IntegerField,
  IntegerRangeField,
  type DecimalFieldOptions,
  type FloatFieldOptions,
  type IntegerFieldOptions
} from "./numeric-fields";
import {
  EmailField,
  FileField,
  HiddenField,
  MultipleFileField,
  PasswordField,
  SearchField,
  StringField,
  TelField,
  TextAreaField,
  UrlField,
  type StringFieldOptions
} from "./string-fields";
import type { FieldOptions } from "./base-field";
import type { BoundField, FieldDeclaration } from "./types";
import { UnboundField } from "./unbound-field";

export const stringField = (options: StringFieldOptions = {}) => new UnboundField(StringField, options);
export const textAreaField = (options: StringFieldOptions = {}) => new UnboundField(TextAreaField, options);
export const passwordField = (options: StringFieldOptions = {}) => new UnboundField(PasswordField, options);
export const hiddenField = (options: StringFieldOptions = {}) => new UnboundField(HiddenField, options);
export const searchField = (options: StringFieldOptions = {}) => new UnboundField(SearchField, options);
export const telField = (options: StringFieldOptions = {}) => new UnboundField(TelField, options);
export const urlField = (options: StringFieldOptions = {}) => new UnboundField(UrlField, options);
export const emailField = (options: StringFieldOptions = {}) => new UnboundField(EmailField, options);
export const fileField = (options: StringFieldOptions = {}) => new UnboundField(FileField, options);
export const multipleFileField = (options: FieldOptions<readonly string[]> = {}) =>
  new UnboundField(MultipleFileField, options);

export const integerField = (options: IntegerFieldOptions = {}) => new UnboundField(IntegerField, options);
export const integerRangeField = (options: IntegerFieldOptions = {}) => new UnboundField(IntegerRangeField, options);
export const floatField = (options: FloatFieldOptions = {}) => new UnboundField(FloatField, options);
export const decimalField = (options: DecimalFieldOptions = {}) => new UnboundField(DecimalField, options);
export const decimalRangeField = (options: DecimalFieldOptions = {}) => new UnboundField(DecimalRangeField, options);

export const booleanField = (options: BooleanFieldOptions = {}) => new UnboundField(BooleanField, options);
export const submitField = (options: BooleanFieldOptions = {}) => new UnboundField(SubmitField, options);

export const dateTimeField = (options: DateTimeFieldOptions = {}) => new UnboundField(DateTimeField, options);
export const dateTimeLocalField = (options: DateTimeFieldOptions = {}) =>
  new UnboundField(DateTimeLocalField, options);
export const dateField = (options: DateTimeFieldOptions = {}) => new UnboundField(DateField, options);
export const timeField = (options: DateTimeFieldOptions = {}) => new UnboundField(TimeField, options);

/**
 * Choices are compared after coercion, so values other than strings need a `coerce`.
 */
export function selectField(options?: ChoiceFieldOptions<string>): UnboundField<SelectField, ChoiceFieldConfig<string>>;
export function selectField<T extends ChoiceValue>(
  options: ChoiceFieldOptions<T> & { coerce: Coercer<T> }
): UnboundField<SelectField<T>, ChoiceFieldConfig<T>>;
export function selectField(options: ChoiceFieldOptions<ChoiceValue> = {}): FieldDeclaration {
  return new UnboundField<SelectField<ChoiceValue>, ChoiceFieldConfig<ChoiceValue>>(SelectField, {
    ...options,
    coerce: options.coerce ?? coerceString
  });
}

export function radioField(options?: ChoiceFieldOptions<string>): UnboundField<RadioField, ChoiceFieldConfig<string>>;
export function radioField<T extends ChoiceValue>(
  options: ChoiceFieldOptions<T> & { coerce: Coercer<T> }
): UnboundField<RadioField<T>, ChoiceFieldConfig<T>>;
export function radioField(options: ChoiceFieldOptions<ChoiceValue> = {}): FieldDeclaration {
  return new UnboundField<RadioField<ChoiceValue>, ChoiceFieldConfig<ChoiceValue>>(RadioField, {
    ...options,
    coerce: options.coerce ?? coerceString
  });
}

export function selectMultipleField(
  options?: MultiChoiceFieldOptions<string>
): UnboundField<SelectMultipleField, MultiChoiceFieldConfig<string>>;
export function selectMultipleField<T extends ChoiceValue>(
  options: MultiChoiceFieldOptions<T> & { coerce: Coercer<T> }
): UnboundField<SelectMultipleField<T>, MultiChoiceFieldConfig<T>>;
export function selectMultipleField(options: MultiChoiceFieldOptions<ChoiceValue> = {}): FieldDeclaration {
  return new UnboundField<SelectMultipleField<ChoiceValue>, MultiChoiceFieldConfig<ChoiceValue>>(SelectMultipleField, {
    ...options,
    coerce: options.coerce ?? coerceString
  });
}

export const formField = (form: FormDefinition, options: Omit<FormFieldOptions, "form"> = {}) =>
  new UnboundField(FormField, { ...options, form });

export function fieldList<F extends BoundField>(
  field: FieldDeclaration<F>,
  options: Omit<FieldListOptions<F>, "field"> = {}
): UnboundField<FieldList<F>, FieldListOptions<F>> {
  return new UnboundField<FieldList<F>, FieldListOptions<F>>(FieldList, { ...options, field });
}
